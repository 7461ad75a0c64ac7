export type { Office, OfficeSection, SectionKind } from "./src/domain/office/types";
export { DEFAULT_OFFICE_TITLE } from "./src/domain/office/types";
export {
  AppError,
  ConfigError,
  DecodeError,
  IOError,
  TransportError,
  ValidationError,
  toAppError,
} from "./src/domain/common/errors";
export { extractOffice, extractSection } from "./src/application/office/extract";
export { classifySection, PROSE_SECTION_PHRASES } from "./src/application/office/classify";
export { OfficeLoader } from "./src/application/office/loader";
export type { OfficeLoaderDeps, OfficeState, OfficeStateListener } from "./src/application/office/loader";
export { createHttpOfficeFetcher } from "./src/infrastructure/http/office-fetcher";
export type { HttpOfficeFetcherConfig, OfficeFetcher } from "./src/infrastructure/http/office-fetcher";
export { dayKey } from "./src/infrastructure/tracker/day-tracker";
export type { DayTracker } from "./src/infrastructure/tracker/day-tracker";
export { JsonFileDayTracker } from "./src/infrastructure/tracker/json-file-tracker";
export { loadConfig } from "./src/infrastructure/config/load";
export type { AppConfig } from "./src/infrastructure/config/schema";
