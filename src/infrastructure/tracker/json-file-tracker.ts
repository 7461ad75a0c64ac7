import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { IOError, ValidationError } from "../../domain/common/errors";
import { DAY_KEY_PATTERN, type DayTracker } from "./day-tracker";

const TrackerFileSchema = z.object({
  days: z.record(z.string().regex(DAY_KEY_PATTERN), z.boolean()),
});

type TrackerFile = z.infer<typeof TrackerFileSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Stores completed days in a small JSON file:
 * `{ "days": { "2026-10-19": true } }`.
 */
export class JsonFileDayTracker implements DayTracker {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.isAbsolute(filePath)
      ? filePath
      : path.join(process.cwd(), filePath);
  }

  async markCompleted(dayKey: string): Promise<void> {
    if (!DAY_KEY_PATTERN.test(dayKey)) {
      throw new ValidationError(`Invalid day key: ${dayKey}`);
    }
    const file = await this.read();
    file.days[dayKey] = true;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, `${JSON.stringify(file, null, 2)}\n`, "utf8");
    } catch (error) {
      throw new IOError(`Failed to write tracker file: ${this.filePath}`, error, this.filePath);
    }
  }

  async completedDays(): Promise<string[]> {
    const file = await this.read();
    return Object.entries(file.days)
      .filter(([, done]) => done)
      .map(([key]) => key)
      .sort();
  }

  private async read(): Promise<TrackerFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return { days: {} };
      throw new IOError(`Failed to read tracker file: ${this.filePath}`, error, this.filePath);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Tracker file is not valid JSON: ${this.filePath}`, error);
    }
    const parsed = TrackerFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Malformed tracker file: ${this.filePath}`, parsed.error);
    }
    return parsed.data;
  }
}
