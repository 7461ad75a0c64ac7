import { z } from "zod";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("info");

export const SourceSchema = z.object({
  url: z
    .string()
    .url()
    .default("https://www.a2cc.org/resources/pray-the-divine-hours"),
  timeoutMs: z.number().int().positive().default(20_000),
  maxBytes: z.number().int().positive().default(5_000_000),
  maxRetries: z.number().int().min(0).default(2),
});

export const TrackerSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().min(1).default("data/prayed-days.json"),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  source: SourceSchema.default({}),
  tracker: TrackerSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
