import { z } from "zod";

export const SyncConfigSchema = z.object({
  pending_dir: z.string().min(1).default("pending"),
  archive_dir: z.string().min(1).default("archive"),
  state_dir: z.string().min(1).default(".relay"),
  auto_commit: z.boolean().default(true),
});

export const GitConfigSchema = z.object({
  remote: z.string().min(1).default("origin"),
  main_branch: z.string().min(1).default("main"),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export const AppConfigSchema = z.object({
  sync: SyncConfigSchema.default({}),
  git: GitConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type GitConfig = z.infer<typeof GitConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
