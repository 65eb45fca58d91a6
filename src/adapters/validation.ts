import { z } from "zod";

/**
 * Schema for config/config.yaml. Every field has a default so an empty file
 * yields a usable configuration.
 */
export const ConfigSchema = z.object({
  download: z
    .object({
      downloadDir: z.string().min(1).default("data/download"),
      storageDir: z.string().min(1).default("data/storage"),
      maxWaitSeconds: z.coerce.number().nonnegative().default(300),
      pollIntervalMs: z.coerce.number().int().positive().default(1000),
      clearDownloadDir: z.boolean().default(true),
    })
    .default({}),
  browser: z
    .object({
      headless: z.boolean().default(true),
      incognito: z.boolean().default(true),
      disableWebSecurity: z.boolean().default(false),
      domainSkipSecurity: z.array(z.string().min(1)).default([]),
      executablePath: z.string().min(1).optional(),
      channel: z.string().min(1).optional(),
      userDataDir: z.string().min(1).default("data/profile"),
    })
    .default({}),
  logging: z
    .object({
      eventLogDb: z.string().min(1).optional(),
      eventLogJsonl: z.string().min(1).optional(),
    })
    .default({}),
});

export type ConfigInput = z.input<typeof ConfigSchema>;

export const BooleanEnvSchema = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");
