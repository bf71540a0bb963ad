import { z } from "zod";

export const DIGEST_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const digestConfigSchema = z.object({
  digest: z
    .string()
    .min(1)
    .regex(DIGEST_ID_PATTERN, "must be a filename-safe identifier"),
  title: z.string().min(1).optional(),
  items: z.array(z.string().min(1)).min(1),
});

export const appConfigSchema = z
  .object({
    digests: z.array(digestConfigSchema).default([]),
    projects: z.array(z.string().min(1)).default([]),
    github: z
      .object({
        token: z.string().min(1).optional(),
        tokenFile: z.string().min(1).optional(),
        apiUrl: z.string().url().default("https://api.github.com"),
      })
      .default({}),
    server: z
      .object({
        port: z.number().int().positive().max(65535).default(8080),
      })
      .default({}),
    schedule: z
      .object({
        refresh: z.string().min(1).default("*/30 * * * *"),
      })
      .default({}),
    refresh: z
      .object({
        maxAgeMinutes: z.number().positive().default(30),
        lookbackDays: z.number().positive().default(7),
        maxPages: z.number().int().positive().default(5),
        globalConcurrency: z.number().int().positive().default(8),
        perDigestConcurrency: z.number().int().positive().default(4),
        fetchTimeoutMs: z.number().int().positive().default(15000),
        onDemandTimeoutMs: z.number().int().positive().default(20000),
        transientRetries: z.number().int().nonnegative().default(2),
        retryBaseDelayMs: z.number().int().nonnegative().default(500),
      })
      .default({}),
  })
  .refine((config) => !(config.github.token && config.github.tokenFile), {
    message: "github.token and github.tokenFile are mutually exclusive",
    path: ["github"],
  });

export type AppConfig = z.infer<typeof appConfigSchema>;
