import { z } from "zod";
import { DEFAULT_WORKERS } from "./deletion/deleter";

const configSchema = z.object({
  RG_PURGE_WORKERS: z.coerce.number().int().positive().default(DEFAULT_WORKERS),
  RG_PURGE_QUIET: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
  AZURE_CLI_PATH: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = configSchema.parse(process.env);
  }
  return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}

export function resetConfig(): void {
  config = null;
}

const optionsSchema = z.object({
  exclude: z.array(z.string()).default([]),
  workers: z.coerce.number().int().positive(),
  quiet: z.boolean(),
  dryRun: z.boolean(),
  azPath: z.string().min(1).optional(),
});

export type PurgeOptions = z.infer<typeof optionsSchema>;

export type CliFlags = {
  exclude?: string[];
  workers?: string;
  quiet?: boolean;
  dryRun?: boolean;
};

/**
 * Merge command-line flags over environment config. Flags win.
 */
export function resolveOptions(flags: CliFlags, cfg: Config): PurgeOptions {
  return optionsSchema.parse({
    exclude: flags.exclude,
    workers: flags.workers ?? cfg.RG_PURGE_WORKERS,
    quiet: flags.quiet || cfg.RG_PURGE_QUIET,
    dryRun: flags.dryRun ?? false,
    azPath: cfg.AZURE_CLI_PATH,
  });
}
