import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { parse as parseTOML, stringify as stringifyTOML } from "smol-toml";
import { z } from "zod";
import type { AvailConfig } from "@slurm-availability/shared";
import {
  DEFAULT_DECIMAL_SEPARATOR,
  DEFAULT_SREPORT_COMMAND,
  DEFAULT_SREPORT_TIMEOUT_MS,
} from "@slurm-availability/shared";
import { AVAIL_DIR, CONFIG_FILE } from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";

export const AvailConfigSchema = z.object({
  connection: z
    .object({
      host: z.string().min(1),
    })
    .optional(),
  sreport: z
    .object({
      command: z.string().min(1).default(DEFAULT_SREPORT_COMMAND),
      cluster: z.string().min(1).optional(),
      timeout_ms: z.number().int().positive().default(DEFAULT_SREPORT_TIMEOUT_MS),
    })
    .default({}),
  display: z
    .object({
      decimal_separator: z.string().length(1).default(DEFAULT_DECIMAL_SEPARATOR),
    })
    .default({}),
});

export function parseConfig(raw: string, source = CONFIG_FILE): AvailConfig {
  try {
    return AvailConfigSchema.parse(parseTOML(raw));
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(
        `Invalid config at ${source}: ${error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
      );
    }
    throw new ConfigError(`Failed to read config at ${source}: ${error}`);
  }
}

/** The config file is optional; without it sreport runs locally with defaults. */
export function loadConfig(path = CONFIG_FILE): AvailConfig {
  if (!existsSync(path)) {
    return AvailConfigSchema.parse({});
  }
  return parseConfig(readFileSync(path, "utf-8"), path);
}

export function saveConfig(config: AvailConfig): void {
  const validated = AvailConfigSchema.parse(config);

  if (!existsSync(AVAIL_DIR)) {
    mkdirSync(AVAIL_DIR, { recursive: true, mode: 0o700 });
  }

  writeFileSync(CONFIG_FILE, stringifyTOML(validated), { mode: 0o600 });
}
