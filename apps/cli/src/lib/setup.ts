import type { AvailConfig } from "@slurm-availability/shared";
import { loadConfig } from "@/core/config.ts";
import { LocalRunner, SSHRunner, type CommandRunner } from "@/core/runner.ts";
import { SreportClient } from "@/core/sreport.ts";

export interface SetupOverrides {
  host?: string;
  local?: boolean;
}

/**
 * Pick where sreport runs: `--local` wins, then `--host`, then the configured
 * login node, then this machine.
 */
export function selectRunner(
  config: AvailConfig,
  overrides: SetupOverrides = {},
): CommandRunner {
  const timeoutMs = config.sreport.timeout_ms;
  const host = overrides.local
    ? undefined
    : (overrides.host ?? config.connection?.host);
  return host
    ? new SSHRunner(host, { timeoutMs })
    : new LocalRunner({ timeoutMs });
}

export function ensureSetup(overrides: SetupOverrides = {}): {
  config: AvailConfig;
  sreport: SreportClient;
} {
  const config = loadConfig();
  const runner = selectRunner(config, overrides);
  const sreport = new SreportClient(runner, config.sreport.command);
  return { config, sreport };
}
