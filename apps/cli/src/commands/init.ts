import type { Command } from "commander";
import { confirm, input } from "@inquirer/prompts";
import type { AvailConfig } from "@slurm-availability/shared";
import { loadConfig, saveConfig } from "@/core/config.ts";
import { CONFIG_FILE } from "@/lib/constants.ts";
import { theme } from "@/lib/theme.ts";

export function registerInitCommand(program: Command) {
  program
    .command("init")
    .description("Configure where and how sreport is run")
    .action(async () => {
      try {
        await runInit();
      } catch (error) {
        if (error instanceof Error) {
          if (error.message.includes("User force closed")) {
            console.log("\n");
            process.exit(0);
          }
          console.error(theme.error(`\nSetup failed: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

async function runInit() {
  const current = loadConfig();

  const remote = await confirm({
    message: "Run sreport on a login node over ssh?",
    default: current.connection !== undefined,
  });

  let connection: AvailConfig["connection"];
  if (remote) {
    const host = await input({
      message: "SSH host (alias or user@hostname):",
      default: current.connection?.host,
      validate: (value) => value.trim().length > 0 || "Host is required",
    });
    connection = { host: host.trim() };
  }

  const command = await input({
    message: "sreport command:",
    default: current.sreport.command,
  });
  const cluster = await input({
    message: "Cluster name (leave empty for sreport's default):",
    default: current.sreport.cluster ?? "",
  });
  const separator = await input({
    message: "Decimal separator for percentages:",
    default: current.display.decimal_separator,
    validate: (value) => value.length === 1 || "Use a single character",
  });

  const config: AvailConfig = {
    ...(connection ? { connection } : {}),
    sreport: {
      command: command.trim(),
      ...(cluster.trim() ? { cluster: cluster.trim() } : {}),
      timeout_ms: current.sreport.timeout_ms,
    },
    display: { decimal_separator: separator },
  };

  saveConfig(config);
  console.log(theme.success(`\nSaved ${CONFIG_FILE}`));
}
