#!/usr/bin/env tsx
import { createRequire } from "module";
import { Command } from "commander";
import { registerAvailabilityCommand } from "./src/commands/availability.ts";
import { registerInitCommand } from "./src/commands/init.ts";

const pkg: { version: string } = createRequire(import.meta.url)(
  "./package.json",
);

async function main() {
  const program = new Command();

  program
    .version(pkg.version)
    .name("savail")
    .description("Slurm cluster CPU time availability from sreport");

  registerAvailabilityCommand(program);
  registerInitCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
