import { spawn } from "child_process";
import { SSHConnectionError } from "@/lib/errors.ts";

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order, like `2>&1`. */
  output: string;
}

export interface CommandRunner {
  run(argv: string[]): Promise<CommandResult>;
}

export interface RunnerOptions {
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 60_000;

/** Exit status a POSIX shell reports for a command it cannot find. */
const COMMAND_NOT_FOUND = 127;

function spawnMerged(argv: string[], timeoutMs: number): Promise<CommandResult> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new Error("Cannot run an empty command"));
  }

  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

    const timeout = setTimeout(() => {
      proc.kill();
    }, timeoutMs);

    proc.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));

    proc.on("error", (error) => {
      clearTimeout(timeout);
      resolve({
        exitCode: COMMAND_NOT_FOUND,
        output: `${command}: ${error.message}`,
      });
    });

    proc.on("close", (code, signal) => {
      clearTimeout(timeout);
      const output = Buffer.concat(chunks).toString("utf-8");
      if (signal) {
        resolve({
          // 128 + SIGTERM, as a shell would report it
          exitCode: 143,
          output: `${output}\n${command} terminated by ${signal}`,
        });
        return;
      }
      resolve({ exitCode: code ?? 1, output });
    });
  });
}

/** Runs commands on this host. */
export class LocalRunner implements CommandRunner {
  private timeoutMs: number;

  constructor(options?: RunnerOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  run(argv: string[]): Promise<CommandResult> {
    return spawnMerged(argv, this.timeoutMs);
  }
}

const SHELL_SAFE = /^[a-zA-Z0-9_@%+=:,./-]+$/;

/**
 * POSIX single-quote an argument for the remote shell:
 * can't → 'can'\''t'
 */
export function quoteForShell(arg: string): string {
  if (arg === "") return "''";
  return SHELL_SAFE.test(arg) ? arg : `'${arg.replaceAll("'", "'\\''")}'`;
}

/** ssh's own exit status for failures before or outside the remote command. */
const SSH_FAILURE = 255;

/**
 * Pass a remote result through unless ssh itself failed, in which case the
 * exit status says nothing about sreport.
 */
export function checkSshResult(host: string, result: CommandResult): CommandResult {
  if (result.exitCode !== SSH_FAILURE) return result;

  const errMsg = result.output.trim();
  if (errMsg.includes("Permission denied")) {
    throw new SSHConnectionError(
      `SSH authentication to ${host} failed. Check your keys or ssh config.`,
    );
  }
  if (
    errMsg.includes("Could not resolve hostname") ||
    errMsg.includes("Connection refused") ||
    errMsg.includes("Connection timed out")
  ) {
    throw new SSHConnectionError(
      `Cannot reach ${host}. Check the host name and your network or VPN.`,
    );
  }
  throw new SSHConnectionError(
    `SSH to ${host} failed (exit ${SSH_FAILURE}): ${errMsg || "no output"}`,
  );
}

/**
 * Runs commands on a login node over ssh. The remote exit status comes back
 * as ssh's own.
 */
export class SSHRunner implements CommandRunner {
  private host: string;
  private timeoutMs: number;

  constructor(host: string, options?: RunnerOptions) {
    this.host = host;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  buildArgv(argv: string[]): string[] {
    return [
      "ssh",
      "-o",
      "BatchMode=yes",
      "-o",
      "ConnectTimeout=10",
      this.host,
      argv.map(quoteForShell).join(" "),
    ];
  }

  async run(argv: string[]): Promise<CommandResult> {
    const result = await spawnMerged(this.buildArgv(argv), this.timeoutMs);
    return checkSshResult(this.host, result);
  }
}
