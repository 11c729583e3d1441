import { describe, it, expect } from "vitest";
import {
  LocalRunner,
  SSHRunner,
  checkSshResult,
  quoteForShell,
} from "@/core/runner.ts";
import { SSHConnectionError } from "@/lib/errors.ts";
import { selectRunner } from "@/lib/setup.ts";
import { parseConfig } from "@/core/config.ts";

describe("quoteForShell", () => {
  it("leaves safe arguments alone", () => {
    expect(quoteForShell("start=2025-04-01")).toBe("start=2025-04-01");
    expect(quoteForShell("--parsable2")).toBe("--parsable2");
  });

  it("single-quotes everything else", () => {
    expect(quoteForShell("")).toBe("''");
    expect(quoteForShell("a b")).toBe("'a b'");
    expect(quoteForShell("can't")).toBe("'can'\\''t'");
    expect(quoteForShell("$(rm -rf /)")).toBe("'$(rm -rf /)'");
  });
});

describe("SSHRunner", () => {
  it("sends the command as one quoted remote string", () => {
    const runner = new SSHRunner("login.example.org");
    expect(
      runner.buildArgv(["sreport", "cluster", "utilization", "cluster=my hpc"]),
    ).toEqual([
      "ssh",
      "-o",
      "BatchMode=yes",
      "-o",
      "ConnectTimeout=10",
      "login.example.org",
      "sreport cluster utilization 'cluster=my hpc'",
    ]);
  });
});

describe("checkSshResult", () => {
  it("passes remote exit codes through", () => {
    const result = { exitCode: 1, output: "sreport: error: boom" };
    expect(checkSshResult("login", result)).toBe(result);
  });

  it("reports unreachable hosts as connection errors", () => {
    expect(() =>
      checkSshResult("login", {
        exitCode: 255,
        output: "ssh: Could not resolve hostname login: Name or service not known",
      }),
    ).toThrow(
      new SSHConnectionError(
        "Cannot reach login. Check the host name and your network or VPN.",
      ),
    );
  });

  it("reports rejected keys", () => {
    expect(() =>
      checkSshResult("login", {
        exitCode: 255,
        output: "user@login: Permission denied (publickey).",
      }),
    ).toThrow("SSH authentication to login failed. Check your keys or ssh config.");
  });

  it("keeps ssh's message for other failures", () => {
    expect(() =>
      checkSshResult("login", { exitCode: 255, output: "kex_exchange_identification: read: Connection reset\n" }),
    ).toThrow(
      "SSH to login failed (exit 255): kex_exchange_identification: read: Connection reset",
    );
  });
});

describe("selectRunner", () => {
  const local = parseConfig("");
  const remote = parseConfig('[connection]\nhost = "login.example.org"');

  it("runs locally without a host", () => {
    expect(selectRunner(local)).toBeInstanceOf(LocalRunner);
  });

  it("uses the configured or given host", () => {
    expect(selectRunner(remote)).toBeInstanceOf(SSHRunner);
    expect(selectRunner(local, { host: "other" })).toBeInstanceOf(SSHRunner);
  });

  it("lets --local override a configured host", () => {
    expect(selectRunner(remote, { local: true })).toBeInstanceOf(LocalRunner);
  });
});
