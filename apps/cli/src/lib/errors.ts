import type { RawMetricTriple, SreportAttempt } from "@slurm-availability/shared";

export class AvailError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends AvailError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

export class InvalidPeriodError extends AvailError {
  constructor(input: string) {
    super(
      `Invalid period "${input}". Use YYYY, YYYY-MM, or YYYY-MM-DD.`,
      "INVALID_PERIOD",
    );
  }
}

export class SSHConnectionError extends AvailError {
  constructor(message: string) {
    super(message, "SSH_CONNECTION_ERROR");
  }
}

/** The effective sreport invocation exited non-zero. */
export class ExternalToolFailure extends AvailError {
  constructor(
    public readonly attempts: readonly SreportAttempt[],
    exitCode: number,
  ) {
    super(`sreport failed with exit code ${exitCode}`, "EXTERNAL_TOOL_FAILURE");
  }

  /** Output of the last attempt, which is the one that decided the failure. */
  get rawText(): string {
    return this.attempts[this.attempts.length - 1]?.output ?? "";
  }
}

export class ReportNotFoundError extends AvailError {
  constructor(public readonly rawText: string) {
    super(
      "Could not find a cluster utilization row in the sreport output. " +
        "The output format may be unexpected, or there is no data for the period.",
      "REPORT_NOT_FOUND",
    );
  }
}

export class MalformedNumberError extends AvailError {
  constructor(
    public readonly token: string,
    public readonly context?: RawMetricTriple,
    /** The report the token was selected from, when known. */
    public readonly rawText?: string,
  ) {
    const detail = context
      ? ` (Reported: '${context.reported}', Down: '${context.down}', PLND Down: '${context.plannedDown}')`
      : "";
    super(`'${token}' is not a valid number${detail}`, "MALFORMED_NUMBER");
  }
}
