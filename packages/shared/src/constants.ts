import type { PercentFlag } from "./types.ts";

/**
 * Powers of ten for sreport's magnitude suffixes. sreport abbreviates large
 * counts (e.g. `12.5M`) when a column is too narrow for the full figure.
 */
export const MAGNITUDE_EXPONENTS: Record<string, number> = {
  k: 3,
  m: 6,
  g: 9,
  t: 12,
  p: 15,
};

/**
 * Substrings that mark a `--parsable2` attempt as unusable even when sreport
 * exits 0. Older releases print usage text for unknown flags.
 */
export const SREPORT_ERROR_MARKERS = [
  "Invalid option",
  "sreport: error:",
] as const;

export const PERCENT_FLAG_LABELS: Record<PercentFlag, string> = {
  undefined: "N/A",
  negative: "Error (Negative Available Time)",
};

export const DEFAULT_SREPORT_COMMAND = "sreport";
export const DEFAULT_SREPORT_TIMEOUT_MS = 60_000;
export const DEFAULT_DECIMAL_SEPARATOR = ",";
