import type { DelimiterMode, RawMetricTriple } from "@slurm-availability/shared";

/**
 * Lines that never carry data, checked in order. sreport's title and column
 * names drift between releases ("Alloc" vs "Allocated", "Rept" vs
 * "Reported"), so these are only a first pass: a line that slips through is
 * still rejected by the row shape check in `selectMetrics`.
 */
const SKIP_RULES = [
  { kind: "blank", pattern: /^$/ },
  { kind: "separator", pattern: /^-+(\s+-+)*$/ },
  { kind: "title", pattern: /^Cluster Utilization .* - / },
  { kind: "units", pattern: /^Usage reported in / },
  {
    kind: "header",
    pattern:
      /^Cluster[|\s]+(Allocated|Alloc)[|\s]+Down[|\s]+(PLND Down|PlndDown)[|\s]+Idle[|\s]+(Planned|Reserved|TresUsed)[|\s]+(Reported|Rept)\b/,
  },
] as const;

export type LineKind = (typeof SKIP_RULES)[number]["kind"] | "candidate";

const TOKENIZERS: Record<DelimiterMode, (line: string) => string[]> = {
  pipe: (line) => line.split("|").map((field) => field.trim()),
  whitespace: (line) => line.split(/\s+/),
};

const SUFFIXED_NUMBER = /^[0-9.,]+[kmgtp]?$/i;
const PURE_NUMBER = /^\d+(\.\d+)?$/;

export function classifyLine(line: string): LineKind {
  const trimmed = line.trim();
  for (const rule of SKIP_RULES) {
    if (rule.pattern.test(trimmed)) return rule.kind;
  }
  return "candidate";
}

export function tokenizeLine(line: string, mode: DelimiterMode): string[] {
  return TOKENIZERS[mode](line.trim());
}

/**
 * A data row has a cluster name followed by six figures:
 * Allocated, Down, PLND Down, Idle, Planned/Reserved, Reported.
 */
export function isDataRow(tokens: readonly string[]): boolean {
  const [name] = tokens;
  if (name === undefined || tokens.length < 7) return false;
  if (PURE_NUMBER.test(name)) return false;
  return tokens.slice(1, 7).every((token) => SUFFIXED_NUMBER.test(token));
}

/**
 * Extract the Reported, Down and PLND Down fields from
 * `sreport cluster utilization` output.
 *
 * Expected formats:
 *   `--parsable2`:
 *     Cluster|Allocated|Down|PLND Down|Idle|Planned|Reported
 *     cluster1|812345|1205|0|95210|0|908760
 *
 *   plain:
 *     --------------------------------------------------------------------------------
 *     Cluster Utilization 2025-04-01T00:00:00 - 2025-04-30T23:59:59
 *     Usage reported in CPU Minutes
 *     --------------------------------------------------------------------------------
 *       Cluster      Allocated     Down PLND Down       Idle    Planned      Reported
 *     --------- -------------- -------- --------- ---------- ---------- -------------
 *      cluster1         812.3K     1205         0      95210          0       908.8K
 *
 * The first row that fits wins. Returns null when no row fits.
 */
export function selectMetrics(
  text: string,
  mode: DelimiterMode,
): RawMetricTriple | null {
  for (const line of text.split("\n")) {
    if (classifyLine(line) !== "candidate") continue;

    const tokens = tokenizeLine(line, mode);
    if (!isDataRow(tokens)) continue;

    const [, , down, plannedDown, , , reported] = tokens;
    if (reported === undefined || down === undefined || plannedDown === undefined) {
      continue;
    }
    return { reported, down, plannedDown };
  }

  return null;
}
