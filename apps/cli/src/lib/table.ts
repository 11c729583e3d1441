function stripAnsi(value: string): string {
  return value.replace(/\x1b\[[0-9;]*m/g, "");
}

export interface TableOptions {
  rows: string[][];
  /** Left indent in spaces (default: 2) */
  indent?: number;
}

function computeColumnWidths(rows: string[][]): number[] {
  const columns = Math.max(0, ...rows.map((row) => row.length));
  return Array.from({ length: columns }, (_, index) =>
    Math.max(0, ...rows.map((row) => stripAnsi(row[index] ?? "").length)),
  );
}

function buildRowRenderer(widths: number[], indent: number) {
  const pad = " ".repeat(indent);
  return (cols: string[]) =>
    pad +
    cols
      .map((col, index) => {
        const gap = index < cols.length - 1 ? 2 : 0;
        const padding = (widths[index] ?? 0) - stripAnsi(col).length + gap;
        return `${col}${" ".repeat(Math.max(0, padding))}`;
      })
      .join("")
      .trimEnd();
}

/** Lay out rows as lines, columns padded to their widest cell. */
export function formatTable(options: TableOptions): string[] {
  const { rows, indent = 2 } = options;
  const render = buildRowRenderer(computeColumnWidths(rows), indent);
  return rows.map(render);
}

export function renderTable(options: TableOptions): void {
  for (const line of formatTable(options)) {
    console.log(line);
  }
}
