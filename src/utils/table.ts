import type { Row } from "../adapters/db";

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "NULL";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Small row-oriented table with a plain-text rendering:
 *
 *  TrackId | Name
 *  ------- | ----------
 *  1       | Intro
 *  ======= | ==========
 */
export class Table {
  constructor(
    readonly columns: readonly string[],
    readonly rows: readonly Row[],
  ) {}

  /** Build from columns of cells; shorter columns are padded with blank cells. */
  static fromColumns(headers: readonly string[], columns: ReadonlyArray<readonly unknown[]>): Table {
    const height = columns.reduce((max, c) => Math.max(max, c.length), 0);
    const rows: Row[] = [];
    for (let i = 0; i < height; i++) {
      rows.push(columns.map((c) => (i < c.length ? c[i] : "")));
    }
    return new Table(headers, rows);
  }

  get shape(): [number, number] {
    return [this.rows.length, this.columns.length];
  }

  column(name: string): unknown[] {
    const index = this.columns.indexOf(name);
    if (index === -1) throw new Error(`unknown table column: "${name}"`);
    return this.rows.map((row) => row[index]);
  }

  toString(): string {
    const cells = this.rows.map((row) => this.columns.map((_, i) => formatCell(row[i])));
    const widths = this.columns.map((header, i) => Math.max(header.length, ...cells.map((r) => r[i].length)));
    const line = (values: readonly string[]) =>
      values.map((v, i) => ` ${v.padEnd(widths[i])} `).join("|").trimEnd();
    return [
      line(this.columns),
      line(widths.map((w) => "-".repeat(w))),
      ...cells.map(line),
      line(widths.map((w) => "=".repeat(w))),
    ].join("\n");
  }
}
