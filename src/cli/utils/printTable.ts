/**
 * Column-aligned console tables for CLI output
 */

const NUMERIC = /^-?\d+(\.\d+)?$/;

function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}

function pad(cell: string, width: number): string {
  const visible = stripAnsi(cell).length;
  const fill = " ".repeat(Math.max(0, width - visible));
  // numbers line up on the right
  return NUMERIC.test(cell) ? fill + cell : cell + fill;
}

export function formatTable(headers: string[], rows: string[][]): string[] {
  if (rows.length === 0) {
    return ["(none)"];
  }

  const widths = headers.map((header, col) =>
    Math.max(stripAnsi(header).length, ...rows.map((row) => stripAnsi(row[col] ?? "").length))
  );

  return [
    headers.map((header, i) => header.padEnd(widths[i])).join(" │ ").trimEnd(),
    widths.map((width) => "─".repeat(width)).join("─┼─"),
    ...rows.map((row) => widths.map((width, i) => pad(row[i] ?? "", width)).join(" │ ").trimEnd()),
  ];
}

export function printTable(headers: string[], rows: string[][]): void {
  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}
