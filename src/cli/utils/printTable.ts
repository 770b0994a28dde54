/**
 * Pretty prints tabular data to console
 */

export function printTable(headers: string[], rows: string[][]): void {
  if (rows.length === 0) {
    console.log("No data to display");
    return;
  }

  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => {
    return Math.max(...allRows.map((row) => stripAnsi(row[colIndex] ?? "").length));
  });

  console.log(formatRow(headers, colWidths));
  console.log(colWidths.map((width) => "─".repeat(width)).join("─┼─"));
  for (const row of rows) {
    console.log(formatRow(row, colWidths));
  }
}

function formatRow(cells: string[], widths: number[]): string {
  return widths.map((width, i) => (cells[i] ?? "").padEnd(width)).join(" │ ").trimEnd();
}

/**
 * Strip ANSI escape codes for length calculation
 */
function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}
