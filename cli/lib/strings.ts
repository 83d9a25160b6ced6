/**
 * String and output helpers
 */

/**
 * Print a value as indented JSON on stdout
 */
export function jsonOut(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Left-align cells into columns separated by two spaces
 */
export function formatTable(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map(row => row.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd());
}
