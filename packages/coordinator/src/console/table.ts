/**
 * Plain-text tables for console output.
 */

/**
 * Lay out rows in padded columns. The first row is the header and gets a
 * dashed rule beneath it. Trailing spaces are trimmed from every line.
 */
export function formatTable(rows: readonly (readonly string[])[]): string[] {
  if (rows.length === 0) return [];

  const columns = Math.max(...rows.map((row) => row.length));
  const widths: number[] = [];
  for (let column = 0; column < columns; column++) {
    widths.push(Math.max(...rows.map((row) => (row[column] ?? "").length)));
  }

  const render = (cells: readonly string[]): string =>
    widths
      .map((width, column) => (cells[column] ?? "").padEnd(width))
      .join("  ")
      .trimEnd();

  const [header, ...body] = rows;
  return [render(header), render(widths.map((width) => "-".repeat(width))), ...body.map(render)];
}
