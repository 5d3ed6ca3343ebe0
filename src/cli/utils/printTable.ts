const ANSI = /\u001b\[[0-9;]*m/g;

function visibleWidth(cell: string): number {
  return cell.replace(ANSI, "").length;
}

function pad(cell: string, width: number): string {
  return cell + " ".repeat(Math.max(0, width - visibleWidth(cell)));
}

/**
 * Render rows under a header as aligned columns. Trailing spaces are trimmed.
 */
export function formatTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  const widths = headers.map((header, col) =>
    Math.max(visibleWidth(header), ...rows.map((row) => visibleWidth(row[col] ?? "")))
  );
  const line = (cells: readonly string[]) =>
    widths
      .map((width, col) => pad(cells[col] ?? "", width))
      .join(" │ ")
      .trimEnd();

  return [line(headers), widths.map((width) => "─".repeat(width)).join("─┼─"), ...rows.map(line)];
}

export function printTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>, empty = "No data to display"): void {
  if (rows.length === 0) {
    console.log(empty);
    return;
  }
  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}
