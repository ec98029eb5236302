export type Alignment = "left" | "right";

export interface TableColumn {
  header: string;
  align?: Alignment;
}

const pad = (value: string, width: number, align: Alignment): string =>
  align === "right" ? value.padStart(width) : value.padEnd(width);

/** Plain-text table with a dashed rule under the header. Trailing spaces are trimmed. */
export const renderTable = (columns: TableColumn[], rows: string[][]): string => {
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...rows.map((row) => (row[index] ?? "").length))
  );
  const renderRow = (cells: string[]): string =>
    columns
      .map((column, index) => pad(cells[index] ?? "", widths[index], column.align ?? "left"))
      .join("  ")
      .trimEnd();

  return [
    renderRow(columns.map((column) => column.header)),
    widths.map((width) => "-".repeat(width)).join("  "),
    ...rows.map(renderRow),
  ].join("\n");
};
