export interface ChartEntry {
  label: string;
  value: number;
}

/**
 * Horizontal bar chart. Bar lengths scale to the largest absolute value;
 * negative values are drawn with "=" instead of "#".
 */
export const renderBarChart = (
  entries: ChartEntry[],
  options: { width?: number; title?: string; formatValue?: (value: number) => string } = {}
): string => {
  const width = options.width ?? 24;
  const formatValue = options.formatValue ?? ((value: number) => String(value));
  const maxAbs = entries.reduce((max, entry) => Math.max(max, Math.abs(entry.value)), 0);
  const labelWidth = entries.reduce((max, entry) => Math.max(max, entry.label.length), 0);

  const lines = entries.map((entry) => {
    const filled = maxAbs === 0 ? 0 : Math.round((Math.abs(entry.value) / maxAbs) * width);
    const bar = (entry.value < 0 ? "=" : "#").repeat(filled);
    return `${entry.label.padEnd(labelWidth)} |${bar.padEnd(width)}| ${formatValue(entry.value)}`;
  });
  return options.title ? [options.title, ...lines].join("\n") : lines.join("\n");
};
