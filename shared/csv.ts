export type CsvValue = string | number | boolean | null | undefined;

export type CsvColumn<T> = {
  header: string;
  value: (row: T) => CsvValue;
};

export function escapeCsvValue(value: CsvValue): string {
  if (value === null || value === undefined) return "";
  const s = String(value);
  const needsQuotes = /[",\r\n]/.test(s);
  const escaped = s.replace(/"/g, '""');
  return needsQuotes ? `"${escaped}"` : escaped;
}

function joinLines(lines: CsvValue[][]): string {
  return lines.map((line) => line.map(escapeCsvValue).join(",")).join("\r\n") + "\r\n";
}

/**
 * RFC 4180 text with CRLF line endings and a trailing CRLF. The header row
 * is written unless `includeHeaders` is false.
 */
export function buildCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[], opts?: { includeHeaders?: boolean }): string {
  const lines: CsvValue[][] = rows.map((row) => columns.map((c) => c.value(row)));
  if (opts?.includeHeaders !== false) lines.unshift(columns.map((c) => c.header));
  return joinLines(lines);
}
