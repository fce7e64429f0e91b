export type CsvValue = string | number | boolean | null | undefined;

const NEEDS_QUOTES = /[",\r\n]/;

export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  if (!NEEDS_QUOTES.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

/** Header line plus one line per row, `\n`-terminated. Columns follow `headers` order. */
export function formatCsv<K extends string>(headers: readonly K[], rows: ReadonlyArray<Record<K, CsvValue>>): string {
  const lines = [headers.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(headers.map((header) => escapeCsvField(row[header])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
