// src/utils/dateParser.ts

const MONTH_NAMES = [
  'Januari',
  'Februari',
  'Maret',
  'April',
  'Mei',
  'Juni',
  'Juli',
  'Agustus',
  'September',
  'Oktober',
  'November',
  'Desember',
] as const;

const MONTH_NUMBERS: ReadonlyMap<string, string> = new Map(
  MONTH_NAMES.map((name, index) => [name.toLowerCase(), String(index + 1).padStart(2, '0')])
);

/** Month placeholder for names missing from the table */
export const UNKNOWN_MONTH = '00';

/**
 * Convert an Indonesian date ("1 Juli 2024") to "01-07-2024" for use in a
 * filename. Never throws: unknown month names become "00", and anything that
 * is not three whitespace-separated tokens comes back with spaces and slashes
 * turned into hyphens.
 */
export function parseIndonesianDate(text: string): string {
  const parts = text.trim().split(/\s+/);
  if (parts.length >= 3) {
    const day = parts[0].padStart(2, '0');
    const month = MONTH_NUMBERS.get(parts[1].toLowerCase()) ?? UNKNOWN_MONTH;
    return `${day}-${month}-${parts[2]}`;
  }
  return text.replace(/ /g, '-').replace(/\//g, '-');
}

/**
 * "12 Januari 2026"
 */
export function formatIndonesianDate(date: Date): string {
  return `${date.getDate()} ${MONTH_NAMES[date.getMonth()]} ${date.getFullYear()}`;
}

/**
 * "12-01-2026"
 */
export function formatNumericDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}-${month}-${date.getFullYear()}`;
}
