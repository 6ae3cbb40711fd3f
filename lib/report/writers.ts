import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';

export type CsvCell = string | number | boolean | null | undefined;

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Header row plus one line per row, each CRLF-terminated. Cells are quoted
 * only when they contain a delimiter, quote, line break or edge whitespace;
 * null and undefined become empty cells.
 */
export function toCsv(headers: string[], rows: CsvCell[][]): string {
  return `${Papa.unparse([headers, ...rows], { newline: '\r\n' })}\r\n`;
}

export async function writeCsv(file: string, headers: string[], rows: CsvCell[][]): Promise<void> {
  await ensureDir(path.dirname(file));
  await fs.writeFile(file, toCsv(headers, rows), 'utf8');
}

export async function writeJson(file: string, value: unknown): Promise<void> {
  await ensureDir(path.dirname(file));
  await fs.writeFile(file, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
}

export async function writeText(file: string, content: string): Promise<void> {
  await ensureDir(path.dirname(file));
  await fs.writeFile(file, content, 'utf8');
}

/** File-name-safe form of a provider object name. */
export function safeFileName(name: string): string {
  return name.replace(/[^\w.-]+/g, '_');
}
