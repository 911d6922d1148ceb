import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse';

/**
 * Read a CSV file and return an array of objects keyed by header names.
 *
 * Notes
 * - Uses streaming parse to avoid loading the whole file into memory.
 * - Empty lines are skipped; headers are required.
 * - A leading byte-order mark is dropped so the first header stays usable
 *   (spreadsheet exports often carry one).
 *
 * @param filePath Absolute or relative path to the CSV file.
 * @returns Array of rows as string-keyed objects.
 * @example
 * const rows = await readCsv('data/bad_domains.csv');
 * console.log(rows[0].bad_domains);
 */
export async function readCsv(filePath: string): Promise<Record<string, string>[]> {
  const records: Record<string, string>[] = [];
  await new Promise<void>((resolve, reject) => {
    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(parse({ columns: true, skip_empty_lines: true, bom: true, trim: true }))
      .on('data', (row: Record<string, string>) => records.push(row))
      .on('end', () => resolve())
      .on('error', reject);
  });
  return records;
}

/**
 * Write data as pretty-printed JSON to a file, creating the parent directory.
 *
 * @param filePath Output path.
 * @param data Any JSON-serializable value.
 */
export function writeJson(filePath: string, data: unknown) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
}
