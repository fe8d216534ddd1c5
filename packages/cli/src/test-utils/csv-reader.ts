import { createReadStream } from 'node:fs';
import csvParser from 'csv-parser';

export interface CsvTable {
  headers: string[];
  rows: string[][];
}

function isCsvRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === 'string')
  );
}

/**
 * Read a written CSV file back as header and rows. Cells are keyed by column index,
 * so repeated headers such as `test` survive.
 */
export async function readCsvFile(filepath: string): Promise<CsvTable> {
  const records: string[][] = [];
  const stream = createReadStream(filepath).pipe(csvParser({ headers: false }));

  for await (const row of stream) {
    const record: unknown = row;
    if (!isCsvRecord(record)) {
      throw new Error(`Unexpected CSV row in ${filepath}`);
    }
    records.push(Array.from({ length: Object.keys(record).length }, (_, i) => record[String(i)] ?? ''));
  }

  const [headers = [], ...rows] = records;
  return { headers, rows };
}
