import csv from 'csv-parser';
import { Readable } from 'stream';
import type { CellValue, TabularDataset } from '@retail-etl/types';
import { columnRecord, createDataset, emptyDataset } from '../dataset/TabularDataset';
import { StructuralMismatchError } from '../utils/errorUtils';

export interface CsvParserOptions {
  /** Encoding of raw bytes. Source exports are ISO-8859-1. */
  encoding?: BufferEncoding;
  separator?: string;
}

// csv-parser emits a row of empty fields for a blank line
function isBlankRow(row: Record<string, string>): boolean {
  return Object.values(row).every(value => value === undefined || value === '');
}

/**
 * Parse CSV bytes into a column-oriented dataset. The header row fixes the
 * column order; empty fields become null.
 */
export class CsvParser {
  private readonly encoding: BufferEncoding;
  private readonly separator: string;

  constructor(options: CsvParserOptions = {}) {
    this.encoding = options.encoding ?? 'latin1';
    this.separator = options.separator ?? ',';
  }

  async parse(input: Buffer | string): Promise<TabularDataset> {
    const text = typeof input === 'string' ? input : input.toString(this.encoding);
    if (text.trim() === '') {
      return emptyDataset();
    }

    const { headers, rows } = await this.parseCsvData(text);
    const data = columnRecord<CellValue[]>();
    for (const header of headers) {
      data[header] = [];
    }

    rows.forEach((row, index) => {
      if (isBlankRow(row)) {
        return;
      }
      const extra = Object.keys(row).filter(key => !headers.includes(key));
      if (extra.length > 0) {
        throw new StructuralMismatchError(
          `CSV row ${index + 2} has more fields than the header (${headers.length})`,
          { row: index + 2, expected: headers.length }
        );
      }
      for (const header of headers) {
        const value = Object.prototype.hasOwnProperty.call(row, header) ? row[header] : undefined;
        data[header].push(value === undefined || value === '' ? null : value);
      }
    });

    return createDataset(headers, data);
  }

  /**
   * Stream the text through csv-parser, collecting the header and raw rows
   */
  private async parseCsvData(text: string): Promise<{ headers: string[]; rows: Record<string, string>[] }> {
    return new Promise((resolve, reject) => {
      const rows: Record<string, string>[] = [];
      let headers: string[] = [];

      Readable.from([text])
        .pipe(csv({
          separator: this.separator,
          strict: false
        }))
        .on('headers', (parsedHeaders: string[]) => {
          headers = parsedHeaders;
        })
        .on('data', (row: Record<string, string>) => {
          rows.push(row);
        })
        .on('end', () => {
          resolve({ headers, rows });
        })
        .on('error', (error: Error) => {
          reject(error);
        });
    });
  }
}

export default CsvParser;
