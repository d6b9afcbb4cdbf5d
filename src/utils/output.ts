/**
 * Output Formatter Module
 * Report output in CSV, JSON or table form.
 */

import Table from 'cli-table3';

export type OutputFormat = 'csv' | 'json' | 'table';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'json', 'table'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition
 */
export interface ColumnDef<T> {
  key: keyof T & string;
  label: string;
  format?: (value: T[keyof T & string], row: T) => string;
}

function cellValue<T>(row: T, col: ColumnDef<T>): string {
  const value = row[col.key];
  if (col.format) {
    return col.format(value, row);
  }
  return value === null || value === undefined ? '' : String(value);
}

export function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCSVHeader<T>(columns: ColumnDef<T>[]): string {
  return columns.map((col) => escapeCSV(col.label)).join(',');
}

export function formatCSVRow<T>(row: T, columns: ColumnDef<T>[]): string {
  return columns.map((col) => escapeCSV(cellValue(row, col))).join(',');
}

export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatTable<T>(data: T[], columns: ColumnDef<T>[]): string {
  const table = new Table({
    head: columns.map((col) => col.label),
    style: { head: ['cyan'] },
  });

  for (const row of data) {
    table.push(columns.map((col) => cellValue(row, col)));
  }

  return table.toString();
}

/**
 * Writes report rows as they arrive. CSV streams line by line; JSON and
 * table need every row and are written on `end()`.
 */
export class ReportWriter<T> {
  private format: OutputFormat;
  private columns: ColumnDef<T>[];
  private write: (text: string) => void;
  private rows: T[] = [];
  private headerWritten = false;

  constructor(
    format: OutputFormat,
    columns: ColumnDef<T>[],
    write: (text: string) => void = (text) => process.stdout.write(text)
  ) {
    this.format = format;
    this.columns = columns;
    this.write = write;
  }

  push(row: T): void {
    if (this.format !== 'csv') {
      this.rows.push(row);
      return;
    }
    this.writeHeader();
    this.write(formatCSVRow(row, this.columns) + '\n');
  }

  end(): void {
    switch (this.format) {
      case 'csv':
        this.writeHeader();
        break;
      case 'json':
        this.write(formatJSON(this.rows) + '\n');
        break;
      case 'table':
        if (this.rows.length > 0) {
          this.write(formatTable(this.rows, this.columns) + '\n');
        }
        break;
    }
  }

  private writeHeader(): void {
    if (this.headerWritten) return;
    this.headerWritten = true;
    this.write(formatCSVHeader(this.columns) + '\n');
  }
}
