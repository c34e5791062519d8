import * as fs from 'node:fs';
import * as path from 'node:path';
import { PersistenceFailure, errorMessage } from '../errors.js';
import type { TaxonomyCode } from '../types.js';
import { formatCsvRow, parseCsv } from './csv.js';

export interface TableHandle {
  readonly code: TaxonomyCode;
  readonly filePath: string;
  /** Rows appended through this handle. */
  rows: number;
  fd: number | null;
}

export interface TableRow {
  message: string;
  code: string;
}

/**
 * Append-only per-code tables under one dataset directory.
 * `open` never truncates, so a resumed run adds to earlier output.
 */
export class DatasetStore {
  constructor(readonly dir: string) {}

  pathFor(code: TaxonomyCode): string {
    if (!code || code === '.' || code === '..' || /[/\\]/.test(code)) {
      throw new PersistenceFailure(`Code "${code}" cannot be used as a table name`, null);
    }
    return path.join(this.dir, `${code}.csv`);
  }

  open(code: TaxonomyCode): TableHandle {
    const filePath = this.pathFor(code);
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      const fd = fs.openSync(filePath, 'a');
      return { code, filePath, rows: 0, fd };
    } catch (err) {
      throw new PersistenceFailure(`Cannot open table ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
    }
  }

  append(handle: TableHandle, message: string): void {
    if (handle.fd === null) {
      throw new PersistenceFailure(`Table ${handle.filePath} is closed`, handle.filePath);
    }
    const line = Buffer.from(formatCsvRow([message, handle.code]) + '\n', 'utf-8');
    try {
      writeFully(handle.fd, line);
    } catch (err) {
      throw new PersistenceFailure(`Cannot write to table ${handle.filePath}: ${errorMessage(err)}`, handle.filePath, { cause: err });
    }
    handle.rows++;
  }

  close(handle: TableHandle): void {
    if (handle.fd === null) return;
    const fd = handle.fd;
    handle.fd = null;
    try {
      fs.fsyncSync(fd);
    } catch (err) {
      fs.closeSync(fd);
      throw new PersistenceFailure(`Cannot flush table ${handle.filePath}: ${errorMessage(err)}`, handle.filePath, { cause: err });
    }
    try {
      fs.closeSync(fd);
    } catch (err) {
      throw new PersistenceFailure(`Cannot close table ${handle.filePath}: ${errorMessage(err)}`, handle.filePath, { cause: err });
    }
  }

  /** Codes that have a table in this directory, sorted by name. */
  listCodes(): string[] {
    if (!fs.existsSync(this.dir)) return [];
    return fs.readdirSync(this.dir)
      .filter(f => f.endsWith('.csv'))
      .map(f => f.slice(0, -'.csv'.length))
      .sort();
  }
}

export type WriteFn = (fd: number, data: Uint8Array, offset: number, length: number) => number;

/** Write the whole buffer, continuing after short writes. */
export function writeFully(fd: number, data: Uint8Array, write: WriteFn = fs.writeSync): void {
  let offset = 0;
  while (offset < data.length) {
    const written = write(fd, data, offset, data.length - offset);
    if (written <= 0) {
      throw new Error(`Write made no progress after ${offset} of ${data.length} byte(s)`);
    }
    offset += written;
  }
}

/** Read a table back. A missing file reads as no rows. */
export function readTable(filePath: string): TableRow[] {
  if (!fs.existsSync(filePath)) return [];
  const text = fs.readFileSync(filePath, 'utf-8');
  return parseCsv(text).map(([message = '', code = '']) => ({ message, code }));
}

export function countRows(filePath: string): number {
  return readTable(filePath).length;
}
