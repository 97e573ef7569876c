import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import lockfile from 'proper-lockfile';
import { z } from 'zod';
import {
  ConversionChanges,
  ConversionDraft,
  ConversionRecord,
  ConversionRecordSchema
} from '../models/ConversionRecord';
import { DuplicateFilenameError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { ConversionRepository } from './ConversionRepository';

const logger = createLogger({ service: 'CsvConversionRepository' });

// Deleted rows stay in the file as tombstones (deleted_at set) so ids are
// never handed out twice and filenames stay reserved.
const StoredConversionSchema = ConversionRecordSchema.extend({
  deleted_at: z.preprocess(
    (value) => (value === '' || value === undefined ? null : value),
    z.string().datetime().nullable()
  )
});

type StoredConversion = z.infer<typeof StoredConversionSchema>;

const COLUMNS: Array<keyof StoredConversion> = [
  'id',
  'text',
  'language',
  'filename',
  'audio_path',
  'created_at',
  'updated_at',
  'deleted_at'
];

export interface CsvConversionRepositoryOptions {
  filePath: string;
  lockTimeoutMs?: number;
  now?: () => Date;
}

export function compareNewestFirst(a: ConversionRecord, b: ConversionRecord): number {
  if (a.created_at !== b.created_at) {
    return a.created_at < b.created_at ? 1 : -1;
  }
  return b.id - a.id;
}

function toRecord(row: StoredConversion): ConversionRecord {
  const { deleted_at: _deletedAt, ...record } = row;
  return record;
}

function isLive(row: StoredConversion): boolean {
  return row.deleted_at === null;
}

/**
 * A filename is taken by any live row, and by any deleted row whose audio
 * was written (the file outlives the record). A row removed before its
 * audio existed, i.e. a rolled-back creation, releases the name.
 */
function reservesFilename(row: StoredConversion): boolean {
  return isLive(row) || row.audio_path !== null;
}

/**
 * Conversion records kept in a single CSV file.
 *
 * Every mutation holds a proper-lockfile lock for the whole read-modify-write,
 * so id assignment and the filename check cannot interleave with another
 * writer, including one in a different process.
 */
export class CsvConversionRepository implements ConversionRepository {
  private readonly filePath: string;
  private readonly lockTimeoutMs: number;
  private readonly now: () => Date;

  constructor(options: CsvConversionRepositoryOptions) {
    this.filePath = options.filePath;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
    this.now = options.now ?? (() => new Date());
  }

  async insert(draft: ConversionDraft): Promise<ConversionRecord> {
    return this.mutate((rows) => {
      if (rows.some((r) => r.filename === draft.filename && reservesFilename(r))) {
        throw new DuplicateFilenameError(draft.filename);
      }

      const timestamp = this.now().toISOString();
      const row: StoredConversion = {
        // tombstones count, so ids only grow
        id: rows.reduce((max, r) => Math.max(max, r.id), 0) + 1,
        ...draft,
        created_at: timestamp,
        updated_at: timestamp,
        deleted_at: null
      };

      rows.push(row);
      logger.debug({ id: row.id, filename: row.filename }, 'Conversion row inserted');
      return toRecord(row);
    });
  }

  async findById(id: number): Promise<ConversionRecord | undefined> {
    const rows = await this.readAll();
    const row = rows.find((r) => r.id === id && isLive(r));
    return row ? toRecord(row) : undefined;
  }

  async findByFilename(filename: string): Promise<ConversionRecord | undefined> {
    const rows = await this.readAll();
    const row = rows.find((r) => r.filename === filename && isLive(r));
    return row ? toRecord(row) : undefined;
  }

  async list(): Promise<ConversionRecord[]> {
    const rows = await this.readAll();
    return rows.filter(isLive).map(toRecord).sort(compareNewestFirst);
  }

  async update(id: number, changes: ConversionChanges): Promise<ConversionRecord | undefined> {
    return this.mutate((rows) => {
      const index = rows.findIndex((r) => r.id === id && isLive(r));
      if (index === -1) {
        return undefined;
      }

      const updated: StoredConversion = {
        ...rows[index],
        ...changes,
        updated_at: this.now().toISOString()
      };
      rows[index] = updated;
      return toRecord(updated);
    });
  }

  async delete(id: number): Promise<boolean> {
    return this.mutate((rows) => {
      const row = rows.find((r) => r.id === id && isLive(r));
      if (!row) {
        return false;
      }
      row.deleted_at = this.now().toISOString();
      return true;
    });
  }

  private async readAll(): Promise<StoredConversion[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const rows = parse(content, {
      columns: true,
      skip_empty_lines: true
    }) as unknown[];

    return rows.map((row) => StoredConversionSchema.parse(row));
  }

  private async writeAll(rows: StoredConversion[]): Promise<void> {
    const csv = stringify(
      rows.map((r) => ({ ...r, audio_path: r.audio_path ?? '', deleted_at: r.deleted_at ?? '' })),
      { header: true, columns: COLUMNS }
    );

    // Write beside the target and rename so readers never see a half-written file
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, csv, 'utf-8');
    await fs.rename(tmpPath, this.filePath);
    logger.debug({ filePath: this.filePath, rowCount: rows.length }, 'CSV file written');
  }

  /**
   * Run `fn` against the current rows under the file lock; the rows are
   * written back only if `fn` returns without throwing.
   */
  private async mutate<T>(fn: (rows: StoredConversion[]) => T): Promise<T> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    let release: (() => Promise<void>) | undefined;

    try {
      // Acquire lock
      release = await lockfile.lock(this.filePath, {
        realpath: false,
        retries: {
          retries: 10,
          minTimeout: 20,
          maxTimeout: this.lockTimeoutMs
        },
        stale: this.lockTimeoutMs
      });

      const rows = await this.readAll();
      const result = fn(rows);
      await this.writeAll(rows);
      return result;
    } finally {
      if (release) {
        await release();
      }
    }
  }
}
