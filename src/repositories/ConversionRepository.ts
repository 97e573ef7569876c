import type { ConversionChanges, ConversionDraft, ConversionRecord } from '../models/ConversionRecord';

/**
 * Durable keyed store for conversion records.
 *
 * `insert` must enforce filename uniqueness atomically with the write and
 * reject a taken filename with DuplicateFilenameError. Ids and filenames of
 * deleted records are not handed out again, except the filename of a record
 * deleted before it had audio.
 */
export interface ConversionRepository {
  insert(draft: ConversionDraft): Promise<ConversionRecord>;
  findById(id: number): Promise<ConversionRecord | undefined>;
  findByFilename(filename: string): Promise<ConversionRecord | undefined>;
  /** Newest first. */
  list(): Promise<ConversionRecord[]>;
  update(id: number, changes: ConversionChanges): Promise<ConversionRecord | undefined>;
  delete(id: number): Promise<boolean>;
}
