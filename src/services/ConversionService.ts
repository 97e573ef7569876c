import { setTimeout as delay } from 'timers/promises';
import type { ZodError } from 'zod';
import {
  ConversionRecord,
  UpdateConversionInput,
  createConversionSchema,
  updateConversionSchema
} from '../models/ConversionRecord';
import type { ConversionRepository } from '../repositories/ConversionRepository';
import { DuplicateFilenameError, NotFoundError, ValidationError } from '../utils/errors';
import { generateFilename } from '../utils/filename';
import { resolveLanguage } from '../utils/language';
import { createLogger } from '../utils/logger';
import type { SynthesisService } from './SynthesisService';

const logger = createLogger({ service: 'ConversionService' });

const ROLLBACK_ATTEMPTS = 2;

export interface ConversionServiceOptions {
  repository: ConversionRepository;
  synthesis: SynthesisService;
  defaultLanguage: string;
  textMaxLength: number;
  filenameGenerator?: () => string;
  rollbackRetryDelayMs?: number;
}

export interface ConversionAudio {
  record: ConversionRecord;
  filePath: string;
}

function toValidationError(error: ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message
  }));
  return new ValidationError(issues.map((i) => i.message).join('; '), issues);
}

/**
 * Create/read/update/delete for conversion records.
 *
 * Creation is all-or-nothing: the row is inserted first (so the filename is
 * claimed), then synthesized; if synthesis or the final save fails, the file
 * is discarded and the row removed again.
 */
export class ConversionService {
  private readonly repository: ConversionRepository;
  private readonly synthesis: SynthesisService;
  private readonly defaultLanguage: string;
  private readonly createSchema: ReturnType<typeof createConversionSchema>;
  private readonly updateSchema: ReturnType<typeof updateConversionSchema>;
  private readonly filenameGenerator: () => string;
  private readonly rollbackRetryDelayMs: number;

  constructor(options: ConversionServiceOptions) {
    this.repository = options.repository;
    this.synthesis = options.synthesis;
    this.defaultLanguage = options.defaultLanguage;
    this.createSchema = createConversionSchema(options.textMaxLength);
    this.updateSchema = updateConversionSchema(options.textMaxLength);
    this.filenameGenerator = options.filenameGenerator ?? (() => generateFilename());
    this.rollbackRetryDelayMs = options.rollbackRetryDelayMs ?? 50;
  }

  async create(input: unknown): Promise<ConversionRecord> {
    const parsed = this.createSchema.safeParse(input);
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const { text, filename } = parsed.data;
    const language = resolveLanguage(text, parsed.data.language, this.defaultLanguage);

    const pending = await this.insertPending(text, language, filename);

    let audioPath: string | undefined;
    let record: ConversionRecord;
    try {
      audioPath = await this.synthesis.synthesize(text, language, pending.filename);
      const saved = await this.repository.update(pending.id, { audio_path: audioPath });
      if (!saved) {
        // Deleted by someone else while synthesizing
        throw new NotFoundError('Conversion', pending.id);
      }
      record = saved;
    } catch (error) {
      await this.rollback(pending, audioPath);
      throw error;
    }

    logger.info({ id: record.id, filename: record.filename, language }, 'Conversion created');
    return record;
  }

  async get(id: number): Promise<ConversionRecord> {
    const record = await this.repository.findById(id);
    if (!record) {
      throw new NotFoundError('Conversion', id);
    }
    return record;
  }

  async list(): Promise<ConversionRecord[]> {
    return this.repository.list();
  }

  /**
   * Change text and/or language and re-synthesize into the same filename.
   * The stored record is only touched once the new audio is on disk.
   */
  async update(id: number, input: unknown): Promise<ConversionRecord> {
    const parsed = this.updateSchema.safeParse(input);
    if (!parsed.success) {
      throw toValidationError(parsed.error);
    }

    const current = await this.get(id);
    const changes: UpdateConversionInput = parsed.data;
    const text = changes.text ?? current.text;
    const language = changes.language ?? (changes.text !== undefined
      ? resolveLanguage(text, undefined, this.defaultLanguage)
      : current.language);

    const audioPath = await this.synthesis.synthesize(text, language, current.filename);

    if (current.audio_path && current.audio_path !== audioPath) {
      logger.warn(
        { id, previous: current.audio_path, current: audioPath },
        'Previous audio file left in place after re-synthesis'
      );
    }

    const record = await this.repository.update(id, { text, language, audio_path: audioPath });
    if (!record) {
      throw new NotFoundError('Conversion', id);
    }

    logger.info({ id, filename: record.filename, language }, 'Conversion re-synthesized');
    return record;
  }

  /**
   * Remove the record. The audio file stays on disk.
   */
  async delete(id: number): Promise<void> {
    const deleted = await this.repository.delete(id);
    if (!deleted) {
      throw new NotFoundError('Conversion', id);
    }
    logger.info({ id }, 'Conversion deleted');
  }

  async getAudio(filename: string): Promise<ConversionAudio> {
    const record = await this.repository.findByFilename(filename);
    if (!record || !record.audio_path) {
      throw new NotFoundError('Conversion', filename);
    }

    if (!(await this.synthesis.exists(record.audio_path))) {
      logger.error({ id: record.id, audioPath: record.audio_path }, 'Audio file missing on disk');
      throw new NotFoundError('Audio file', record.audio_path);
    }

    return { record, filePath: this.synthesis.resolve(record.audio_path) };
  }

  /**
   * Undo a half-finished creation: discard the written file, if any, then
   * remove the row, trying twice. A row that cannot be removed stays
   * without audio.
   */
  private async rollback(pending: ConversionRecord, audioPath: string | undefined): Promise<void> {
    const context = { id: pending.id, filename: pending.filename };

    if (audioPath) {
      try {
        await this.synthesis.discard(audioPath);
      } catch (error) {
        logger.error({ ...context, err: error, audioPath }, 'Failed to discard audio of rolled back conversion');
      }
    }

    for (let attempt = 1; attempt <= ROLLBACK_ATTEMPTS; attempt += 1) {
      try {
        await this.repository.delete(pending.id);
        logger.warn(context, 'Conversion rolled back');
        return;
      } catch (error) {
        logger.error({ ...context, err: error, attempt }, 'Failed to remove conversion during rollback');
        if (attempt < ROLLBACK_ATTEMPTS) {
          await delay(this.rollbackRetryDelayMs);
        }
      }
    }
  }

  /**
   * Insert the row without audio. A generated filename that collides is
   * regenerated once; an explicit one is reported as a conflict.
   */
  private async insertPending(
    text: string,
    language: string,
    requestedFilename: string | undefined
  ): Promise<ConversionRecord> {
    const draft = { text, language, audio_path: null };

    if (requestedFilename) {
      return this.repository.insert({ ...draft, filename: requestedFilename });
    }

    const filename = this.filenameGenerator();
    try {
      return await this.repository.insert({ ...draft, filename });
    } catch (error) {
      if (!(error instanceof DuplicateFilenameError)) {
        throw error;
      }
      logger.warn({ filename }, 'Generated filename collided, regenerating');
      return this.repository.insert({ ...draft, filename: this.filenameGenerator() });
    }
  }
}
