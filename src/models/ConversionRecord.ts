import { z } from 'zod';
import {
  FILENAME_PATTERN,
  LANGUAGE_PATTERN,
  MAX_FILENAME_LENGTH,
  MIN_FILENAME_LENGTH
} from '../config/constants';

const filenameSchema = z
  .string()
  .trim()
  .min(MIN_FILENAME_LENGTH, `Filename must be at least ${MIN_FILENAME_LENGTH} characters`)
  .max(MAX_FILENAME_LENGTH, `Filename must be at most ${MAX_FILENAME_LENGTH} characters`)
  .regex(FILENAME_PATTERN, 'Filename may only contain letters, digits, "_" and "-"');

const languageSchema = z
  .string()
  .trim()
  .regex(LANGUAGE_PATTERN, 'Language must be a code such as "en" or "pt-BR"');

// CSV cells are always strings; an empty audio_path means "not synthesized yet"
export const ConversionRecordSchema = z.object({
  id: z.coerce.number().int().positive(),
  text: z.string().min(1),
  language: languageSchema,
  filename: filenameSchema,
  audio_path: z.preprocess((value) => (value === '' ? null : value), z.string().min(1).nullable()),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime()
});

export type ConversionRecord = z.infer<typeof ConversionRecordSchema>;

export type ConversionDraft = Pick<ConversionRecord, 'text' | 'language' | 'filename' | 'audio_path'>;

export type ConversionChanges = Partial<Pick<ConversionRecord, 'text' | 'language' | 'audio_path'>>;

export function createConversionSchema(textMaxLength: number) {
  return z.object({
    text: z
      .string({ required_error: 'Text is required', invalid_type_error: 'Text must be a string' })
      .trim()
      .min(1, 'Text must not be empty')
      .max(textMaxLength, `Text must be at most ${textMaxLength} characters`),
    language: z.preprocess((value) => (value === '' || value === null ? undefined : value), languageSchema.optional()),
    filename: z.preprocess((value) => (value === '' || value === null ? undefined : value), filenameSchema.optional())
  });
}

export function updateConversionSchema(textMaxLength: number) {
  return createConversionSchema(textMaxLength)
    .omit({ filename: true })
    .partial({ text: true })
    .refine((input) => input.text !== undefined || input.language !== undefined, {
      message: 'Provide text or language to update'
    });
}

export type CreateConversionInput = z.infer<ReturnType<typeof createConversionSchema>>;
export type UpdateConversionInput = z.infer<ReturnType<typeof updateConversionSchema>>;
