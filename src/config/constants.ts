export const CONVERSIONS_CSV_FILE = 'conversions.csv';

export const MEDIA_URL_PREFIX = '/media';

export const MIN_FILENAME_LENGTH = 5;
export const MAX_FILENAME_LENGTH = 20;

export const FILENAME_PATTERN = /^[A-Za-z0-9_-]+$/;
export const LANGUAGE_PATTERN = /^[a-z]{2,3}(-[A-Za-z]{2,4})?$/;

// Cyrillic and Cyrillic Supplement blocks
export const CYRILLIC_PATTERN = /[\u0400-\u04ff\u0500-\u052f]/;

export const CONTENT_TYPES: Record<string, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  ogg: 'audio/ogg'
};
