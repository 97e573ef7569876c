import { randomBytes } from 'crypto';

/**
 * Generate a file stem for a new recording: base-36 timestamp followed by
 * 8 random hex characters, e.g. `m2g7x1k0a3f91c2d`.
 */
export function generateFilename(now: number = Date.now()): string {
  return `${now.toString(36)}${randomBytes(4).toString('hex')}`;
}
