import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import type { ProviderRegistry } from '../providers/ProviderRegistry';
import type { ITTSProvider } from '../providers/tts/ITTSProvider';
import { SynthesisFailure } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'SynthesisService' });

export interface SynthesisServiceOptions {
  registry: ProviderRegistry;
  providerName: string;
  mediaRoot: string;
  voiceDir: string;
  speed?: number;
}

/**
 * Turns text into an audio file under `<mediaRoot>/<voiceDir>/`.
 *
 * Paths handed out are relative to the media root (`voice/abc123.mp3`) so
 * they can be stored as-is and served under the media URL prefix.
 */
export class SynthesisService {
  private readonly registry: ProviderRegistry;
  private readonly providerName: string;
  private readonly mediaRoot: string;
  private readonly voiceDir: string;
  private readonly speed: number | undefined;

  constructor(options: SynthesisServiceOptions) {
    this.registry = options.registry;
    this.providerName = options.providerName;
    this.mediaRoot = path.resolve(options.mediaRoot);
    this.voiceDir = options.voiceDir;
    this.speed = options.speed;
  }

  /**
   * Synthesize `text` and store it as `<voiceDir>/<filename>.<ext>`, replacing
   * any file already there. Nothing is written unless the provider returned
   * non-empty audio.
   *
   * @returns the audio path relative to the media root
   * @throws SynthesisFailure wrapping whatever went wrong
   */
  async synthesize(text: string, language: string, filename: string): Promise<string> {
    let provider: ITTSProvider;
    try {
      provider = this.registry.getTTS(this.providerName);
    } catch (error) {
      throw new SynthesisFailure('No text-to-speech provider available', error);
    }

    const startedAt = Date.now();
    let audio: Buffer;
    try {
      audio = await provider.synthesize(text, { language, speed: this.speed });
    } catch (error) {
      logger.error({ err: error, provider: provider.name, filename, language }, 'Speech synthesis failed');
      throw new SynthesisFailure(`Speech synthesis failed (${provider.name})`, error);
    }

    if (audio.length === 0) {
      logger.error({ provider: provider.name, filename, language }, 'Provider returned empty audio');
      throw new SynthesisFailure(`Speech synthesis returned no audio (${provider.name})`);
    }

    const audioPath = path.posix.join(this.voiceDir, `${filename}.${provider.format.extension}`);
    await this.writeAtomically(this.resolve(audioPath), audio);

    logger.info(
      {
        provider: provider.name,
        filename,
        language,
        bytes: audio.length,
        durationMs: Date.now() - startedAt
      },
      'Audio file written'
    );
    return audioPath;
  }

  /**
   * Absolute path of a stored audio path.
   * @throws Error if the path escapes the media root
   */
  resolve(audioPath: string): string {
    const absolute = path.resolve(this.mediaRoot, audioPath);
    if (!absolute.startsWith(this.mediaRoot + path.sep)) {
      throw new Error(`Audio path '${audioPath}' is outside the media root`);
    }
    return absolute;
  }

  async exists(audioPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(audioPath));
      return stats.isFile();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Remove a file written by `synthesize` whose record was never saved.
   */
  async discard(audioPath: string): Promise<void> {
    await fs.rm(this.resolve(audioPath), { force: true });
    logger.info({ audioPath }, 'Audio file discarded');
  }

  private async writeAtomically(target: string, audio: Buffer): Promise<void> {
    const tmpPath = `${target}.${randomBytes(4).toString('hex')}.tmp`;
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(tmpPath, audio);
      await fs.rename(tmpPath, target);
    } catch (error) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn({ err: cleanupError, tmpPath }, 'Failed to remove temporary audio file');
      });
      throw new SynthesisFailure('Failed to store synthesized audio', error);
    }
  }
}
