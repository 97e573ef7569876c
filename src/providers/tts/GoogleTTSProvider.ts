/**
 * Google Translate TTS Provider
 *
 * Uses the public Google Translate speech endpoint via google-tts-api.
 * No credentials needed. The endpoint only accepts 200 characters per
 * request, so longer texts are split and the MP3 chunks concatenated.
 */

import { getAllAudioBase64 } from 'google-tts-api';
import type { AudioFormat, ITTSProvider, SynthesizeOptions } from './ITTSProvider';

export type FetchAudio = typeof getAllAudioBase64;

export interface GoogleTTSProviderOptions {
  host?: string;
  timeoutMs?: number;
  /** Chunked download of the speech audio; defaults to google-tts-api's. */
  fetchAudio?: FetchAudio;
}

export class GoogleTTSProvider implements ITTSProvider {
  readonly name = 'google';
  readonly format: AudioFormat = { extension: 'mp3', contentType: 'audio/mpeg' };
  private host: string;
  private timeoutMs: number;
  private fetchAudio: FetchAudio;

  constructor(options: GoogleTTSProviderOptions = {}) {
    this.host = options.host ?? 'https://translate.google.com';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchAudio = options.fetchAudio ?? getAllAudioBase64;
  }

  async synthesize(text: string, options: SynthesizeOptions): Promise<Buffer> {
    const chunks = await this.fetchAudio(text, {
      // Google expects the primary subtag only, e.g. 'pt' for 'pt-BR'
      lang: options.language.split('-')[0],
      slow: options.speed !== undefined && options.speed < 1,
      host: this.host,
      timeout: this.timeoutMs,
      splitPunct: ',.?!;:'
    });

    return Buffer.concat(chunks.map((chunk) => Buffer.from(chunk.base64, 'base64')));
  }
}
