/**
 * Coqui TTS Provider
 *
 * Uses Coqui TTS Server for text-to-speech.
 * @see https://github.com/coqui-ai/TTS
 *
 * API: GET /api/tts?text=...&speaker_id=...&language_id=...
 */

import type { AudioFormat, ITTSProvider, SynthesizeOptions } from './ITTSProvider';

export class CoquiTTSProvider implements ITTSProvider {
  readonly name = 'coqui';
  readonly format: AudioFormat = { extension: 'wav', contentType: 'audio/wav' };
  private baseUrl: string;
  private defaultVoice: string;
  private timeoutMs: number;

  constructor(
    baseUrl: string = 'http://localhost:5002',
    defaultVoice: string = 'thorsten',
    timeoutMs: number = 10000
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultVoice = defaultVoice;
    this.timeoutMs = timeoutMs;
  }

  async synthesize(text: string, options: SynthesizeOptions): Promise<Buffer> {
    const params = new URLSearchParams({
      text,
      speaker_id: options.voice || this.defaultVoice,
      language_id: options.language
    });

    const response = await fetch(`${this.baseUrl}/api/tts?${params}`, {
      method: 'GET',
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`CoquiTTS API error: ${response.status} ${response.statusText} - ${errorText}`);
    }

    // Coqui returns WAV audio
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }
}
