/**
 * Text-to-Speech Provider Interface
 *
 * Abstraction for TTS services like Google Translate TTS, OpenAI TTS, Coqui TTS, etc.
 */

export interface SynthesizeOptions {
  /** Language code, e.g. 'en', 'ru', 'pt-BR' */
  language: string;
  voice?: string;
  speed?: number;
}

export interface AudioFormat {
  /** File extension without the dot */
  extension: string;
  contentType: string;
}

export interface ITTSProvider {
  /**
   * Provider name for logging/debugging
   */
  readonly name: string;

  /**
   * Format of the bytes returned by synthesize()
   */
  readonly format: AudioFormat;

  /**
   * Synthesize text to audio
   * @param text - Text to convert to speech
   * @param options - Synthesis options (language, voice, speed)
   * @returns Audio data as Buffer
   */
  synthesize(text: string, options: SynthesizeOptions): Promise<Buffer>;
}
