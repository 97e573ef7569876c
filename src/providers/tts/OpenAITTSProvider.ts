/**
 * OpenAI TTS Provider
 *
 * Uses OpenAI TTS API for text-to-speech. The voice picks the speaker;
 * the language is inferred by the model from the text itself.
 */

import OpenAI from 'openai';
import type { SpeechCreateParams } from 'openai/resources/audio/speech';
import type { AudioFormat, ITTSProvider, SynthesizeOptions } from './ITTSProvider';

const VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

type OpenAIVoice = (typeof VOICES)[number];

function isOpenAIVoice(voice: string): voice is OpenAIVoice {
  return (VOICES as readonly string[]).includes(voice);
}

/** The part of the OpenAI client this provider calls. */
export interface SpeechClient {
  audio: {
    speech: {
      create(params: SpeechCreateParams): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
}

export interface OpenAITTSProviderOptions {
  apiKey: string;
  model?: string;
  defaultVoice?: string;
  timeoutMs?: number;
  client?: SpeechClient;
}

export class OpenAITTSProvider implements ITTSProvider {
  readonly name = 'openai';
  readonly format: AudioFormat = { extension: 'mp3', contentType: 'audio/mpeg' };
  private client: SpeechClient;
  private model: string;
  private defaultVoice: OpenAIVoice;

  constructor(options: OpenAITTSProviderOptions) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        // retries are the caller's decision, and the caller makes none
        maxRetries: 0
      });
    this.model = options.model ?? 'tts-1';
    this.defaultVoice =
      options.defaultVoice && isOpenAIVoice(options.defaultVoice) ? options.defaultVoice : 'alloy';
  }

  async synthesize(text: string, options: SynthesizeOptions): Promise<Buffer> {
    const voice = options.voice && isOpenAIVoice(options.voice) ? options.voice : this.defaultVoice;

    const mp3 = await this.client.audio.speech.create({
      model: this.model,
      voice,
      input: text,
      response_format: 'mp3',
      speed: options.speed ?? 1.0
    });

    return Buffer.from(await mp3.arrayBuffer());
  }
}
