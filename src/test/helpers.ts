import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ProviderRegistry } from '../providers/ProviderRegistry';
import type { AudioFormat, ITTSProvider, SynthesizeOptions } from '../providers/tts/ITTSProvider';
import { CsvConversionRepository } from '../repositories/CsvConversionRepository';
import { ConversionService } from '../services/ConversionService';
import { SynthesisService } from '../services/SynthesisService';

/**
 * In-process provider: records calls, returns `output` or throws `failWith`.
 */
export class FakeTTSProvider implements ITTSProvider {
  readonly name = 'fake';
  readonly format: AudioFormat = { extension: 'mp3', contentType: 'audio/mpeg' };
  calls: Array<{ text: string; options: SynthesizeOptions }> = [];
  output: Buffer = Buffer.from('ID3-fake-audio');
  failWith: Error | null = null;

  async synthesize(text: string, options: SynthesizeOptions): Promise<Buffer> {
    this.calls.push({ text, options });
    if (this.failWith) {
      throw this.failWith;
    }
    return this.output;
  }
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'speech-admin-'));
}

export async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

export interface Harness {
  root: string;
  mediaRoot: string;
  voiceDir: string;
  provider: FakeTTSProvider;
  registry: ProviderRegistry;
  repository: CsvConversionRepository;
  synthesis: SynthesisService;
  service: ConversionService;
  cleanup(): Promise<void>;
}

export interface HarnessOptions {
  filenameGenerator?: () => string;
  textMaxLength?: number;
  speed?: number;
  rollbackRetryDelayMs?: number;
}

export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const root = await createTempDir();
  const mediaRoot = path.join(root, 'media');
  const provider = new FakeTTSProvider();
  const registry = new ProviderRegistry();
  registry.registerTTS('fake', provider);

  const repository = new CsvConversionRepository({
    filePath: path.join(root, 'data', 'conversions.csv')
  });
  const synthesis = new SynthesisService({
    registry,
    providerName: 'fake',
    mediaRoot,
    voiceDir: 'voice',
    speed: options.speed
  });
  const service = new ConversionService({
    repository,
    synthesis,
    defaultLanguage: 'en',
    textMaxLength: options.textMaxLength ?? 700,
    filenameGenerator: options.filenameGenerator,
    rollbackRetryDelayMs: options.rollbackRetryDelayMs ?? 0
  });

  return {
    root,
    mediaRoot,
    voiceDir: path.join(mediaRoot, 'voice'),
    provider,
    registry,
    repository,
    synthesis,
    service,
    cleanup: () => fs.rm(root, { recursive: true, force: true })
  };
}

/**
 * Returns a generator that hands out `names` in order, then fails.
 */
export function sequence(names: string[]): () => string {
  let index = 0;
  return () => {
    const name = names[index];
    if (name === undefined) {
      throw new Error('filename sequence exhausted');
    }
    index += 1;
    return name;
  };
}
