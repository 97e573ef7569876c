import assert from 'node:assert/strict';
import { afterEach, beforeEach, test } from 'node:test';
import { CoquiTTSProvider } from '../tts/CoquiTTSProvider';

const originalFetch = globalThis.fetch;
let calls: string[];

beforeEach(() => {
  calls = [];
});

afterEach(() => {
  globalThis.fetch = originalFetch;
});

function stubFetch(response: () => Response): void {
  globalThis.fetch = async (input: string | URL | Request): Promise<Response> => {
    calls.push(String(input));
    return response();
  };
}

test('synthesize requests the configured speaker and language', async () => {
  stubFetch(() => new Response(new Uint8Array([82, 73, 70, 70]), { status: 200 }));
  const provider = new CoquiTTSProvider('http://tts.local:5002/', 'thorsten');

  const audio = await provider.synthesize('Hello world', { language: 'en' });

  assert.deepEqual(calls, ['http://tts.local:5002/api/tts?text=Hello+world&speaker_id=thorsten&language_id=en']);
  assert.equal(audio.toString('latin1'), 'RIFF');
});

test('an explicit voice overrides the default speaker', async () => {
  stubFetch(() => new Response(new Uint8Array([1]), { status: 200 }));
  const provider = new CoquiTTSProvider('http://tts.local:5002', 'thorsten');

  await provider.synthesize('Hallo', { language: 'de', voice: 'eva' });

  assert.deepEqual(calls, ['http://tts.local:5002/api/tts?text=Hallo&speaker_id=eva&language_id=de']);
});

test('server errors are reported with status and body', async () => {
  stubFetch(() => new Response('model not loaded', { status: 500, statusText: 'Internal Server Error' }));
  const provider = new CoquiTTSProvider('http://tts.local:5002');

  await assert.rejects(provider.synthesize('Hello', { language: 'en' }), {
    message: 'CoquiTTS API error: 500 Internal Server Error - model not loaded'
  });
});
