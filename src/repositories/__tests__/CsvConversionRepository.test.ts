import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import path from 'path';
import { afterEach, beforeEach, test } from 'node:test';
import { createTempDir } from '../../test/helpers';
import { DuplicateFilenameError } from '../../utils/errors';
import { CsvConversionRepository } from '../CsvConversionRepository';

let root: string;
let filePath: string;

function steppingClock(start: string): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
}

function draft(filename: string, text: string = 'Hello world') {
  return { text, language: 'en', filename, audio_path: null };
}

beforeEach(async () => {
  root = await createTempDir();
  filePath = path.join(root, 'data', 'conversions.csv');
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

test('insert assigns sequential ids and timestamps', async () => {
  const repo = new CsvConversionRepository({ filePath, now: steppingClock('2026-03-01T12:00:00.000Z') });

  const first = await repo.insert(draft('first01'));
  const second = await repo.insert(draft('second01'));

  assert.equal(first.id, 1);
  assert.equal(second.id, 2);
  assert.equal(first.created_at, '2026-03-01T12:00:00.000Z');
  assert.equal(first.updated_at, first.created_at);
  assert.equal(second.created_at, '2026-03-01T12:00:01.000Z');
  assert.equal(first.audio_path, null);
});

test('ids of deleted rows are never handed out again', async () => {
  const repo = new CsvConversionRepository({ filePath });
  await repo.insert(draft('first01'));
  const second = await repo.insert(draft('second01'));
  await repo.delete(second.id);

  const third = await repo.insert(draft('third01'));
  assert.equal(third.id, 3);
  assert.equal(await repo.findById(2), undefined);

  const reopened = new CsvConversionRepository({ filePath });
  await reopened.delete(third.id);
  const fourth = await reopened.insert(draft('fourth01'));
  assert.equal(fourth.id, 4);
});

test('insert rejects a filename that is already stored', async () => {
  const repo = new CsvConversionRepository({ filePath });
  await repo.insert(draft('taken01'));

  await assert.rejects(repo.insert(draft('taken01', 'Other text')), DuplicateFilenameError);
  assert.equal((await repo.list()).length, 1);
});

test('a deleted row keeps its filename reserved once its audio was written', async () => {
  const repo = new CsvConversionRepository({ filePath });
  const created = await repo.insert(draft('greeting'));
  await repo.update(created.id, { audio_path: 'voice/greeting.mp3' });
  await repo.delete(created.id);

  await assert.rejects(repo.insert(draft('greeting', 'Replacement')), DuplicateFilenameError);
  assert.deepEqual(await repo.list(), []);
});

test('a row deleted before it had audio releases its filename', async () => {
  const repo = new CsvConversionRepository({ filePath });
  const pending = await repo.insert(draft('pending01'));
  await repo.delete(pending.id);

  const again = await repo.insert(draft('pending01'));
  assert.equal(again.id, pending.id + 1);
  assert.equal(again.audio_path, null);
  assert.deepEqual((await repo.list()).map((r) => r.id), [again.id]);
});

test('deleted rows are neither updated nor deleted twice', async () => {
  const repo = new CsvConversionRepository({ filePath });
  const created = await repo.insert(draft('hello01'));
  await repo.delete(created.id);

  assert.equal(await repo.update(created.id, { text: 'Changed' }), undefined);
  assert.equal(await repo.delete(created.id), false);
});

test('list returns newest first, ties broken by id', async () => {
  const stepping = new CsvConversionRepository({ filePath, now: steppingClock('2026-03-01T12:00:00.000Z') });
  await stepping.insert(draft('aaaaa1'));
  await stepping.insert(draft('bbbbb2'));
  await stepping.insert(draft('ccccc3'));
  assert.deepEqual((await stepping.list()).map((r) => r.id), [3, 2, 1]);

  const fixedPath = path.join(root, 'fixed.csv');
  const fixed = new CsvConversionRepository({ filePath: fixedPath, now: () => new Date('2026-03-01T12:00:00.000Z') });
  await fixed.insert(draft('aaaaa1'));
  await fixed.insert(draft('bbbbb2'));
  assert.deepEqual((await fixed.list()).map((r) => r.id), [2, 1]);
});

test('update changes fields and bumps updated_at', async () => {
  const repo = new CsvConversionRepository({ filePath, now: steppingClock('2026-03-01T12:00:00.000Z') });
  const created = await repo.insert(draft('hello01'));

  const updated = await repo.update(created.id, { audio_path: 'voice/hello01.mp3', text: 'Changed' });

  assert.ok(updated);
  assert.equal(updated.audio_path, 'voice/hello01.mp3');
  assert.equal(updated.text, 'Changed');
  assert.equal(updated.filename, 'hello01');
  assert.equal(updated.created_at, '2026-03-01T12:00:00.000Z');
  assert.equal(updated.updated_at, '2026-03-01T12:00:01.000Z');
  assert.deepEqual(await repo.findById(created.id), updated);
});

test('update and delete report unknown ids', async () => {
  const repo = new CsvConversionRepository({ filePath });
  assert.equal(await repo.update(7, { text: 'x' }), undefined);
  assert.equal(await repo.delete(7), false);
});

test('delete hides the row from every lookup', async () => {
  const repo = new CsvConversionRepository({ filePath });
  const created = await repo.insert(draft('hello01'));

  assert.equal(await repo.delete(created.id), true);
  assert.equal(await repo.findById(created.id), undefined);
  assert.equal(await repo.findByFilename('hello01'), undefined);
  assert.deepEqual(await repo.list(), []);
  assert.equal(Object.hasOwn(created, 'deleted_at'), false);
});

test('a file written without a deleted_at column reads as live rows', async () => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(
    filePath,
    'id,text,language,filename,audio_path,created_at,updated_at\n' +
      '4,Hello,en,legacy01,voice/legacy01.mp3,2026-03-01T12:00:00.000Z,2026-03-01T12:00:00.000Z\n'
  );
  const repo = new CsvConversionRepository({ filePath });

  const found = await repo.findById(4);
  assert.ok(found);
  assert.equal(found.filename, 'legacy01');
  assert.equal((await repo.insert(draft('next01'))).id, 5);
});

test('a missing file reads as an empty store', async () => {
  const repo = new CsvConversionRepository({ filePath });
  assert.deepEqual(await repo.list(), []);
  assert.equal(await repo.findById(1), undefined);
});

test('rows survive a new repository instance, including awkward text', async () => {
  const text = 'Hello, "world"\nsecond line';
  const writer = new CsvConversionRepository({ filePath });
  const created = await writer.insert(draft('quoted01', text));
  await writer.update(created.id, { audio_path: 'voice/quoted01.mp3' });

  const reader = new CsvConversionRepository({ filePath });
  const found = await reader.findByFilename('quoted01');

  assert.ok(found);
  assert.equal(found.text, text);
  assert.equal(found.audio_path, 'voice/quoted01.mp3');
});

test('concurrent inserts get distinct ids', async () => {
  const repo = new CsvConversionRepository({ filePath });

  const records = await Promise.all(
    ['conc01', 'conc02', 'conc03', 'conc04', 'conc05'].map((name) => repo.insert(draft(name)))
  );

  assert.deepEqual(records.map((r) => r.id).sort((a, b) => a - b), [1, 2, 3, 4, 5]);
  assert.equal((await repo.list()).length, 5);
});
