import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { JsonRecordStore } from '../json-record-store.js';
import { CollaboratorUnavailableError, StateCorruptError } from '../../../utils/workflow-errors.js';
import { makeTempDir } from '../../../testUtils/workflow-fixtures.js';

interface Note {
  id: string;
  text: string;
}

const noteSchema: z.ZodType<Note> = z.object({ id: z.string(), text: z.string().min(1) });

describe('JsonRecordStore', () => {
  let dir: string;
  let filePath: string;
  let store: JsonRecordStore<Note>;

  beforeEach(async () => {
    dir = await makeTempDir('phase-state-store-');
    filePath = path.join(dir, 'nested', 'notes.json');
    store = new JsonRecordStore<Note>({
      filePath,
      schema: noteSchema,
      recordLabel: 'note',
      checkKey: (key, note) => (note.id === key ? null : `has id '${note.id}'`)
    });
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('treats a missing file as empty', async () => {
    await expect(store.get('a')).resolves.toBeUndefined();
    await expect(store.has('a')).resolves.toBe(false);
    await expect(store.keys()).resolves.toEqual([]);
  });

  it('creates the directory and persists records as a keyed JSON object', async () => {
    await store.put('a', { id: 'a', text: 'first' });
    await store.put('b', { id: 'b', text: 'second' });

    await expect(store.get('a')).resolves.toEqual({ id: 'a', text: 'first' });
    expect(await fs.readJson(filePath)).toEqual({
      a: { id: 'a', text: 'first' },
      b: { id: 'b', text: 'second' }
    });
  });

  it('stores a record under the key __proto__ as an ordinary entry', async () => {
    await store.put('__proto__', { id: '__proto__', text: 'odd branch name' });
    await store.put('a', { id: 'a', text: 'first' });

    await expect(store.get('__proto__')).resolves.toEqual({ id: '__proto__', text: 'odd branch name' });
    await expect(store.keys()).resolves.toEqual(['__proto__', 'a']);
    expect(await fs.readFile(filePath, 'utf-8')).toContain('"__proto__": {');
  });

  it('leaves no temporary files behind', async () => {
    await store.put('a', { id: 'a', text: 'first' });

    expect(await fs.readdir(path.dirname(filePath))).toEqual(['notes.json']);
  });

  it('applies concurrent writes without losing any', async () => {
    const ids = ['a', 'b', 'c', 'd', 'e', 'f'];
    await Promise.all(ids.map(id => store.put(id, { id, text: `note ${id}` })));

    expect((await store.keys()).sort()).toEqual(ids);
  });

  it('reports an unparseable file with its raw content and refuses to overwrite it', async () => {
    await fs.outputFile(filePath, '{"a": {"id": "a",');

    const read = store.get('a');
    await expect(read).rejects.toBeInstanceOf(StateCorruptError);
    await expect(read).rejects.toMatchObject({ rawContent: '{"a": {"id": "a",' });

    await expect(store.put('b', { id: 'b', text: 'second' })).rejects.toBeInstanceOf(StateCorruptError);
    expect(await fs.readFile(filePath, 'utf-8')).toBe('{"a": {"id": "a",');
  });

  it('rejects a top level that is not an object', async () => {
    await fs.outputFile(filePath, '[1, 2]');

    await expect(store.has('a')).rejects.toThrow(`Persisted state in ${filePath} is corrupt: top level must be a JSON object.`);
  });

  it('reports an invalid record without repairing it', async () => {
    await fs.outputJson(filePath, { a: { id: 'a', text: '' }, b: { id: 'b', text: 'fine' } });

    const read = store.get('a');
    await expect(read).rejects.toThrow(`Persisted state in ${filePath} is corrupt: note 'a' failed validation.`);
    await expect(read).rejects.toMatchObject({
      context: expect.objectContaining({ key: 'a', validationIssues: expect.any(Array) })
    });
    await expect(store.get('b')).resolves.toEqual({ id: 'b', text: 'fine' });
  });

  it('rejects a record stored under a key it does not match', async () => {
    await fs.outputJson(filePath, { a: { id: 'z', text: 'misfiled' } });

    await expect(store.get('a')).rejects.toThrow(`Persisted state in ${filePath} is corrupt: note 'a' has id 'z'.`);
  });

  it('preserves entries it cannot validate when writing other keys', async () => {
    const foreign = { id: 'x', text: '', extra: [1, 2, 3] };
    await fs.outputJson(filePath, { x: foreign });

    await store.put('a', { id: 'a', text: 'first' });

    expect(await fs.readJson(filePath)).toEqual({ x: foreign, a: { id: 'a', text: 'first' } });
  });

  it('treats an empty file as empty', async () => {
    await fs.outputFile(filePath, '\n');

    await expect(store.keys()).resolves.toEqual([]);
  });

  it('surfaces read failures other than a missing file as persistence unavailability', async () => {
    await fs.ensureDir(filePath);

    const read = store.get('a');
    await expect(read).rejects.toBeInstanceOf(CollaboratorUnavailableError);
    await expect(read).rejects.toMatchObject({ collaborator: 'persistence' });
  });
});
