import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseJsonl, readJsonFile, writeJson, writeJsonl } from './io.js';

describe('io', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sgdt-io-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('skips blank lines in JSON Lines', () => {
    expect(parseJsonl('{"a":1}\n\n{"a":2}\r\n')).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('reports the line of a bad record', () => {
    expect(() => parseJsonl('{"a":1}\n{oops}\n')).toThrow(/^line 2: /);
  });

  it('writes pretty JSON into missing directories', async () => {
    const file = path.join(dir, 'nested', 'metrics.json');
    await writeJson(file, { score: 1 });
    expect(await fs.readFile(file, 'utf-8')).toBe('{\n  "score": 1\n}\n');
    expect(await fs.readdir(path.join(dir, 'nested'))).toEqual(['metrics.json']);
  });

  it('writes and reads JSON Lines', async () => {
    const file = path.join(dir, 'per_sample.jsonl');
    await writeJsonl(file, [{ id: 1 }, { id: 2 }]);
    expect(await fs.readFile(file, 'utf-8')).toBe('{"id":1}\n{"id":2}\n');
    expect(await readJsonFile(file)).toEqual([{ id: 1 }, { id: 2 }]);
  });
});
