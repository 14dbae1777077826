import fs from 'fs/promises';
import path from 'path';

/**
 * File helpers for run outputs
 *
 * Writes go through a temporary sibling file and a rename so a crashed
 * run never leaves a half-written metrics file behind.
 */

export async function atomicWrite(filePath: string, data: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = path.join(path.dirname(filePath), `.${path.basename(filePath)}.partial`);
  await fs.writeFile(tmp, data, 'utf-8');
  await fs.rename(tmp, filePath);
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await atomicWrite(filePath, JSON.stringify(value, null, 2) + '\n');
}

export async function writeJsonl(filePath: string, records: readonly unknown[]): Promise<void> {
  await atomicWrite(filePath, records.map((record) => JSON.stringify(record)).join('\n') + (records.length ? '\n' : ''));
}

/**
 * Parse JSON Lines; blank lines are skipped. Throws with the 1-based
 * line number of the first bad line.
 */
export function parseJsonl(content: string): unknown[] {
  const records: unknown[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) {
      return;
    }
    try {
      records.push(JSON.parse(line));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SyntaxError(`line ${index + 1}: ${reason}`);
    }
  });
  return records;
}

/**
 * Read a .json or .jsonl file. A .jsonl file yields an array of records.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8');
  if (filePath.endsWith('.jsonl')) {
    return parseJsonl(content);
  }
  return JSON.parse(content);
}
