import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import { errorCode } from './flow';

export async function exists(s: string, cb?: (s: Stats) => boolean) {
  try {
    const st = await fs.stat(s);
    return cb === undefined || cb(st);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return false; }
    throw e;
  }
}

export async function readJson(filename: string): Promise<unknown> {
  let text;
  try {
    text = await fs.readFile(filename, { encoding: 'utf-8' });
  } catch (e) {
    throw withCode(errorCode(e), new Error(`While reading ${filename}: ${e}`));
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new Error(`While parsing ${filename}: ${e}`);
  }
}

export async function writeJson(filename: string, obj: unknown) {
  await fs.mkdir(path.dirname(filename), { recursive: true });
  await fs.writeFile(filename, JSON.stringify(obj, undefined, 2) + '\n', { encoding: 'utf-8' });
}

/**
 * Find the nearest file with the given name, starting in the given directory and going up
 */
export async function findFileUp(filename: string, startDir: string): Promise<string | undefined> {
  let currentDir = path.resolve(startDir);
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await exists(fullPath, s => s.isFile())) {
      return fullPath;
    }

    const next = path.dirname(currentDir);
    if (next === currentDir) { return undefined; }
    currentDir = next;
  }
}

function withCode<E extends Error>(code: string | undefined, e: E): E {
  if (code !== undefined) {
    Object.defineProperty(e, 'code', { value: code, enumerable: true });
  }
  return e;
}
