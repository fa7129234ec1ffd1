/**
 * File access for the writer and the validators.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * How a write treats an existing file: `w` replaces it, `wx` refuses with
 * EEXIST.
 */
export type WriteFlag = 'w' | 'wx';

export interface WriteOptions {
  flag?: WriteFlag;
}

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write a UTF-8 file, creating its directory first.
 * With `flag: 'wx'` the existence check and the write are one operation.
 */
export async function writeFile(
  filePath: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, { encoding: 'utf-8', flag: options.flag ?? 'w' });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * True for the error a `wx` write raises when the file is already there.
 * A directory in the way (EEXIST from mkdir) does not count.
 */
export function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error &&
    'code' in error && error.code === 'EEXIST' &&
    'syscall' in error && error.syscall === 'open';
}
