import { readFile, writeFile } from 'fs/promises';
import { errorCode, describeError, FatalRunError } from './errors.js';

/**
 * Reads a one-entry-per-line list, trimming each line and dropping blank ones.
 * A missing or unreadable file aborts the run.
 */
export async function readLineList(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new FatalRunError(`Input file '${path}' not found`);
    }
    throw new FatalRunError(`Could not read input file '${path}': ${describeError(error)}`);
  }

  return text
    .split(/\r\n|\r|\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Overwrites `path` with one entry per line, each newline-terminated. An empty
 * list leaves an empty file.
 */
export async function writeLineList(path: string, lines: readonly string[]): Promise<void> {
  try {
    await writeFile(path, lines.map(line => `${line}\n`).join(''), 'utf8');
  } catch (error) {
    throw new FatalRunError(`Could not write output file '${path}': ${describeError(error)}`);
  }
}
