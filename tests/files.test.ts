import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FatalRunError } from '../src/utils/errors.js';
import { readLineList, writeLineList } from '../src/utils/files.js';

describe('line lists', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'ssm-files-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('readLineList', () => {
    it('should report a missing file as not found', async () => {
      const path = join(workDir, 'missing.txt');

      const read = readLineList(path);

      await expect(read).rejects.toBeInstanceOf(FatalRunError);
      await expect(read).rejects.toThrow(`Input file '${path}' not found`);
    });

    it('should report a directory as unreadable', async () => {
      await expect(readLineList(workDir)).rejects.toThrow(`Could not read input file '${workDir}': `);
    });

    it.each([
      ['LF', 'A\nB\n'],
      ['CRLF', 'A\r\nB\r\n'],
      ['bare CR', 'A\rB\r'],
      ['mixed', 'A\r\n\rB\n'],
    ])('should split %s line endings', async (_label, text) => {
      const path = join(workDir, 'in.txt');
      writeFileSync(path, text, 'utf8');

      await expect(readLineList(path)).resolves.toEqual(['A', 'B']);
    });
  });

  describe('writeLineList', () => {
    it('should newline-terminate every entry', async () => {
      const path = join(workDir, 'out.txt');

      await writeLineList(path, ['A', 'B']);

      expect(readFileSync(path, 'utf8')).toBe('A\nB\n');
    });
  });
});
