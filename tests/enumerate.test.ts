import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { NotFoundError } from '../src/errors';
import { log } from '../src/logger';
import { collectFiles, enumerateFiles, naturalSort, normalizeExtension } from '../src/pipeline/enumerate';
import { makeTempDir, removeTempDir } from './helpers';

describe('enumerateFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await mkdir(join(root, 'sub'));
    await mkdir(join(root, 'empty'));
    for (const name of ['b.pdf', 'a.PDF', 'notes.txt', 'page10.pdf', 'page2.pdf', join('sub', 'c.pdf')]) {
      await writeFile(join(root, name), 'x');
    }
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('walks recursively in natural order, matching the extension case-insensitively', async () => {
    const files = await collectFiles(await enumerateFiles(root, { extension: '.pdf', recursive: true }));
    expect(files).toEqual([
      join(root, 'a.PDF'),
      join(root, 'b.pdf'),
      join(root, 'page2.pdf'),
      join(root, 'page10.pdf'),
      join(root, 'sub', 'c.pdf'),
    ]);
  });

  it('stays in the top folder when not recursive', async () => {
    const files = await collectFiles(await enumerateFiles(root, { extension: 'pdf', recursive: false }));
    expect(files).toEqual([
      join(root, 'a.PDF'),
      join(root, 'b.pdf'),
      join(root, 'page2.pdf'),
      join(root, 'page10.pdf'),
    ]);
  });

  it('yields nothing for an empty directory', async () => {
    const files = await collectFiles(
      await enumerateFiles(join(root, 'empty'), { extension: '.pdf', recursive: true })
    );
    expect(files).toEqual([]);
  });

  it('can be iterated again and sees files added since', async () => {
    const sequence = await enumerateFiles(join(root, 'sub'), { extension: '.pdf', recursive: true });
    expect(await collectFiles(sequence)).toEqual([join(root, 'sub', 'c.pdf')]);

    await writeFile(join(root, 'sub', 'd.pdf'), 'x');
    expect(await collectFiles(sequence)).toEqual([
      join(root, 'sub', 'c.pdf'),
      join(root, 'sub', 'd.pdf'),
    ]);
  });

  it('skips a subfolder that cannot be read and keeps walking', async () => {
    const top = join(root, 'walk');
    const locked = join(top, 'locked');
    await mkdir(locked, { recursive: true });
    for (const name of ['a.pdf', join('locked', 'inner.pdf'), 'z.pdf']) {
      await writeFile(join(top, name), 'x');
    }
    const warn = jest.spyOn(log, 'warn');

    const iterator = (await enumerateFiles(top, { extension: '.pdf', recursive: true }))[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ done: false, value: join(top, 'a.pdf') });

    await rm(locked, { recursive: true });
    const rest: string[] = [];
    for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
      rest.push(next.value);
    }

    expect(rest).toEqual([join(top, 'z.pdf')]);
    expect(warn).toHaveBeenCalledWith(expect.objectContaining({ dir: locked }), 'skipping unreadable folder');
    warn.mockRestore();
  });

  it('rejects a missing root with NotFoundError', async () => {
    await expect(
      enumerateFiles(join(root, 'missing'), { extension: '.pdf', recursive: true })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects a root that is a file', async () => {
    await expect(
      enumerateFiles(join(root, 'b.pdf'), { extension: '.pdf', recursive: true })
    ).rejects.toThrow(`Input path is not a directory: ${join(root, 'b.pdf')}`);
  });
});

describe('naturalSort', () => {
  it('orders numbers by value', () => {
    expect(['page10', 'page2', 'page1'].sort(naturalSort)).toEqual(['page1', 'page2', 'page10']);
  });

  it('breaks case-only ties deterministically', () => {
    expect(['a.pdf', 'A.pdf'].sort(naturalSort)).toEqual(['A.pdf', 'a.pdf']);
  });
});

describe('normalizeExtension', () => {
  it('adds the dot and lowercases', () => {
    expect(normalizeExtension('PDF')).toBe('.pdf');
    expect(normalizeExtension('.Pdf')).toBe('.pdf');
  });
});
