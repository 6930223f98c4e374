import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LibraryUploader, UNSORTED_DIR } from '../adapters/library-uploader.js';
import { LocalFolderSource } from '../adapters/local-folder-source.js';
import { PermanentError } from '../errors.js';
import { makeTempDir } from './helpers.js';

describe('LibraryUploader', () => {
  let dir: string;
  let library: string;
  let uploader: LibraryUploader;

  beforeEach(async () => {
    dir = await makeTempDir();
    library = path.join(dir, 'library');
    uploader = new LibraryUploader(library);
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should copy into every album directory and return the first copy', async () => {
    const file = path.join(dir, 'a.jpg');
    await fs.writeFile(file, 'photo');

    const remoteId = await uploader.upload(file, ['Family', 'Trip']);

    expect(remoteId).toBe('Family/a.jpg');
    expect(await fs.readFile(path.join(library, 'Trip', 'a.jpg'), 'utf8')).toBe('photo');
  });

  it('should file media without albums as unsorted', async () => {
    const file = path.join(dir, 'a.jpg');
    await fs.writeFile(file, 'photo');

    expect(await uploader.upload(file, [])).toBe(`${UNSORTED_DIR}/a.jpg`);
  });

  it('should reuse an identical copy and rename a different one', async () => {
    const first = path.join(dir, 'one', 'a.jpg');
    const second = path.join(dir, 'two', 'a.jpg');
    await fs.outputFile(first, 'photo one');
    await fs.outputFile(second, 'photo two');

    expect(await uploader.upload(first, ['Family'])).toBe('Family/a.jpg');
    expect(await uploader.upload(first, ['Family'])).toBe('Family/a.jpg');
    expect(await uploader.upload(second, ['Family'])).toBe('Family/a (1).jpg');
  });

  it('should list album directories but not the unsorted one', async () => {
    await fs.ensureDir(path.join(library, 'Family'));
    await fs.ensureDir(path.join(library, UNSORTED_DIR));

    expect(await uploader.listAlbums()).toEqual(['Family']);
  });
});

describe('LocalFolderSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should list zips recursively with posix ids', async () => {
    const source = path.join(dir, 'source');
    await fs.outputFile(path.join(source, 'b.zip'), 'bb');
    await fs.outputFile(path.join(source, 'part', 'a.zip'), 'a');
    await fs.outputFile(path.join(source, 'notes.txt'), 'ignored');

    const archives = await new LocalFolderSource(source).listAvailable();

    expect(archives).toEqual([
      { id: 'b.zip', name: 'b.zip', size: 2 },
      { id: 'part/a.zip', name: 'a.zip', size: 1 }
    ]);
  });

  it('should copy an archive into the destination', async () => {
    const source = path.join(dir, 'source');
    await fs.outputFile(path.join(source, 'part', 'a.zip'), 'zipbytes');

    const local = await new LocalFolderSource(source).fetch('part/a.zip', path.join(dir, 'zips'));

    expect(local).toBe(path.join(dir, 'zips', 'part__a.zip'));
    expect(await fs.readFile(local, 'utf8')).toBe('zipbytes');
  });

  it('should refuse ids outside the source and a missing source directory', async () => {
    const source = new LocalFolderSource(path.join(dir, 'missing'));

    await expect(source.listAvailable()).rejects.toBeInstanceOf(PermanentError);
    await expect(source.fetch('../escape.zip', dir)).rejects.toBeInstanceOf(PermanentError);
  });
});
