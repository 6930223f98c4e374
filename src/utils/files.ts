import fs from 'fs-extra';
import path from 'node:path';
import crypto from 'node:crypto';
import { open } from 'node:fs/promises';

export const ensureDir = async (dir: string) => {
  await fs.ensureDir(dir);
  return dir;
};

export const streamHash = async (filePath: string, algorithm: string = 'sha256'): Promise<string> => {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath);
    stream.on('error', reject);
    hash.once('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
};

export const tempPath = (dir: string, filename: string): string => path.join(dir, `${filename}.part`);

/** Appends and syncs before resolving, so the bytes survive a crash once the promise settles. */
export const appendDurable = async (filePath: string, data: string): Promise<void> => {
  const handle = await open(filePath, 'a');
  try {
    await handle.appendFile(data, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
};

/** Writes beside the target and renames over it; readers never observe a half-written file. */
export const writeFileAtomic = async (filePath: string, data: string): Promise<void> => {
  const staging = tempPath(path.dirname(filePath), path.basename(filePath));
  const handle = await open(staging, 'w');
  try {
    await handle.writeFile(data, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fs.move(staging, filePath, { overwrite: true });
};

export const directorySize = async (dir: string): Promise<number> => {
  if (!(await fs.pathExists(dir))) {
    return 0;
  }
  let total = 0;
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(fullPath);
    } else if (entry.isFile()) {
      const stats = await fs.stat(fullPath);
      total += stats.size;
    }
  }
  return total;
};

/** Returns the bytes freed; a missing path frees nothing. */
export const removeTracked = async (target: string): Promise<number> => {
  if (!(await fs.pathExists(target))) {
    return 0;
  }
  const stats = await fs.stat(target);
  const size = stats.isDirectory() ? await directorySize(target) : stats.size;
  await fs.remove(target);
  return size;
};
