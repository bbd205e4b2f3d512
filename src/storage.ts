import fs from 'node:fs';
import path from 'node:path';
import type { Writable } from 'node:stream';
import { CHUNK_SIZE, fileLocalName, hasPathSeparator } from './utils.js';
import type { DownloadJob } from './types.js';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export type SinkFactory = (destinationPath: string) => Writable;

export const createFileSink: SinkFactory = (destinationPath) =>
  fs.createWriteStream(destinationPath, { highWaterMark: CHUNK_SIZE });

export async function removeFile(filePath: string) {
  await fs.promises.rm(filePath, { force: true });
}

export type DownloadPlan =
  | { kind: 'none' }
  | { kind: 'job'; job: DownloadJob }
  | { kind: 'unsafe'; name: string };

/**
 * Decides whether `title` is a media page to download into `saveDir`.
 * Local names containing a path separator, and `.`/`..`, are refused.
 */
export function planDownload(title: string, saveDir: string): DownloadPlan {
  const name = fileLocalName(title);
  if (name === undefined || name === '') return { kind: 'none' };
  if (hasPathSeparator(name) || name === '.' || name === '..') return { kind: 'unsafe', name };
  return { kind: 'job', job: { title, destinationPath: path.join(saveDir, name) } };
}
