/**
 * SourceFile adapters. Discovery (directory walking, platform detection) happens
 * outside the core; these wrap a single known file or an in-memory string.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type { FileFingerprint, Platform, SourceFile } from '../types/models.js';

export function memorySourceFile(input: {
  name: string;
  platform: Platform;
  content: string;
  path?: string;
  modifiedAt?: Date;
}): SourceFile {
  return {
    name: input.name,
    path: input.path ?? `memory://${input.platform}/${input.name}`,
    platform: input.platform,
    modifiedAt: input.modifiedAt ?? new Date(0),
    read: async () => input.content,
  };
}

export async function diskSourceFile(path: string, platform: Platform): Promise<SourceFile> {
  const info = await stat(path);
  return {
    name: basename(path),
    path,
    platform,
    modifiedAt: info.mtime,
    read: () => readFile(path, 'utf8'),
  };
}

export function fingerprintOf(file: SourceFile): FileFingerprint {
  return { path: file.path, modifiedAt: file.modifiedAt };
}
