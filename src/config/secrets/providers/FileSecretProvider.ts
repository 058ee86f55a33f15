/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}`, the layout used by Docker and Kubernetes
 * secret mounts. Names that would leave `secretDir` are never read.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

const NOT_FOUND_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR', 'ENOTDIR']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export class FileSecretProvider implements ISecretProvider {
  constructor(private readonly secretDir: string = '/run/secrets') {}

  async resolve(logicalName: string): Promise<string | undefined> {
    if (!logicalName || logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      const value = (await fs.readFile(filePath, 'utf-8')).trim();
      return value ? value : undefined;
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && NOT_FOUND_CODES.has(code)) {
        return undefined;
      }
      throw error;
    }
  }

  getSecretDir(): string {
    return this.secretDir;
  }
}
