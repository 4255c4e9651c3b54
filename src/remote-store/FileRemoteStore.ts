/**
 * File-backed remote store
 *
 * Layout: <rootDir>/<encoded name>/<encoded key>, one file per key.
 * Writes go to a temp file first and are renamed into place.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { RemoteStoreError } from '../profile-store/errors';
import { sortKeys } from './keys';
import type { RemoteStore } from './types';

export class FileRemoteStore implements RemoteStore {
  constructor(private rootDir: string) {}

  async get(name: string, key: string): Promise<string | undefined> {
    const filePath = this.keyPath(name, key);
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new RemoteStoreError(`Failed to read ${name}/${key}`, { operation: 'get', name, key }, error);
    }
  }

  async put(name: string, key: string, value: string): Promise<void> {
    const dir = this.namePath(name);
    const filePath = this.keyPath(name, key);
    const tempPath = path.join(dir, `.${randomUUID()}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tempPath, value, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new RemoteStoreError(`Failed to write ${name}/${key}`, { operation: 'put', name, key }, error);
    }
  }

  async listSorted(name: string, descending: boolean, pageSize: number): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.namePath(name));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new RemoteStoreError(`Failed to list ${name}`, { operation: 'listSorted', name }, error);
    }

    const keys = entries
      .filter(entry => !entry.startsWith('.'))
      .map(entry => decodeURIComponent(entry));

    return sortKeys(keys, descending, pageSize);
  }

  private namePath(name: string): string {
    return path.join(this.rootDir, encodeURIComponent(name));
  }

  private keyPath(name: string, key: string): string {
    return path.join(this.namePath(name), encodeURIComponent(key));
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
