import { promises as fs } from 'fs';
import path from 'path';

import { BlobStore } from './blobStore';

// fs errors may come from another realm, so no instanceof Error here
const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * One file per key under a data directory.
 * Full writes go through a temporary file and a rename.
 */
export class FileBlobStore implements BlobStore {
  readonly driver = 'file' as const;
  private ready = false;

  constructor(private readonly dataDir: string) {}

  async connect(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    this.ready = true;
  }

  async disconnect(): Promise<void> {
    this.ready = false;
  }

  isReady(): boolean {
    return this.ready;
  }

  resolve(key: string): string {
    return path.join(this.dataDir, path.basename(key));
  }

  async get(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(key), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(key: string, value: string): Promise<void> {
    const target = this.resolve(key);
    const tmp = `${target}.tmp`;
    await fs.writeFile(tmp, value, 'utf8');
    await fs.rename(tmp, target);
  }

  async append(key: string, value: string): Promise<void> {
    await fs.appendFile(this.resolve(key), value, 'utf8');
  }
}
