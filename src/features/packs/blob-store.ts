import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import * as path from 'node:path';

/** Durable key -> bytes storage. Writes replace the whole value. */
export interface BlobStore {
  read(key: string): Promise<Uint8Array | undefined>;
  write(key: string, bytes: Uint8Array): Promise<void>;
}

/**
 * One file per key under `dir`. Writes go to a sibling temp file first and
 * are renamed into place, so readers see either the old or the new blob.
 */
let tmpSeq = 0;

export class FileBlobStore implements BlobStore {
  constructor(readonly dir: string) {}

  async read(key: string): Promise<Uint8Array | undefined> {
    try {
      return new Uint8Array(await readFile(this.fileFor(key)));
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async write(key: string, bytes: Uint8Array): Promise<void> {
    const file = this.fileFor(key);
    await mkdir(this.dir, { recursive: true });
    const tmp = `${file}.${process.pid}.${Date.now().toString(36)}.${(tmpSeq++).toString(36)}.tmp`;
    await writeFile(tmp, bytes);
    await rename(tmp, file);
  }

  private fileFor(key: string): string {
    return path.join(this.dir, key);
  }
}

export class MemoryBlobStore implements BlobStore {
  private blobs = new Map<string, Uint8Array>();
  writes = 0;

  async read(key: string): Promise<Uint8Array | undefined> {
    const v = this.blobs.get(key);
    return v ? v.slice() : undefined;
  }

  async write(key: string, bytes: Uint8Array): Promise<void> {
    this.writes++;
    this.blobs.set(key, bytes.slice());
  }

  has(key: string): boolean {
    return this.blobs.has(key);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
