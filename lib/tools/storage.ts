/**
 * Storage Tool - Abstraction over Vercel Blob, the local filesystem and memory
 *
 * Writes are all-or-nothing per object: the local backend writes to a
 * temporary file and renames it into place, so a reader never sees a partial
 * artifact.
 */

import { promises as fs } from 'fs';
import * as nodePath from 'path';
import { put, list, del } from '@vercel/blob';
import { Logger, Crypto } from '../utils';

export type StorageBackendKind = 'vercel-blob' | 'local' | 'memory';

export interface StorageOptions {
  backend: StorageBackendKind;
  local_root?: string;
}

export interface StorageObject {
  path: string;
  url: string;
  size: number;
  uploadedAt: Date;
}

interface MemoryEntry {
  data: Buffer;
  contentType: string;
  uploadedAt: Date;
}

export class StorageTool {
  private readonly backend: StorageBackendKind;
  private readonly localRoot: string;
  private readonly memory: Map<string, MemoryEntry> = new Map();
  // Blob URLs of objects written by this instance; list() is eventually consistent
  private readonly urlCache: Map<string, string> = new Map();

  constructor(options: StorageOptions) {
    this.backend = options.backend;
    this.localRoot = nodePath.resolve(options.local_root ?? '.clip-cache');
  }

  static inMemory(): StorageTool {
    return new StorageTool({ backend: 'memory' });
  }

  get kind(): StorageBackendKind {
    return this.backend;
  }

  async put(path: string, data: Buffer | string, contentType: string): Promise<string> {
    Logger.debug('Storage put', { backend: this.backend, path, size: data.length, contentType });

    const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;

    switch (this.backend) {
      case 'vercel-blob':
        return this.putVercelBlob(path, buffer, contentType);
      case 'local':
        return this.putLocal(path, buffer);
      case 'memory':
        this.memory.set(path, { data: buffer, contentType, uploadedAt: new Date() });
        return `memory://${path}`;
    }
  }

  /**
   * Returns null when nothing is stored at the path.
   */
  async get(path: string): Promise<Buffer | null> {
    Logger.debug('Storage get', { backend: this.backend, path });

    switch (this.backend) {
      case 'vercel-blob':
        return this.getVercelBlob(path);
      case 'local':
        return this.getLocal(path);
      case 'memory':
        return this.memory.get(path)?.data ?? null;
    }
  }

  async exists(path: string): Promise<boolean> {
    switch (this.backend) {
      case 'vercel-blob':
        return (await this.findBlobUrl(path)) !== null;
      case 'local':
        return (await this.getLocal(path)) !== null;
      case 'memory':
        return this.memory.has(path);
    }
  }

  async list(prefix: string): Promise<StorageObject[]> {
    switch (this.backend) {
      case 'vercel-blob': {
        const { blobs } = await list({ prefix });
        return blobs.map(blob => ({
          path: blob.pathname,
          url: blob.url,
          size: blob.size,
          uploadedAt: new Date(blob.uploadedAt),
        }));
      }
      case 'local':
        return this.listLocal(prefix);
      case 'memory':
        return Array.from(this.memory.entries())
          .filter(([path]) => path.startsWith(prefix))
          .sort(([a], [b]) => a.localeCompare(b))
          .map(([path, entry]) => ({
            path,
            url: `memory://${path}`,
            size: entry.data.length,
            uploadedAt: entry.uploadedAt,
          }));
    }
  }

  async delete(path: string): Promise<void> {
    Logger.debug('Storage delete', { backend: this.backend, path });

    switch (this.backend) {
      case 'vercel-blob': {
        const url = await this.findBlobUrl(path);
        if (url) {
          await del(url);
          this.urlCache.delete(path);
        } else {
          Logger.warn('Blob not found for deletion', { path });
        }
        return;
      }
      case 'local':
        await fs.rm(this.localPath(path), { force: true });
        return;
      case 'memory':
        this.memory.delete(path);
        return;
    }
  }

  // Vercel Blob implementation
  private async putVercelBlob(path: string, data: Buffer, contentType: string): Promise<string> {
    const blob = await put(path, data, {
      access: 'public',
      contentType,
      addRandomSuffix: false,
    });

    Logger.debug('Blob created', { pathname: blob.pathname, url: blob.url });
    this.urlCache.set(path, blob.url);
    return blob.url;
  }

  private async findBlobUrl(path: string): Promise<string | null> {
    const cached = this.urlCache.get(path);
    if (cached) return cached;

    const { blobs } = await list({ prefix: path, limit: 10 });
    const exact = blobs.find(blob => blob.pathname === path);
    return exact ? exact.url : null;
  }

  private async getVercelBlob(path: string): Promise<Buffer | null> {
    const url = await this.findBlobUrl(path);
    if (!url) return null;

    const response = await fetch(url);
    if (response.status === 404) {
      this.urlCache.delete(path);
      return null;
    }
    if (!response.ok) {
      throw new Error(`Failed to fetch blob ${path}: HTTP ${response.status}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  // Local filesystem implementation
  private localPath(path: string): string {
    const resolved = nodePath.resolve(this.localRoot, path);
    if (resolved !== this.localRoot && !resolved.startsWith(this.localRoot + nodePath.sep)) {
      throw new Error(`Storage path escapes the storage root: ${path}`);
    }
    return resolved;
  }

  private async putLocal(path: string, data: Buffer): Promise<string> {
    const target = this.localPath(path);
    await fs.mkdir(nodePath.dirname(target), { recursive: true });

    const temp = `${target}.${Crypto.uuid()}.tmp`;
    try {
      await fs.writeFile(temp, data);
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
    return `file://${target}`;
  }

  private async getLocal(path: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.localPath(path));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  private async listLocal(prefix: string): Promise<StorageObject[]> {
    const objects: StorageObject[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries: string[];
      try {
        entries = await fs.readdir(dir);
      } catch (error) {
        if (isNotFound(error)) return;
        throw error;
      }

      for (const name of entries) {
        const full = nodePath.join(dir, name);
        const stat = await fs.stat(full);
        if (stat.isDirectory()) {
          await walk(full);
        } else if (!name.endsWith('.tmp')) {
          const relative = nodePath.relative(this.localRoot, full).split(nodePath.sep).join('/');
          if (relative.startsWith(prefix)) {
            objects.push({ path: relative, url: `file://${full}`, size: stat.size, uploadedAt: stat.mtime });
          }
        }
      }
    };

    await walk(this.localRoot);
    return objects.sort((a, b) => a.path.localeCompare(b.path));
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
