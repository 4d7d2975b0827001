import fs from 'node:fs';
import path from 'node:path';
import { generateId } from '../utils/ids.js';
import { ExternalServiceError } from '../utils/errors.js';

export interface StoredFile {
  url: string;
  size: number;
  mimeType: string;
}

/**
 * Object storage for message attachments.
 * - LocalFileStorage: writes under UPLOAD_DIR, served by file-serve.ts via /files/
 */
export interface IFileStorage {
  upload(data: Buffer, filename: string, contentType: string): Promise<StoredFile>;
  /** Absolute path of a stored key, or null when it is outside the store or missing. */
  resolve(key: string): Promise<string | null>;
}

/** Keep names readable in URLs and on disk while dropping path separators and control characters. */
export function sanitizeFilename(filename: string): string {
  const base = path.basename(filename).replace(/[^\w.\-]+/g, '_').replace(/^\.+/, '');
  return base.slice(0, 200) || 'file';
}

export class LocalFileStorage implements IFileStorage {
  private readonly root: string;

  constructor(
    uploadDir: string,
    private readonly publicUrl?: string,
  ) {
    this.root = path.resolve(uploadDir);
  }

  async upload(data: Buffer, filename: string, contentType: string): Promise<StoredFile> {
    const key = `${generateId()}/${sanitizeFilename(filename)}`;
    const filePath = path.join(this.root, key);
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(filePath, data);
    } catch (err) {
      throw new ExternalServiceError('storage', 'Could not write upload', { cause: err });
    }
    const prefix = this.publicUrl?.replace(/\/+$/, '') ?? '';
    return { url: `${prefix}/files/${key}`, size: data.length, mimeType: contentType };
  }

  async resolve(key: string): Promise<string | null> {
    const filePath = path.resolve(this.root, key);
    if (!filePath.startsWith(this.root + path.sep)) return null;
    try {
      const stat = await fs.promises.stat(filePath);
      return stat.isFile() ? filePath : null;
    } catch {
      return null;
    }
  }
}
