import crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

export const ALLOWED_IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif'] as const;

export const DISALLOWED_IMAGE_MESSAGE =
  `Uploaded file type not allowed. Allowed: ${ALLOWED_IMAGE_EXTENSIONS.join('/')}`;

export function isAllowedImage(fileName: string): boolean {
  const dot = fileName.lastIndexOf('.');
  if (dot === -1) {
    return false;
  }
  const extension = fileName.slice(dot + 1).toLowerCase();
  return ALLOWED_IMAGE_EXTENSIONS.some((allowed) => allowed === extension);
}

/**
 * Reduce a client-supplied file name to a safe basename: path separators
 * and leading dots are dropped, whitespace becomes '_', and only ASCII
 * letters, digits, '.', '-' and '_' survive.
 */
export function sanitizeFileName(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? '';
  return base
    .normalize('NFKD')
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '')
    .replace(/^[._]+/, '');
}

export interface ImageStorage {
  /** Persist the image and return the stored file name */
  save(fileBuffer: Buffer, originalName: string): Promise<string>;
}

/**
 * Writes uploads to a local directory as `<random hex>_<sanitized name>`
 */
export class LocalImageStorage implements ImageStorage {
  constructor(private readonly uploadDir: string) {}

  ensureDirectory(): void {
    if (!fs.existsSync(this.uploadDir)) {
      fs.mkdirSync(this.uploadDir, { recursive: true });
    }
  }

  async save(fileBuffer: Buffer, originalName: string): Promise<string> {
    this.ensureDirectory();
    const hash = crypto.randomBytes(16).toString('hex');
    const safeName = sanitizeFileName(originalName) || 'upload';
    const storedName = `${hash}_${safeName}`;
    await fs.promises.writeFile(path.join(this.uploadDir, storedName), fileBuffer);
    return storedName;
  }
}
