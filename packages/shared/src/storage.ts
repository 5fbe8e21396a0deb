/**
 * Local File Storage
 *
 * Uploaded bytes live under the upload directory, named by document id with
 * the original extension kept.
 */

import fs from 'fs';
import path from 'path';
import { logger } from './logger';

export class LocalFileStorage {
  constructor(private readonly rootDir: string) {}

  /**
   * Write the file and return its storage path.
   */
  save(fileId: string, originalName: string, bytes: Buffer): string {
    if (!fs.existsSync(this.rootDir)) {
      fs.mkdirSync(this.rootDir, { recursive: true });
    }

    const ext = path.extname(originalName).toLowerCase();
    const filePath = path.join(this.rootDir, `${fileId}${ext}`);
    fs.writeFileSync(filePath, bytes);

    logger.info('Stored file', { file_path: filePath, size_bytes: bytes.length });
    return filePath;
  }

  read(filePath: string): Buffer {
    return fs.readFileSync(filePath);
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  /** Delete the file if it is still there. */
  remove(filePath: string): void {
    fs.rmSync(filePath, { force: true });
  }
}
