import * as fs from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import { CaptureLog } from './captureLog.service';
import { formatFileTimestamp } from '../utils/time';

export interface PhotoStorageOptions {
  photoFolderPath: string;
  placeholderImagePath: string;
  filePrefix: string;
}

/**
 * Owns the photo root: where captures land, how they are named, and which
 * requested paths are allowed to be served back.
 */
export class PhotoStorageService {
  readonly basePath: string;
  readonly placeholderImagePath: string;
  private readonly filePrefix: string;

  constructor(
    options: PhotoStorageOptions,
    private readonly log: CaptureLog
  ) {
    this.basePath = path.resolve(options.photoFolderPath);
    this.placeholderImagePath = path.resolve(options.placeholderImagePath);
    this.filePrefix = options.filePrefix;
  }

  ensureBaseDirectoryExists(): void {
    if (!fs.existsSync(this.basePath)) {
      fs.mkdirSync(this.basePath, { recursive: true });
      this.log.addLine(`📁 Created photo folder: ${this.basePath}`);
    }
    this.log.addLine(`Photo folder resolved to: ${this.basePath}`);
  }

  /**
   * Write a neutral grey JPEG at the placeholder path unless a file is
   * already there.
   */
  async ensurePlaceholderImage(): Promise<void> {
    if (fs.existsSync(this.placeholderImagePath)) {
      return;
    }

    await fs.promises.mkdir(path.dirname(this.placeholderImagePath), { recursive: true });
    await sharp({
      create: {
        width: 640,
        height: 480,
        channels: 3,
        background: { r: 128, g: 128, b: 128 },
      },
    })
      .jpeg({ quality: 80 })
      .toFile(this.placeholderImagePath);

    this.log.addLine(`🖼️ Placeholder image generated: ${this.placeholderImagePath}`);
  }

  buildFileName(id: string, date: Date): string {
    return `${this.filePrefix}_${formatFileTimestamp(date)}_${sanitizeId(id)}.jpg`;
  }

  buildTargetPath(id: string, date: Date): string {
    return path.join(this.basePath, this.buildFileName(id, date));
  }

  /**
   * Resolve a requested path against the photo root. Returns null when the
   * result is not strictly below the root.
   */
  resolveInsideRoot(requestedPath: string): string | null {
    const resolved = path.resolve(this.basePath, requestedPath);
    return resolved.startsWith(this.basePath + path.sep) ? resolved : null;
  }
}

// Keep ids from smuggling separators or dot segments into the file name
export const sanitizeId = (id: string): string => id.replace(/[^A-Za-z0-9._-]/g, '_');
