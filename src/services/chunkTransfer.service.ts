import * as fs from 'fs';
import { CaptureLog } from './captureLog.service';
import { PhotoStorageService } from './photoStorage.service';
import { errorMessage } from '../utils/errors';

export const ACCESS_DENIED_MESSAGE = 'Access denied: file_path is outside the photo folder';

export interface ChunkResult {
  hasError: boolean;
  message: string;
  fileSizeBytes: number;
  isLastChunk: boolean;
  offsetBytes: number;
  chunkSizeBytes: number;
  chunkBodyBase64: string;
}

/**
 * Serves byte ranges of stored photos. Keeps no cursor: clients advance the
 * offset themselves until `isLastChunk` comes back true.
 */
export class ChunkedTransferService {
  constructor(
    private readonly storage: PhotoStorageService,
    private readonly log: CaptureLog
  ) {}

  async getChunk(filePath: string, offsetBytes: number, chunkSizeBytes: number): Promise<ChunkResult> {
    const failed = (message: string, fileSizeBytes = 0): ChunkResult => ({
      hasError: true,
      message,
      fileSizeBytes,
      isLastChunk: true,
      offsetBytes,
      chunkSizeBytes,
      chunkBodyBase64: '',
    });

    const absolutePath = this.storage.resolveInsideRoot(filePath);
    if (!absolutePath) {
      this.log.addLine(ACCESS_DENIED_MESSAGE);
      return failed(ACCESS_DENIED_MESSAGE);
    }

    let fileSizeBytes: number;
    try {
      const stats = await fs.promises.stat(absolutePath);
      if (!stats.isFile()) {
        throw new Error(`not a regular file: ${filePath}`);
      }
      fileSizeBytes = stats.size;
    } catch (error) {
      const message = `Error reading file size: ${errorMessage(error)}`;
      this.log.addLine(message);
      return failed(message);
    }

    if (offsetBytes >= fileSizeBytes) {
      return {
        hasError: false,
        message: 'Ok',
        fileSizeBytes,
        isLastChunk: true,
        offsetBytes,
        chunkSizeBytes,
        chunkBodyBase64: '',
      };
    }

    try {
      const length = Math.min(chunkSizeBytes, fileSizeBytes - offsetBytes);
      const chunk = await readRange(absolutePath, offsetBytes, length);
      return {
        hasError: false,
        message: 'Ok',
        fileSizeBytes,
        isLastChunk: offsetBytes + chunk.length >= fileSizeBytes,
        offsetBytes,
        chunkSizeBytes,
        chunkBodyBase64: chunk.toString('base64'),
      };
    } catch (error) {
      const message = `Error reading file: ${errorMessage(error)}`;
      this.log.addLine(message);
      return failed(message, fileSizeBytes);
    }
  }
}

const readRange = async (filePath: string, offset: number, length: number): Promise<Buffer> => {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    let total = 0;
    // read() may return short counts; keep going until EOF or the chunk is full
    while (total < length) {
      const { bytesRead } = await handle.read(buffer, total, length - total, offset + total);
      if (bytesRead === 0) break;
      total += bytesRead;
    }
    return buffer.subarray(0, total);
  } finally {
    await handle.close();
  }
};
