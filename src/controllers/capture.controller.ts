import { Request, Response } from 'express';
import * as fs from 'fs';
import { CaptureLog } from '../services/captureLog.service';
import { CaptureOrchestrator } from '../services/captureOrchestrator.service';
import { ChunkedTransferService } from '../services/chunkTransfer.service';
import { PhotoStorageService } from '../services/photoStorage.service';
import { CaptureNotifier } from '../services/socket.service';
import { CaptureResponse, FileChunkResponse } from '../types/api.types';
import { escapeHtml } from '../utils/escape';
import { firstQueryValue, integerQueryValue } from '../utils/query';

export const DEFAULT_CHUNK_SIZE_BYTES = 1048576;
const LOGGED_RESPONSE_LENGTH = 500;

export interface CaptureControllerDeps {
  log: CaptureLog;
  orchestrator: CaptureOrchestrator;
  transfer: ChunkedTransferService;
  storage: PhotoStorageService;
  captureTimeoutSeconds: number;
  notifier?: CaptureNotifier;
}

export class CaptureController {
  constructor(private readonly deps: CaptureControllerDeps) {}

  // GET /capture?id=
  async capture(req: Request, res: Response): Promise<void> {
    const { log, orchestrator, captureTimeoutSeconds, notifier } = this.deps;
    const id = firstQueryValue(req.query.id, 'no_id');
    log.addLine(`/capture request received with id=${id}`);

    const result = await orchestrator.captureSync(id, captureTimeoutSeconds);

    const response: CaptureResponse = {
      has_error: !result.success,
      message: escapeHtml(result.success ? 'Ok' : result.errorMessage),
      id,
      file_size_in_bytes: result.fileSizeBytes,
      file_path: result.filePath,
      log: escapeHtml(log.getBody()),
    };
    this.logResponse('/capture', response);
    res.status(200).json(response);

    if (notifier) {
      if (result.success) {
        notifier.photoCaptured(result.filePath, result.fileSizeBytes);
      } else {
        notifier.captureFailed(result.errorMessage);
      }
    }
  }

  // GET /get_file_chunk?id=&file_path=&offset_in_bytes=&chunk_size_in_bytes=
  async getFileChunk(req: Request, res: Response): Promise<void> {
    const { log, transfer } = this.deps;
    const id = firstQueryValue(req.query.id, 'no_id');
    const filePath = firstQueryValue(req.query.file_path, '');
    const offset = integerQueryValue(req.query.offset_in_bytes, 0, 0);
    const chunkSize = integerQueryValue(req.query.chunk_size_in_bytes, DEFAULT_CHUNK_SIZE_BYTES, 1);

    log.addLine(
      `/get_file_chunk request: id=${id}, file_path=${filePath}, offset=${offset}, chunk_size=${chunkSize}`
    );

    const chunk = await transfer.getChunk(filePath, offset, chunkSize);

    const response: FileChunkResponse = {
      has_error: chunk.hasError,
      message: escapeHtml(chunk.message),
      id,
      file_size_in_bytes: chunk.fileSizeBytes,
      file_path: filePath,
      is_last_chunk: chunk.isLastChunk,
      offset_in_bytes: chunk.offsetBytes,
      chunk_size_in_bytes: chunk.chunkSizeBytes,
      chunk_body_as_base64: chunk.chunkBodyBase64,
      log: escapeHtml(log.getBody()),
    };
    this.logResponse('/get_file_chunk', response);
    res.status(200).json(response);
  }

  // GET /get_img?id=&file_name=
  async getImage(req: Request, res: Response): Promise<void> {
    const { log, storage } = this.deps;
    const id = firstQueryValue(req.query.id, 'no_id');
    const fileName = firstQueryValue(req.query.file_name, '');
    log.addLine(`/get_img request: id=${id}, file_name=${fileName}`);

    let fileToServe = storage.resolveInsideRoot(fileName);
    if (!fileToServe) {
      log.addLine(`/get_img: Access denied for file_name=${fileName}`);
      fileToServe = storage.placeholderImagePath;
    } else if (!(await isFile(fileToServe))) {
      log.addLine(`/get_img: File not found, serving placeholder: ${fileToServe}`);
      fileToServe = storage.placeholderImagePath;
    }

    res.sendFile(fileToServe, { dotfiles: 'allow' }, (error) => {
      if (!error) {
        return;
      }
      log.addLine(`/get_img: Error serving file: ${error.message}`);
      if (!res.headersSent) {
        res.status(500).type('text/plain').send('Internal Server Error');
      }
    });
  }

  private logResponse(route: string, response: CaptureResponse | FileChunkResponse): void {
    const serialized = JSON.stringify(response);
    this.deps.log.addLine(`${route} response: ${serialized.slice(0, LOGGED_RESPONSE_LENGTH)}`);
  }
}

const isFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await fs.promises.stat(filePath)).isFile();
  } catch {
    return false;
  }
};
