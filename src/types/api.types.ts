export interface CaptureResponse {
  has_error: boolean;
  message: string;
  id: string;
  file_size_in_bytes: number;
  file_path: string;
  log: string;
}

export interface FileChunkResponse {
  has_error: boolean;
  message: string;
  id: string;
  file_size_in_bytes: number;
  file_path: string;
  is_last_chunk: boolean;
  offset_in_bytes: number;
  chunk_size_in_bytes: number;
  chunk_body_as_base64: string;
  log: string;
}
