import { extname } from 'node:path';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

const MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.json': 'application/json',
  '.xml': 'application/xml',
  '.zip': 'application/zip',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.xls': 'application/vnd.ms-excel',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export function detectMimeType(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

const SIZE_UNITS = 'KMGTPE';

/** Formats a byte count for display, e.g. 1536 -> "1.5 KB". */
export function formatFileSize(size: number): string {
  const unit = 1024;
  if (size < unit) {
    return `${size} B`;
  }
  let div = unit;
  let exp = 0;
  for (let n = Math.floor(size / unit); n >= unit; n = Math.floor(n / unit)) {
    div *= unit;
    exp++;
  }
  return `${(size / div).toFixed(1)} ${SIZE_UNITS[exp]}B`;
}
