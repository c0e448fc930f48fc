import { extname } from 'node:path'

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream'

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.html': 'text/html',
  '.htm': 'text/html',
  '.css': 'text/css',
  '.js': 'application/javascript',
  '.mjs': 'application/javascript',
  '.json': 'application/json',
  '.xml': 'application/xml',
  '.txt': 'text/plain',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
  '.eot': 'application/vnd.ms-fontobject',
  '.otf': 'font/otf',
  '.pdf': 'application/pdf',
  '.zip': 'application/zip',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.ogg': 'audio/ogg'
}

/** MIME type for a file path, by extension (case-insensitive). */
export function getContentType(filePath: string): string {
  const ext: string = extname(filePath).toLowerCase()
  return Object.prototype.hasOwnProperty.call(CONTENT_TYPES, ext) ? (CONTENT_TYPES[ext] ?? DEFAULT_CONTENT_TYPE) : DEFAULT_CONTENT_TYPE
}

/** The fixed extension table, in declaration order. */
export function knownContentTypes(): ReadonlyArray<readonly [string, string]> {
  return Object.entries(CONTENT_TYPES)
}
