const CONTENT_TYPES: Record<string, string> = {
  html: 'text/html',
  htm: 'text/html',
  css: 'text/css',
  js: 'application/javascript',
  mjs: 'application/javascript',
  cjs: 'application/javascript',
  json: 'application/json',
  map: 'application/json',
  txt: 'text/plain',
  md: 'text/markdown',
  xml: 'application/xml',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  ico: 'image/x-icon',
  webp: 'image/webp',
  avif: 'image/avif',
  woff: 'font/woff',
  woff2: 'font/woff2',
  ttf: 'font/ttf',
  otf: 'font/otf',
  eot: 'application/vnd.ms-fontobject',
  wasm: 'application/wasm',
  ts: 'application/typescript',
}

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream'

export function contentTypeFor(filename: string): string {
  const basename = filename.slice(filename.lastIndexOf('/') + 1)
  const dot = basename.lastIndexOf('.')
  if (dot === -1) return DEFAULT_CONTENT_TYPE
  const ext = basename.slice(dot + 1).toLowerCase()
  return CONTENT_TYPES[ext] ?? DEFAULT_CONTENT_TYPE
}
