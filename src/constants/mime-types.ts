/**
 * Extension to MIME type table for files commonly shipped in game builds.
 */
export const MIME_TYPES: Readonly<Record<string, string>> = {
  exe: 'application/vnd.microsoft.portable-executable',
  dll: 'application/vnd.microsoft.portable-executable',
  sys: 'application/vnd.microsoft.portable-executable',
  so: 'application/x-sharedlib',
  dylib: 'application/x-mach-binary',
  pak: 'application/octet-stream',
  json: 'application/json',
  xml: 'application/xml',
  txt: 'text/plain',
  ini: 'text/plain',
  cfg: 'text/plain',
  log: 'text/plain',
  csv: 'text/csv',
  html: 'text/html',
  htm: 'text/html',
  css: 'text/css',
  js: 'text/javascript',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  bmp: 'image/bmp',
  ico: 'image/vnd.microsoft.icon',
  ttf: 'font/ttf',
  otf: 'font/otf',
  wav: 'audio/wav',
  ogg: 'audio/ogg',
  mp4: 'video/mp4',
  zip: 'application/zip',
  pdf: 'application/pdf'
};
