/**
 * Input Resolver
 *
 * Classifies raw input as a local file or a remote URL and enforces the
 * format, size and host constraints before any external call is made.
 */

import { existsSync, statSync } from 'fs';
import { extname } from 'path';
import { AcquisitionError, ValidationError } from '../errors.js';
import {
  ALLOWED_EXTENSIONS,
  ALLOWED_URL_HOSTS,
  MAX_UPLOAD_BYTES,
  URL_PREFIXES,
  isAllowedExtension,
} from '../limits.js';
import type { LocalFileSource, MediaSource, MimeDetector, RemoteUrlSource, UploadInput } from '../types.js';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Prefix heuristic. A local path that literally starts with "www." is
 * misread as a URL.
 */
export function isUrl(value: string): boolean {
  return URL_PREFIXES.some(prefix => value.startsWith(prefix));
}

function parseUrl(url: string): URL {
  try {
    return new URL(url.startsWith('www.') ? `https://${url}` : url);
  } catch {
    throw new ValidationError(`Invalid URL: ${url}`);
  }
}

export function hasDirectMediaExtension(url: URL): boolean {
  const ext = extname(url.pathname).slice(1).toLowerCase();
  return isAllowedExtension(ext);
}

export function isAllowedHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return ALLOWED_URL_HOSTS.some(allowed => host === allowed || host.endsWith(`.${allowed}`));
}

export function validateUrl(raw: string): RemoteUrlSource {
  const url = raw.trim();
  if (!url) throw new ValidationError('Please enter a video URL');
  if (!isUrl(url)) {
    throw new ValidationError('Unsupported URL: it must start with http://, https:// or www.');
  }

  const parsed = parseUrl(url);
  if (!hasDirectMediaExtension(parsed) && !isAllowedHost(parsed.hostname)) {
    throw new ValidationError(
      `Unsupported URL. Use a direct video link ending in ${ALLOWED_EXTENSIONS.map(e => `.${e}`).join(', ')} ` +
      `or a link from ${ALLOWED_URL_HOSTS.join(', ')}`,
    );
  }
  return { kind: 'remote', url };
}

function uploadExtension(name: string): string {
  return extname(name).slice(1).toLowerCase();
}

function assertSize(size: number): void {
  if (size > MAX_UPLOAD_BYTES) {
    const mb = (size / (1024 * 1024)).toFixed(1);
    throw new ValidationError(`File is ${mb} MB; the maximum upload size is ${MAX_UPLOAD_BYTES / (1024 * 1024)} MB`);
  }
}

export function validateUploadMetadata(upload: Pick<UploadInput, 'originalName' | 'size'>): void {
  assertSize(upload.size);
  const ext = uploadExtension(upload.originalName);
  if (!isAllowedExtension(ext)) {
    throw new ValidationError(
      `Unsupported file type${ext ? ` .${ext}` : ''}. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}`,
    );
  }
}

async function detectVideoMime(path: string, detector: MimeDetector): Promise<string> {
  let mime: string;
  try {
    mime = await detector.detect(path);
  } catch (err) {
    if (err instanceof AcquisitionError && err.reason === 'format') {
      throw new ValidationError('The file does not appear to be a video');
    }
    throw err;
  }
  if (!mime.startsWith('video/')) {
    throw new ValidationError(`The file does not appear to be a video (detected ${mime})`);
  }
  return mime;
}

export async function resolveUpload(upload: UploadInput, detector: MimeDetector): Promise<LocalFileSource> {
  validateUploadMetadata(upload);
  await detectVideoMime(upload.path, detector);
  return {
    kind: 'local',
    path: upload.path,
    size: upload.size,
    declaredMimeType: upload.mimeType,
  };
}

export async function resolveLocalPath(path: string, detector: MimeDetector): Promise<LocalFileSource> {
  if (!existsSync(path)) throw new ValidationError(`File not found: ${path}`);
  const stat = statSync(path);
  if (!stat.isFile()) throw new ValidationError(`Not a file: ${path}`);
  assertSize(stat.size);

  const mime = await detectVideoMime(path, detector);
  return { kind: 'local', path, size: stat.size, declaredMimeType: mime };
}

/** Free-form input (CLI): a URL, or a path on the local filesystem. */
export async function resolveInput(input: string, detector: MimeDetector): Promise<MediaSource> {
  const value = input.trim();
  if (!value) throw new ValidationError('Please provide a video file path or URL');
  if (isUrl(value)) return validateUrl(value);
  if (SCHEME_PATTERN.test(value)) {
    throw new ValidationError(`Unsupported URL scheme: ${value.split('://')[0]}://`);
  }
  return resolveLocalPath(value, detector);
}
