/**
 * MIME detection strategies.
 *
 * ContentSniffer reads the container through ffprobe; ExtensionGuesser falls
 * back to the file name. The strategy is picked once at startup.
 */

import { extname } from 'path';
import type { FFmpegService } from '../../services/tools/ffmpeg.js';
import type { Logger, MimeDetector } from '../types.js';

const UNKNOWN_MIME = 'application/octet-stream';

const EXTENSION_MIME_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4', '.m4v': 'video/mp4', '.mov': 'video/quicktime',
  '.avi': 'video/x-msvideo', '.mkv': 'video/x-matroska', '.webm': 'video/webm',
  '.mp3': 'audio/mpeg', '.wav': 'audio/wav', '.ogg': 'audio/ogg',
  '.m4a': 'audio/mp4', '.flac': 'audio/flac',
  '.jpg': 'image/jpeg', '.jpeg': 'image/jpeg', '.png': 'image/png', '.gif': 'image/gif',
  '.txt': 'text/plain', '.pdf': 'application/pdf',
};

export function mimeFromExtension(path: string): string {
  return EXTENSION_MIME_TYPES[extname(path).toLowerCase()] ?? UNKNOWN_MIME;
}

/** Maps an ffprobe `format_name` (comma-separated demuxer list) to a MIME type. */
export function mimeFromProbe(formatName: string, hasVideo: boolean, hasAudio: boolean, path: string): string {
  const formats = formatName.split(',').map(f => f.trim().toLowerCase());
  const first = formats[0] ?? '';

  if (formats.includes('image2') || first.endsWith('_pipe')) {
    return `image/${first.replace(/_pipe$/, '')}`;
  }
  if (hasVideo) {
    if (formats.includes('matroska')) return extname(path).toLowerCase() === '.webm' ? 'video/webm' : 'video/x-matroska';
    if (formats.includes('avi')) return 'video/x-msvideo';
    if (formats.includes('mov') || formats.includes('mp4')) {
      return extname(path).toLowerCase() === '.mov' ? 'video/quicktime' : 'video/mp4';
    }
    return `video/${first || 'unknown'}`;
  }
  if (hasAudio) return first === 'mp3' ? 'audio/mpeg' : `audio/${first || 'unknown'}`;
  return UNKNOWN_MIME;
}

export class ExtensionGuesser implements MimeDetector {
  readonly name = 'extension-guesser' as const;

  async detect(path: string): Promise<string> {
    return mimeFromExtension(path);
  }
}

export class ContentSniffer implements MimeDetector {
  readonly name = 'content-sniffer' as const;

  constructor(private readonly ffmpeg: Pick<FFmpegService, 'probe'>) {}

  async detect(path: string): Promise<string> {
    const probe = await this.ffmpeg.probe(path);
    return mimeFromProbe(probe.formatName, probe.hasVideo, probe.hasAudio, path);
  }
}

export async function selectMimeDetector(
  ffmpeg: Pick<FFmpegService, 'probe' | 'isProbeAvailable'>,
  logger?: Logger,
): Promise<MimeDetector> {
  const detector = (await ffmpeg.isProbeAvailable()) ? new ContentSniffer(ffmpeg) : new ExtensionGuesser();
  logger?.info('MIME detection strategy selected', { strategy: detector.name });
  return detector;
}
