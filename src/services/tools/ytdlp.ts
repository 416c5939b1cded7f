/**
 * yt-dlp Service — fetch a remote video and extract its audio as MP3
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { AcquisitionError } from '../../core/errors.js';
import { CommandError, stderrTail, type CommandRunner } from './runner.js';

// Browser-like headers reduce 403s from video platforms.
export const DOWNLOAD_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-us,en;q=0.5',
  'Sec-Fetch-Mode': 'navigate',
};

export const FORBIDDEN_MESSAGE = [
  'Access to this video is forbidden. This might be due to:',
  '1. The video is private or restricted',
  "2. The platform's region restrictions",
  "3. The platform's anti-bot measures",
  'Please try:',
  '- Using a different video',
  '- Using a direct MP4 link or Loom video instead',
  '- Ensuring the video is public and accessible',
].join('\n');

const infoSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  duration: z.number().nullable().optional(),
});

export interface DownloadedAudio {
  id: string;
  path: string;
  title?: string;
  durationSeconds?: number;
}

export function buildDownloadArgs(url: string, outputDir: string, ffmpegPath?: string): string[] {
  const headerArgs = Object.entries(DOWNLOAD_HEADERS).flatMap(([name, value]) => ['--add-header', `${name}:${value}`]);
  return [
    '-f', 'bestaudio/best',
    '-x', '--audio-format', 'mp3', '--audio-quality', '192K',
    '-o', join(outputDir, '%(id)s.%(ext)s'),
    '--no-playlist',
    '--no-check-certificates',
    '--geo-bypass',
    '--no-warnings',
    '--dump-json', '--no-simulate',
    ...(ffmpegPath ? ['--ffmpeg-location', ffmpegPath] : []),
    ...headerArgs,
    url,
  ];
}

/** yt-dlp prints one JSON object per line; the last one describes the download. */
export function parseInfo(stdout: string): z.infer<typeof infoSchema> {
  const lines = stdout.split(/\r?\n/).map(l => l.trim()).filter(l => l.startsWith('{'));
  const last = lines[lines.length - 1];
  if (!last) throw new AcquisitionError('Could not extract video information', 'format');

  let raw: unknown;
  try {
    raw = JSON.parse(last);
  } catch {
    throw new AcquisitionError('Could not extract video information', 'format');
  }
  const parsed = infoSchema.safeParse(raw);
  if (!parsed.success) throw new AcquisitionError('Could not extract video information', 'format');
  return parsed.data;
}

export function classifyDownloadError(err: CommandError): AcquisitionError {
  if (err.notFound) {
    return new AcquisitionError('yt-dlp is not installed or not on PATH', 'tool-unavailable', err);
  }
  const text = `${err.stderr}\n${err.message}`;
  if (/HTTP Error 403/i.test(text)) {
    return new AcquisitionError(FORBIDDEN_MESSAGE, 'forbidden', err);
  }
  if (/HTTP Error 404|Video unavailable|does not exist/i.test(text)) {
    return new AcquisitionError('The video could not be found at that URL', 'not-found', err);
  }
  if (/Unsupported URL/i.test(text)) {
    return new AcquisitionError('This site is not supported for video download', 'unsupported-host', err);
  }
  if (/Private video|Sign in to confirm|login required|members-only/i.test(text)) {
    return new AcquisitionError('The video requires sign-in or is private', 'permission', err);
  }
  if (err.timedOut) {
    return new AcquisitionError('Downloading the video timed out', 'network', err);
  }
  const detail = stderrTail(err.stderr) || err.message;
  return new AcquisitionError(`Error downloading video: ${detail}`, 'network', err);
}

export class YtDlpService {
  constructor(
    private readonly run: CommandRunner,
    private readonly ytDlpPath: string = 'yt-dlp',
    private readonly ffmpegPath?: string,
  ) {}

  async downloadAudio(url: string, outputDir: string): Promise<DownloadedAudio> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(this.ytDlpPath, buildDownloadArgs(url, outputDir, this.ffmpegPath)));
    } catch (err) {
      if (err instanceof CommandError) throw classifyDownloadError(err);
      throw err;
    }

    const info = parseInfo(stdout);
    const path = join(outputDir, `${info.id}.mp3`);
    if (!existsSync(path)) {
      throw new AcquisitionError('Audio file was not downloaded successfully', 'format');
    }

    return {
      id: info.id,
      path,
      title: info.title,
      durationSeconds: typeof info.duration === 'number' ? info.duration : undefined,
    };
  }
}
