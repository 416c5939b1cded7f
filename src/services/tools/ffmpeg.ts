/**
 * FFmpeg Service — audio extraction and media probing
 */

import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { AcquisitionError } from '../../core/errors.js';
import { CommandError, stderrTail, type CommandRunner } from './runner.js';
import type { MediaProbe } from '../../core/types.js';

const probeSchema = z.object({
  format: z.object({
    format_name: z.string(),
    duration: z.string().optional(),
  }),
  streams: z.array(z.object({ codec_type: z.string().optional() })).default([]),
});

export class FFmpegService {
  constructor(
    private readonly run: CommandRunner,
    private readonly ffmpegPath: string = 'ffmpeg',
    private readonly ffprobePath: string = 'ffprobe',
  ) {}

  /** Video container → single stereo 44.1 kHz MP3 stream. */
  async extractAudio(input: string, output: string): Promise<string> {
    this.ensureDir(output);
    try {
      await this.run(this.ffmpegPath, [
        '-y', '-i', input,
        '-vn', '-acodec', 'libmp3lame', '-ac', '2', '-ar', '44100',
        output,
      ]);
    } catch (err) {
      throw this.toAcquisitionError(err, 'FFmpeg');
    }
    if (!existsSync(output)) {
      throw new AcquisitionError('Audio conversion failed', 'format');
    }
    return output;
  }

  async probe(input: string): Promise<MediaProbe> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(this.ffprobePath, [
        '-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', input,
      ]));
    } catch (err) {
      throw this.toAcquisitionError(err, 'FFprobe');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new AcquisitionError('FFprobe returned unreadable output', 'format');
    }
    const parsed = probeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AcquisitionError('FFprobe could not read the media container', 'format');
    }

    const { format, streams } = parsed.data;
    const duration = format.duration !== undefined ? Number.parseFloat(format.duration) : NaN;
    return {
      formatName: format.format_name,
      durationSeconds: Number.isFinite(duration) ? duration : undefined,
      hasVideo: streams.some(s => s.codec_type === 'video'),
      hasAudio: streams.some(s => s.codec_type === 'audio'),
    };
  }

  async isProbeAvailable(): Promise<boolean> {
    try {
      await this.run(this.ffprobePath, ['-version'], { timeoutMs: 10_000 });
      return true;
    } catch (err) {
      if (err instanceof CommandError) return false;
      throw err;
    }
  }

  private toAcquisitionError(err: unknown, label: string): AcquisitionError {
    if (err instanceof CommandError) {
      if (err.notFound) {
        return new AcquisitionError(`${label} is not installed or not on PATH`, 'tool-unavailable', err);
      }
      if (err.timedOut) {
        return new AcquisitionError(`${label} timed out while processing the video`, 'format', err);
      }
      const detail = stderrTail(err.stderr) || err.message;
      return new AcquisitionError(`${label} error: ${detail}`, 'format', err);
    }
    return new AcquisitionError(`${label} error: ${String(err)}`, 'format');
  }

  private ensureDir(path: string): void {
    const dir = dirname(path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  }
}
