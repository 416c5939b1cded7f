/**
 * Tool Services Test Suite
 *
 * FFmpeg and yt-dlp wrappers driven by a fake command runner; no binaries
 * are executed.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { CommandError, stderrTail, type CommandResult } from '../src/services/tools/runner.js';
import { FFmpegService } from '../src/services/tools/ffmpeg.js';
import {
  FORBIDDEN_MESSAGE,
  YtDlpService,
  buildDownloadArgs,
  classifyDownloadError,
  parseInfo,
} from '../src/services/tools/ytdlp.js';
import { createToolServices } from '../src/services/tools/index.js';
import { AcquisitionError } from '../src/core/errors.js';

const TEST_DIR = join(import.meta.dirname ?? '.', '__tools_tmp__');

function commandError(stderr: string, opts: { notFound?: boolean; timedOut?: boolean } = {}): CommandError {
  return new CommandError('Command failed', 'tool', 1, stderr, opts.notFound ?? false, opts.timedOut ?? false);
}

const ok = (stdout = ''): CommandResult => ({ stdout, stderr: '' });

describe('stderrTail', () => {
  it('keeps the last non-empty lines', () => {
    expect(stderrTail('a\n\nb\r\nc\nd\n')).toBe('b c d');
    expect(stderrTail('only', 1)).toBe('only');
    expect(stderrTail('')).toBe('');
  });
});

describe('yt-dlp helpers', () => {
  it('builds the download arguments', () => {
    const args = buildDownloadArgs('https://youtu.be/x', '/scratch/dir');
    expect(args.slice(0, 7)).toEqual(['-f', 'bestaudio/best', '-x', '--audio-format', 'mp3', '--audio-quality', '192K']);
    expect(args[args.indexOf('-o') + 1]).toBe(join('/scratch/dir', '%(id)s.%(ext)s'));
    expect(args).toContain('--no-playlist');
    expect(args).toContain('--geo-bypass');
    expect(args).not.toContain('--ffmpeg-location');
    expect(args[args.length - 1]).toBe('https://youtu.be/x');
    expect(args.filter(a => a === '--add-header')).toHaveLength(4);
  });

  it('passes a custom ffmpeg location', () => {
    const args = buildDownloadArgs('https://youtu.be/x', '/d', '/opt/ffmpeg/bin/ffmpeg');
    expect(args[args.indexOf('--ffmpeg-location') + 1]).toBe('/opt/ffmpeg/bin/ffmpeg');
  });

  it('parses the last JSON line of the output', () => {
    const stdout = '[info] noise\n{"id":"first"}\n{"id":"abc","title":"Talk","duration":12.5}\n';
    expect(parseInfo(stdout)).toEqual({ id: 'abc', title: 'Talk', duration: 12.5 });
  });

  it('rejects output without usable video info', () => {
    expect(() => parseInfo('no json here')).toThrow('Could not extract video information');
    expect(() => parseInfo('{"title":"no id"}')).toThrow('Could not extract video information');
  });

  it('classifies 403 as forbidden with guidance', () => {
    const err = classifyDownloadError(commandError('ERROR: [youtube] abc: HTTP Error 403: Forbidden'));
    expect(err.reason).toBe('forbidden');
    expect(err.message).toBe(FORBIDDEN_MESSAGE);
    expect(err.message.split('\n')[0]).toBe('Access to this video is forbidden. This might be due to:');
  });

  it('classifies the other download failures', () => {
    expect(classifyDownloadError(commandError('ERROR: Video unavailable')).reason).toBe('not-found');
    expect(classifyDownloadError(commandError('ERROR: Unsupported URL: https://x')).reason).toBe('unsupported-host');
    expect(classifyDownloadError(commandError('ERROR: Private video')).reason).toBe('permission');
    expect(classifyDownloadError(commandError('', { timedOut: true })).reason).toBe('network');
    expect(classifyDownloadError(commandError('', { notFound: true }))).toMatchObject({
      reason: 'tool-unavailable',
      message: 'yt-dlp is not installed or not on PATH',
    });
  });

  it('falls back to a generic network error with the stderr tail', () => {
    const err = classifyDownloadError(commandError('line1\nERROR: something odd\n'));
    expect(err.reason).toBe('network');
    expect(err.message).toBe('Error downloading video: line1 ERROR: something odd');
  });
});

describe('YtDlpService', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('downloads audio into the output dir', async () => {
    const run = vi.fn(async (_command: string, _args: string[]) => {
      writeFileSync(join(TEST_DIR, 'abc.mp3'), 'mp3');
      return ok('{"id":"abc","title":"Talk","duration":42}\n');
    });
    const service = new YtDlpService(run, 'yt-dlp');
    const result = await service.downloadAudio('https://youtu.be/abc', TEST_DIR);

    expect(result).toEqual({ id: 'abc', path: join(TEST_DIR, 'abc.mp3'), title: 'Talk', durationSeconds: 42 });
    expect(run.mock.calls[0]?.[0]).toBe('yt-dlp');
  });

  it('leaves the duration unset when yt-dlp reports none', async () => {
    const run = vi.fn(async () => {
      writeFileSync(join(TEST_DIR, 'xyz.mp3'), 'mp3');
      return ok('{"id":"xyz","duration":null}');
    });
    const result = await new YtDlpService(run).downloadAudio('https://youtu.be/xyz', TEST_DIR);
    expect(result.durationSeconds).toBeUndefined();
  });

  it('fails when the mp3 is missing', async () => {
    const run = vi.fn(async () => ok('{"id":"ghost"}'));
    await expect(new YtDlpService(run).downloadAudio('https://youtu.be/ghost', TEST_DIR)).rejects.toThrow(
      'Audio file was not downloaded successfully',
    );
  });

  it('maps runner failures through the classifier', async () => {
    const run = vi.fn(async (): Promise<CommandResult> => {
      throw commandError('ERROR: HTTP Error 403: Forbidden');
    });
    const promise = new YtDlpService(run).downloadAudio('https://youtu.be/abc', TEST_DIR);
    await expect(promise).rejects.toBeInstanceOf(AcquisitionError);
    await expect(promise).rejects.toMatchObject({ reason: 'forbidden' });
  });
});

describe('FFmpegService', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('extracts a stereo 44.1 kHz mp3', async () => {
    const output = join(TEST_DIR, 'out', 'audio.mp3');
    const run = vi.fn(async (_command: string, args: string[]) => {
      writeFileSync(args[args.length - 1] ?? '', 'mp3');
      return ok();
    });
    const service = new FFmpegService(run, '/usr/bin/ffmpeg', 'ffprobe');

    await expect(service.extractAudio('/in/video.mp4', output)).resolves.toBe(output);
    expect(run).toHaveBeenCalledWith('/usr/bin/ffmpeg', [
      '-y', '-i', '/in/video.mp4',
      '-vn', '-acodec', 'libmp3lame', '-ac', '2', '-ar', '44100',
      output,
    ]);
  });

  it('fails when ffmpeg produces no output', async () => {
    const service = new FFmpegService(vi.fn(async () => ok()));
    await expect(service.extractAudio('/in/video.mp4', join(TEST_DIR, 'audio.mp3'))).rejects.toThrow('Audio conversion failed');
  });

  it('reports a missing ffmpeg binary as tool-unavailable', async () => {
    const service = new FFmpegService(vi.fn(async (): Promise<CommandResult> => {
      throw commandError('', { notFound: true });
    }));
    await expect(service.extractAudio('/in/video.mp4', join(TEST_DIR, 'audio.mp3'))).rejects.toMatchObject({
      reason: 'tool-unavailable',
      message: 'FFmpeg is not installed or not on PATH',
    });
  });

  it('parses ffprobe output', async () => {
    const json = JSON.stringify({
      format: { format_name: 'mov,mp4,m4a,3gp,3g2,mj2', duration: '12.480000' },
      streams: [{ codec_type: 'video' }, { codec_type: 'audio' }],
    });
    const service = new FFmpegService(vi.fn(async () => ok(json)));
    await expect(service.probe('/in/video.mp4')).resolves.toEqual({
      formatName: 'mov,mp4,m4a,3gp,3g2,mj2',
      durationSeconds: 12.48,
      hasVideo: true,
      hasAudio: true,
    });
  });

  it('leaves an unparseable duration unset', async () => {
    const json = JSON.stringify({ format: { format_name: 'mp3', duration: 'N/A' }, streams: [{ codec_type: 'audio' }] });
    const probe = await new FFmpegService(vi.fn(async () => ok(json))).probe('/in/a.mp3');
    expect(probe.durationSeconds).toBeUndefined();
    expect(probe.hasVideo).toBe(false);
  });

  it('turns ffprobe failures into format errors', async () => {
    const service = new FFmpegService(vi.fn(async (): Promise<CommandResult> => {
      throw commandError('moov atom not found\nInvalid data found when processing input');
    }));
    await expect(service.probe('/in/broken.mp4')).rejects.toMatchObject({
      reason: 'format',
      message: 'FFprobe error: moov atom not found Invalid data found when processing input',
    });
  });

  it('checks ffprobe availability', async () => {
    const present = new FFmpegService(vi.fn(async () => ok('ffprobe version 6.0')));
    const missing = new FFmpegService(vi.fn(async (): Promise<CommandResult> => {
      throw commandError('', { notFound: true });
    }));
    await expect(present.isProbeAvailable()).resolves.toBe(true);
    await expect(missing.isProbeAvailable()).resolves.toBe(false);
  });
});

describe('createToolServices', () => {
  const paths = { ffmpeg: 'ffmpeg', ffprobe: 'ffprobe', ytDlp: 'yt-dlp', timeoutMs: 1000 };

  it('only passes --ffmpeg-location for a custom ffmpeg binary', async () => {
    const run = vi.fn(async (_command: string, _args: string[]): Promise<CommandResult> => {
      throw commandError('ERROR: Video unavailable');
    });
    await createToolServices(paths, run).ytdlp.downloadAudio('https://youtu.be/a', TEST_DIR).catch(() => undefined);
    await createToolServices({ ...paths, ffmpeg: '/opt/ffmpeg' }, run).ytdlp.downloadAudio('https://youtu.be/a', TEST_DIR).catch(() => undefined);

    const firstArgs: string[] = run.mock.calls[0]?.[1] ?? [];
    const secondArgs: string[] = run.mock.calls[1]?.[1] ?? [];
    expect(firstArgs).not.toContain('--ffmpeg-location');
    expect(secondArgs).toContain('/opt/ffmpeg');
  });
});
