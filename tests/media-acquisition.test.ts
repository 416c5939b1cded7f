import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { MediaAcquisitionService } from '../src/services/media/acquisition.js';
import { FFmpegService } from '../src/services/tools/ffmpeg.js';
import { YtDlpService } from '../src/services/tools/ytdlp.js';
import type { CommandResult } from '../src/services/tools/runner.js';

const TEST_DIR = join(import.meta.dirname ?? '.', '__acquisition_tmp__');

const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

function probeJson(duration: string): string {
  return JSON.stringify({ format: { format_name: 'mp3', duration }, streams: [{ codec_type: 'audio' }] });
}

function fakeRunner(ytDlpStdout: string, probeDuration: string) {
  return vi.fn(async (command: string, args: string[]): Promise<CommandResult> => {
    if (command === 'ffmpeg') {
      writeFileSync(args[args.length - 1] ?? '', 'mp3');
      return { stdout: '', stderr: '' };
    }
    if (command === 'ffprobe') {
      return { stdout: probeJson(probeDuration), stderr: '' };
    }
    writeFileSync(join(TEST_DIR, 'vid1.mp3'), 'mp3');
    return { stdout: ytDlpStdout, stderr: '' };
  });
}

function build(run: ReturnType<typeof fakeRunner>) {
  return new MediaAcquisitionService(new FFmpegService(run), new YtDlpService(run), logger);
}

describe('MediaAcquisitionService', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('transcodes a local video and probes its duration', async () => {
    const run = fakeRunner('', '30.5');
    const artifact = await build(run).acquireAudio(
      { kind: 'local', path: '/uploads/talk.mp4', size: 100, declaredMimeType: 'video/mp4' },
      TEST_DIR,
    );

    expect(artifact.path).toBe(join(TEST_DIR, 'audio.mp3'));
    expect(artifact.durationSeconds).toBe(30.5);
    expect(run.mock.calls.map(c => c[0])).toEqual(['ffmpeg', 'ffprobe']);
  });

  it('downloads a remote video and keeps the reported duration', async () => {
    const run = fakeRunner('{"id":"vid1","duration":95}', '1');
    const artifact = await build(run).acquireAudio({ kind: 'remote', url: 'https://youtu.be/vid1' }, TEST_DIR);

    expect(artifact.path).toBe(join(TEST_DIR, 'vid1.mp3'));
    expect(artifact.durationSeconds).toBe(95);
    expect(run.mock.calls.map(c => c[0])).toEqual(['yt-dlp']);
  });

  it('probes the download when no duration was reported', async () => {
    const run = fakeRunner('{"id":"vid1"}', '61.25');
    const artifact = await build(run).acquireAudio({ kind: 'remote', url: 'https://youtu.be/vid1' }, TEST_DIR);

    expect(artifact.durationSeconds).toBe(61.25);
    expect(run.mock.calls.map(c => c[0])).toEqual(['yt-dlp', 'ffprobe']);
  });
});
