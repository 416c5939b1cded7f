import { describe, it, expect, vi } from 'vitest';
import {
  ContentSniffer,
  ExtensionGuesser,
  mimeFromExtension,
  mimeFromProbe,
  selectMimeDetector,
} from '../src/core/input/mime.js';
import type { MediaProbe } from '../src/core/types.js';

describe('mimeFromExtension', () => {
  it('maps known extensions case-insensitively', () => {
    expect(mimeFromExtension('/a/b/clip.MP4')).toBe('video/mp4');
    expect(mimeFromExtension('clip.mov')).toBe('video/quicktime');
    expect(mimeFromExtension('clip.avi')).toBe('video/x-msvideo');
    expect(mimeFromExtension('clip.mkv')).toBe('video/x-matroska');
    expect(mimeFromExtension('song.mp3')).toBe('audio/mpeg');
    expect(mimeFromExtension('unknown.bin')).toBe('application/octet-stream');
  });
});

describe('mimeFromProbe', () => {
  it('maps ffprobe container names for video', () => {
    expect(mimeFromProbe('mov,mp4,m4a,3gp,3g2,mj2', true, true, 'a.mp4')).toBe('video/mp4');
    expect(mimeFromProbe('mov,mp4,m4a,3gp,3g2,mj2', true, true, 'a.mov')).toBe('video/quicktime');
    expect(mimeFromProbe('matroska,webm', true, true, 'a.mkv')).toBe('video/x-matroska');
    expect(mimeFromProbe('matroska,webm', true, false, 'a.webm')).toBe('video/webm');
    expect(mimeFromProbe('avi', true, true, 'a.avi')).toBe('video/x-msvideo');
    expect(mimeFromProbe('flv', true, true, 'a.flv')).toBe('video/flv');
  });

  it('does not trust the extension for audio-only or image content', () => {
    expect(mimeFromProbe('mp3', false, true, 'fake.mp4')).toBe('audio/mpeg');
    expect(mimeFromProbe('wav', false, true, 'fake.mp4')).toBe('audio/wav');
    expect(mimeFromProbe('png_pipe', true, false, 'fake.mp4')).toBe('image/png');
    expect(mimeFromProbe('tty', false, false, 'fake.mp4')).toBe('application/octet-stream');
  });
});

describe('detectors', () => {
  it('ExtensionGuesser uses the file name', async () => {
    await expect(new ExtensionGuesser().detect('x.avi')).resolves.toBe('video/x-msvideo');
  });

  it('ContentSniffer uses the probe result', async () => {
    const probe: MediaProbe = { formatName: 'mp3', hasVideo: false, hasAudio: true, durationSeconds: 3 };
    const sniffer = new ContentSniffer({ probe: vi.fn(async () => probe) });
    await expect(sniffer.detect('renamed.mp4')).resolves.toBe('audio/mpeg');
  });

  it('selects the content sniffer when ffprobe is available', async () => {
    const detector = await selectMimeDetector({
      probe: vi.fn(),
      isProbeAvailable: vi.fn(async () => true),
    });
    expect(detector.name).toBe('content-sniffer');
  });

  it('falls back to the extension guesser and logs the choice', async () => {
    const info = vi.fn();
    const logger = { info, warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const detector = await selectMimeDetector({ probe: vi.fn(), isProbeAvailable: vi.fn(async () => false) }, logger);
    expect(detector.name).toBe('extension-guesser');
    expect(info).toHaveBeenCalledWith('MIME detection strategy selected', { strategy: 'extension-guesser' });
  });
});
