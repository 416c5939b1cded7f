/**
 * Media Acquisition
 *
 * Local video → ffmpeg transcode; remote URL → yt-dlp fetch + extract.
 * Either way the result is one MP3 inside the caller's scratch directory.
 */

import { join } from 'path';
import type { FFmpegService } from '../tools/ffmpeg.js';
import type { YtDlpService } from '../tools/ytdlp.js';
import type { AudioArtifact, Logger, MediaAcquisition, MediaSource } from '../../core/types.js';

export const LOCAL_AUDIO_NAME = 'audio.mp3';

export class MediaAcquisitionService implements MediaAcquisition {
  constructor(
    private readonly ffmpeg: FFmpegService,
    private readonly ytdlp: YtDlpService,
    private readonly logger: Logger,
  ) {}

  async acquireAudio(source: MediaSource, outputDir: string): Promise<AudioArtifact> {
    const started = Date.now();

    if (source.kind === 'local') {
      const output = await this.ffmpeg.extractAudio(source.path, join(outputDir, LOCAL_AUDIO_NAME));
      const probe = await this.ffmpeg.probe(output);
      this.logger.info('Audio extracted from upload', {
        durationSeconds: probe.durationSeconds,
        ms: Date.now() - started,
      });
      return { path: output, createdAt: new Date().toISOString(), durationSeconds: probe.durationSeconds };
    }

    const download = await this.ytdlp.downloadAudio(source.url, outputDir);
    const durationSeconds = download.durationSeconds ?? (await this.ffmpeg.probe(download.path)).durationSeconds;
    this.logger.info('Audio downloaded', {
      id: download.id,
      title: download.title?.slice(0, 80),
      durationSeconds,
      ms: Date.now() - started,
    });
    return { path: download.path, createdAt: new Date().toISOString(), durationSeconds };
  }
}
