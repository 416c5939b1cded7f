/**
 * Tool Services — FFmpeg and yt-dlp wrappers over child processes
 */

import { createCommandRunner, type CommandRunner } from './runner.js';
import { FFmpegService } from './ffmpeg.js';
import { YtDlpService } from './ytdlp.js';
import type { ToolPaths } from '../../core/config.js';

export interface ToolServices {
  ffmpeg: FFmpegService;
  ytdlp: YtDlpService;
}

export function createToolServices(paths: ToolPaths, run: CommandRunner = createCommandRunner(paths.timeoutMs)): ToolServices {
  // Only point yt-dlp at ffmpeg when a custom binary is configured.
  const ffmpegLocation = paths.ffmpeg === 'ffmpeg' ? undefined : paths.ffmpeg;
  return {
    ffmpeg: new FFmpegService(run, paths.ffmpeg, paths.ffprobe),
    ytdlp: new YtDlpService(run, paths.ytDlp, ffmpegLocation),
  };
}
