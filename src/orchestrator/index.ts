/**
 * Accent Orchestrator
 *
 * One request = one sequential pipeline:
 *   validating → acquiring → analyzing → done
 * with `failed` reachable from every state. Each run owns a scratch
 * directory that is released on every exit path.
 */

import { nanoid } from 'nanoid';
import { mapResult } from '../core/accent/mapper.js';
import { DEFAULT_ACCENT_TABLE } from '../core/accent/table.js';
import { AcquisitionError, AnalysisError, DurationExceededError, ValidationError, toError } from '../core/errors.js';
import { isUrl, resolveInput, resolveUpload, validateUrl } from '../core/input/resolver.js';
import { MAX_DURATION_SECONDS } from '../core/limits.js';
import { allocateScratchDir, cleanup, type ScratchDir } from '../core/storage/scratch.js';
import type {
  AccentAnalyzer,
  AccentTable,
  AudioArtifact,
  ErrorKind,
  Logger,
  MediaAcquisition,
  MediaSource,
  MimeDetector,
  PipelineInput,
  PipelineOutcome,
  PipelineState,
  UploadInput,
} from '../core/types.js';

export const UPLOAD_TIPS: readonly string[] = [
  'The video file is in a supported format (mp4, mov, avi, mkv)',
  'The video contains clear speech',
  'The video is not too long (recommended: 1-5 minutes)',
];

export const URL_TIPS: readonly string[] = [
  'The video URL is publicly accessible',
  'The video contains clear speech',
  'The video is not too long (recommended: 1-5 minutes)',
];

export interface OrchestratorDeps {
  acquisition: MediaAcquisition;
  analyzer: AccentAnalyzer;
  mimeDetector: MimeDetector;
  logger: Logger;
  accentTable?: AccentTable;
  maxDurationSeconds?: number;
  /** Parent directory for per-request scratch dirs; defaults to the OS temp root. */
  scratchRoot?: string;
  onStateChange?: (requestId: string, state: PipelineState) => void;
}

export function classifyError(err: unknown): ErrorKind {
  if (err instanceof ValidationError) return 'validation';
  if (err instanceof DurationExceededError) return 'duration_exceeded';
  if (err instanceof AcquisitionError) return err.reason === 'forbidden' ? 'forbidden' : 'acquisition';
  if (err instanceof AnalysisError) return 'analysis';
  return 'unexpected';
}

function tipsFor(input: PipelineInput): string[] {
  const remote = input.mode === 'url' || (input.mode === 'path' && isUrl(input.value.trim()));
  return [...(remote ? URL_TIPS : UPLOAD_TIPS)];
}

export class Orchestrator {
  private readonly accentTable: AccentTable;
  private readonly maxDurationSeconds: number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.accentTable = deps.accentTable ?? DEFAULT_ACCENT_TABLE;
    this.maxDurationSeconds = deps.maxDurationSeconds ?? MAX_DURATION_SECONDS;
  }

  get mimeDetectorName(): MimeDetector['name'] {
    return this.deps.mimeDetector.name;
  }

  listAccents(): Array<{ code: string; label: string }> {
    return Array.from(this.accentTable, ([code, label]) => ({ code, label }));
  }

  /** `requestId` lets the HTTP layer reuse its own id; one is generated otherwise. */
  analyzeUpload(upload: UploadInput, requestId?: string): Promise<PipelineOutcome> {
    return this.run({ mode: 'upload', upload }, requestId);
  }

  analyzeUrl(url: string, requestId?: string): Promise<PipelineOutcome> {
    return this.run({ mode: 'url', url }, requestId);
  }

  /** URL or local path, as typed on the command line. */
  analyze(value: string): Promise<PipelineOutcome> {
    return this.run({ mode: 'path', value });
  }

  private async resolve(input: PipelineInput): Promise<MediaSource> {
    switch (input.mode) {
      case 'upload': return resolveUpload(input.upload, this.deps.mimeDetector);
      case 'url': return validateUrl(input.url);
      case 'path': return resolveInput(input.value, this.deps.mimeDetector);
    }
  }

  private async run(input: PipelineInput, requestId: string = `req_${nanoid(10)}`): Promise<PipelineOutcome> {
    const { logger } = this.deps;
    const started = Date.now();
    let state: PipelineState = 'validating';
    let scratch: ScratchDir | null = null;
    let artifact: AudioArtifact | null = null;

    const enter = (next: PipelineState) => {
      state = next;
      this.deps.onStateChange?.(requestId, next);
    };

    this.deps.onStateChange?.(requestId, state);

    try {
      const source = await this.resolve(input);

      enter('acquiring');
      scratch = allocateScratchDir(logger, this.deps.scratchRoot);
      artifact = await this.deps.acquisition.acquireAudio(source, scratch.path);
      if (artifact.durationSeconds !== undefined && artifact.durationSeconds > this.maxDurationSeconds) {
        throw new DurationExceededError(artifact.durationSeconds, this.maxDurationSeconds);
      }

      enter('analyzing');
      const candidates = await this.deps.analyzer.identifyLanguage(artifact);
      const result = mapResult(candidates, this.accentTable);

      enter('done');
      const durationMs = Date.now() - started;
      logger.info('Accent analysis complete', {
        requestId,
        mode: input.mode,
        outcome: result.kind,
        accent: result.kind === 'accent' ? result.accentLabel : result.reason,
        durationMs,
      });
      return { status: 'done', requestId, result, durationMs };
    } catch (err) {
      const failedIn: PipelineState = state;
      enter('failed');
      const errorKind = classifyError(err);
      const message = errorKind === 'unexpected'
        ? `An unexpected error occurred: ${toError(err).message}`
        : toError(err).message;

      const meta = { requestId, mode: input.mode, failedIn, errorKind, error: toError(err).message };
      if (errorKind === 'unexpected') {
        logger.error('Accent analysis failed', { ...meta, stack: toError(err).stack });
      } else {
        logger.warn('Accent analysis failed', meta);
      }

      return {
        status: 'failed',
        requestId,
        errorKind,
        error: message,
        tips: tipsFor(input),
        failedIn,
        durationMs: Date.now() - started,
      };
    } finally {
      // Artifacts may live outside the scratch dir (adapter-chosen paths).
      if (artifact) cleanup(artifact.path, logger, this.deps.scratchRoot);
      scratch?.release();
    }
  }
}
