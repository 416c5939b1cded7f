/**
 * Accent Detector — Core Type Definitions
 */

// ─── Media Sources ────────────────────────────────────────────

export interface LocalFileSource {
  kind: 'local';
  path: string;
  size: number;
  declaredMimeType: string;
}

export interface RemoteUrlSource {
  kind: 'remote';
  url: string;
}

export type MediaSource = LocalFileSource | RemoteUrlSource;

export interface AudioArtifact {
  path: string;
  createdAt: string;
  durationSeconds?: number;
}

// ─── Language & Accent ────────────────────────────────────────

export interface LanguageCandidate {
  languageCode: string;   // e.g. "en-US"
  confidence: number;     // 0..1
}

export type Clarity = 'very clear' | 'clear' | 'moderate';

export interface AccentResult {
  kind: 'accent';
  accentLabel: string;
  languageCode: string;
  confidencePercent: number;   // 0..100
  clarity: Clarity;
  summary: string;
}

export type AbsentReason = 'undetermined' | 'non-english';

export interface Absent {
  kind: 'absent';
  reason: AbsentReason;
  languageCode?: string;
  message: string;
}

export type AccentOutcome = AccentResult | Absent;

export type AccentTable = ReadonlyMap<string, string>;

// ─── Pipeline ─────────────────────────────────────────────────

export type PipelineState = 'validating' | 'acquiring' | 'analyzing' | 'done' | 'failed';

export type ErrorKind =
  | 'validation'
  | 'acquisition'
  | 'forbidden'
  | 'duration_exceeded'
  | 'analysis'
  | 'unexpected';

export interface UploadInput {
  path: string;
  originalName: string;
  size: number;
  mimeType: string;
}

export type PipelineInput =
  | { mode: 'upload'; upload: UploadInput }
  | { mode: 'url'; url: string }
  | { mode: 'path'; value: string };

export interface PipelineDone {
  status: 'done';
  requestId: string;
  result: AccentOutcome;
  durationMs: number;
}

export interface PipelineFailed {
  status: 'failed';
  requestId: string;
  errorKind: ErrorKind;
  error: string;
  tips: string[];
  failedIn: PipelineState;
  durationMs: number;
}

export type PipelineOutcome = PipelineDone | PipelineFailed;

// ─── Collaborators ────────────────────────────────────────────

export interface MediaAcquisition {
  acquireAudio(source: MediaSource, outputDir: string): Promise<AudioArtifact>;
}

export interface AccentAnalyzer {
  identifyLanguage(artifact: AudioArtifact): Promise<LanguageCandidate[]>;
}

export interface MimeDetector {
  readonly name: 'content-sniffer' | 'extension-guesser';
  detect(path: string): Promise<string>;
}

export interface MediaProbe {
  formatName: string;
  durationSeconds?: number;
  hasVideo: boolean;
  hasAudio: boolean;
}

export interface Logger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
}
