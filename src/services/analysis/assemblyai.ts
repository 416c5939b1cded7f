/**
 * AssemblyAI Service — spoken-language identification
 *
 * Uploads the extracted audio, waits for the transcript, and returns the
 * detected language as a ranked candidate list.
 */

import { AssemblyAI } from 'assemblyai';
import { AnalysisError, toError } from '../../core/errors.js';
import type { AccentAnalyzer, AudioArtifact, LanguageCandidate, Logger } from '../../core/types.js';

export interface TranscriptRequest {
  audio: string;
  language_detection: boolean;
  speaker_labels: boolean;
  auto_highlights: boolean;
}

export interface TranscriptPayload {
  id?: string;
  status: string;
  error?: string | null;
  language_code?: string | null;
  language_confidence?: number | null;
}

export interface TranscriptClient {
  transcribe(params: TranscriptRequest): Promise<TranscriptPayload>;
}

export function createAssemblyAiClient(apiKey: string): TranscriptClient {
  const client = new AssemblyAI({ apiKey });
  return {
    transcribe: params => client.transcripts.transcribe(params),
  };
}

// AssemblyAI writes region codes in lower case with underscores, and uses
// "uk" where BCP-47 uses "GB".
const REGION_ALIASES: Record<string, string> = { UK: 'GB' };

export function normalizeLanguageCode(code: string): string {
  const [language = '', ...rest] = code.trim().split(/[_-]/);
  const parts = [language.toLowerCase()];
  for (const part of rest) {
    if (part.length === 2) {
      const region = part.toUpperCase();
      parts.push(REGION_ALIASES[region] ?? region);
    } else {
      parts.push(part.toUpperCase());
    }
  }
  return parts.filter(Boolean).join('-');
}

function clampConfidence(value: number | null | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function toCandidates(transcript: TranscriptPayload): LanguageCandidate[] {
  if (!transcript.language_code) return [];
  return [{
    languageCode: normalizeLanguageCode(transcript.language_code),
    confidence: clampConfidence(transcript.language_confidence),
  }];
}

export class AssemblyAiAnalyzer implements AccentAnalyzer {
  constructor(
    private readonly client: TranscriptClient,
    private readonly logger: Logger,
  ) {}

  async identifyLanguage(artifact: AudioArtifact): Promise<LanguageCandidate[]> {
    const started = Date.now();
    let transcript: TranscriptPayload;
    try {
      transcript = await this.client.transcribe({
        audio: artifact.path,
        language_detection: true,
        speaker_labels: true,
        auto_highlights: true,
      });
    } catch (err) {
      throw new AnalysisError(`Transcription service request failed: ${toError(err).message}`, toError(err));
    }

    if (transcript.status === 'error') {
      throw new AnalysisError(`Transcription failed: ${transcript.error ?? 'unknown error'}`);
    }

    const candidates = toCandidates(transcript);
    this.logger.info('Language identified', {
      transcriptId: transcript.id,
      languageCode: candidates[0]?.languageCode ?? null,
      confidence: candidates[0]?.confidence ?? null,
      ms: Date.now() - started,
    });
    return candidates;
  }
}
