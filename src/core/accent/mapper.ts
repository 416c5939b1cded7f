/**
 * Accent Mapper
 *
 * Turns the ranked language candidates from the analysis service into a
 * display result. Pure; only the top-ranked candidate is ever examined.
 */

import { DEFAULT_ACCENT_TABLE, FALLBACK_ACCENT_LABEL } from './table.js';
import type { AccentOutcome, AccentTable, Clarity, LanguageCandidate } from '../types.js';

const ENGLISH_PREFIX = 'en';

/** Thresholds are applied to the raw 0..1 confidence so 0.9 and 0.7 stay exact. */
export function clarityFor(confidence: number): Clarity {
  if (confidence > 0.9) return 'very clear';
  if (confidence > 0.7) return 'clear';
  return 'moderate';
}

export function formatPercent(confidencePercent: number): string {
  return `${confidencePercent.toFixed(1)}%`;
}

/** "an American English accent", "a British English accent", "an Other English accent". */
export function describeAccent(label: string): string {
  const article = /^[aeiou]/i.test(label) ? 'an' : 'a';
  const noun = label.endsWith('English') ? label : `${label} English`;
  return `${article} ${noun} accent`;
}

export function buildSummary(label: string, confidencePercent: number, clarity: Clarity): string {
  return (
    `Detected ${describeAccent(label)} with ${formatPercent(confidencePercent)} confidence. ` +
    `The speech is ${clarity} throughout the recording.`
  );
}

export function lookupAccent(languageCode: string, table: AccentTable = DEFAULT_ACCENT_TABLE): string {
  return table.get(languageCode) ?? FALLBACK_ACCENT_LABEL;
}

export function mapResult(
  candidates: readonly LanguageCandidate[],
  table: AccentTable = DEFAULT_ACCENT_TABLE,
): AccentOutcome {
  const top = candidates[0];
  if (!top) {
    return {
      kind: 'absent',
      reason: 'undetermined',
      message: 'Could not detect language or accent',
    };
  }

  if (!top.languageCode.toLowerCase().startsWith(ENGLISH_PREFIX)) {
    return {
      kind: 'absent',
      reason: 'non-english',
      languageCode: top.languageCode,
      message: `Non-English speech detected (${top.languageCode})`,
    };
  }

  const accentLabel = lookupAccent(top.languageCode, table);
  const confidencePercent = top.confidence * 100;
  const clarity = clarityFor(top.confidence);

  return {
    kind: 'accent',
    accentLabel,
    languageCode: top.languageCode,
    confidencePercent,
    clarity,
    summary: buildSummary(accentLabel, confidencePercent, clarity),
  };
}
