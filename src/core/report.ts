import { formatPercent } from './accent/mapper.js';
import type { PipelineOutcome } from './types.js';

/** Plain-text rendering of a pipeline outcome, as printed by the CLI. */
export function formatOutcome(outcome: PipelineOutcome): string {
  if (outcome.status === 'failed') {
    return [
      `❌ ${outcome.error}`,
      '',
      'Please ensure:',
      ...outcome.tips.map(tip => `  - ${tip}`),
    ].join('\n');
  }

  const { result } = outcome;
  if (result.kind === 'absent') {
    return [
      '⚠️  Could not detect English accent in the video. Please ensure the video contains clear English speech.',
      `   (${result.message})`,
    ].join('\n');
  }

  return [
    `Detected Accent:  ${result.accentLabel}`,
    `Confidence Score: ${formatPercent(result.confidencePercent)}`,
    '',
    result.summary,
  ].join('\n');
}
