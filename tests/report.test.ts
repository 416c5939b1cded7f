import { describe, it, expect } from 'vitest';
import { formatOutcome } from '../src/core/report.js';

describe('formatOutcome', () => {
  it('renders a detected accent', () => {
    const text = formatOutcome({
      status: 'done',
      requestId: 'req_1',
      durationMs: 10,
      result: {
        kind: 'accent',
        accentLabel: 'Australian',
        languageCode: 'en-AU',
        confidencePercent: 81.25,
        clarity: 'clear',
        summary: 'Detected an Australian English accent with 81.3% confidence. The speech is clear throughout the recording.',
      },
    });
    expect(text.split('\n')).toEqual([
      'Detected Accent:  Australian',
      'Confidence Score: 81.3%',
      '',
      'Detected an Australian English accent with 81.3% confidence. The speech is clear throughout the recording.',
    ]);
  });

  it('renders an absent result with the reason', () => {
    const text = formatOutcome({
      status: 'done',
      requestId: 'req_2',
      durationMs: 10,
      result: { kind: 'absent', reason: 'non-english', languageCode: 'de', message: 'Non-English speech detected (de)' },
    });
    expect(text.split('\n')[1]).toBe('   (Non-English speech detected (de))');
  });

  it('renders a failure with tips', () => {
    const text = formatOutcome({
      status: 'failed',
      requestId: 'req_3',
      errorKind: 'validation',
      error: 'Please enter a video URL',
      tips: ['The video URL is publicly accessible'],
      failedIn: 'validating',
      durationMs: 1,
    });
    expect(text).toBe('❌ Please enter a video URL\n\nPlease ensure:\n  - The video URL is publicly accessible');
  });
});
