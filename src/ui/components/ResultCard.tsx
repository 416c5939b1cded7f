import React from 'react';
import type { AccentOutcome } from '../../core/types.js';
import { formatPercent, progressWidth } from '../utils.js';

const CLARITY_CLASS: Record<string, string> = {
  'very clear': 'clarity-high',
  clear: 'clarity-mid',
  moderate: 'clarity-low',
};

export default function ResultCard({ result }: { result: AccentOutcome }) {
  if (result.kind === 'absent') {
    return (
      <div className="card result-card absent">
        <h3>⚠️ Could not detect English accent in the video</h3>
        <p>Please ensure the video contains clear English speech.</p>
        <p className="result-message">{result.message}</p>
      </div>
    );
  }

  return (
    <div className="card result-card">
      <h3>✅ Analysis complete</h3>
      <div className="metrics">
        <div className="metric">
          <div className="metric-label">Detected Accent</div>
          <div className="metric-value">{result.accentLabel}</div>
          <code className="metric-code">{result.languageCode}</code>
        </div>
        <div className="metric">
          <div className="metric-label">Confidence Score</div>
          <div className="metric-value">{formatPercent(result.confidencePercent)}</div>
          <div className="progress">
            <div className="progress-bar" style={{ width: progressWidth(result.confidencePercent) }} />
          </div>
        </div>
      </div>
      <div className="summary">
        <h4>Analysis Summary</h4>
        <p>{result.summary}</p>
        <span className={`badge ${CLARITY_CLASS[result.clarity] ?? ''}`}>{result.clarity}</span>
      </div>
    </div>
  );
}
