import React from 'react';
import type { PipelineOutcome } from '../../core/types.js';
import ResultCard from './ResultCard.js';
import FailurePanel from './FailurePanel.js';

export default function Outcome({ outcome, onReset }: { outcome: PipelineOutcome; onReset: () => void }) {
  if (outcome.status === 'failed') {
    return <FailurePanel error={outcome.error} tips={outcome.tips} onRetry={onReset} />;
  }
  return (
    <>
      <ResultCard result={outcome.result} />
      <p className="request-meta">
        Request <code>{outcome.requestId}</code> · {(outcome.durationMs / 1000).toFixed(1)}s
      </p>
    </>
  );
}
