import React from 'react';

interface Props {
  error: string;
  tips: string[];
  onRetry?: () => void;
}

export default function FailurePanel({ error, tips, onRetry }: Props) {
  return (
    <div className="card failure-panel">
      <p className="failure-message">❌ {error}</p>
      {tips.length > 0 && (
        <>
          <p className="failure-tips-title">Please ensure:</p>
          <ul className="failure-tips">
            {tips.map(tip => <li key={tip}>{tip}</li>)}
          </ul>
        </>
      )}
      {onRetry && <button className="btn" onClick={onRetry}>↻ Try again</button>}
    </div>
  );
}
