import React from 'react';

export default function Spinner({ text, hint }: { text?: string; hint?: string }) {
  return (
    <div className="spinner-container">
      <div className="spinner" />
      {text && <div className="spinner-text">{text}</div>}
      {hint && <div className="spinner-hint">{hint}</div>}
    </div>
  );
}
