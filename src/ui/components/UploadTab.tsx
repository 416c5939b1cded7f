import React, { useState, useRef } from 'react';
import { analyzeUpload, type Limits } from '../api.js';
import { checkFile, formatBytes } from '../utils.js';
import type { PipelineOutcome } from '../../core/types.js';
import { useNotice } from './Notice.js';
import Spinner from './Spinner.js';
import Outcome from './Outcome.js';

export default function UploadTab({ limits }: { limits: Limits | null }) {
  const notify = useNotice();
  const [file, setFile] = useState<File | null>(null);
  const [dragOver, setDragOver] = useState(false);
  const [running, setRunning] = useState(false);
  const [outcome, setOutcome] = useState<PipelineOutcome | null>(null);
  const fileRef = useRef<HTMLInputElement>(null);

  const pick = (files: FileList | null) => {
    const picked = files?.[0];
    if (!picked) return;
    const problem = limits ? checkFile(picked, limits) : null;
    if (problem) {
      notify('error', problem);
      return;
    }
    setOutcome(null);
    setFile(picked);
  };

  const handleDrop = (e: React.DragEvent) => {
    e.preventDefault();
    setDragOver(false);
    pick(e.dataTransfer.files);
  };

  const analyze = async () => {
    if (!file) return;
    setRunning(true);
    try {
      setOutcome(await analyzeUpload(file));
    } catch (err) {
      notify('error', err instanceof Error ? err.message : 'Upload failed');
    } finally {
      setRunning(false);
    }
  };

  const reset = () => {
    setOutcome(null);
    setFile(null);
  };

  if (running) {
    return <Spinner text="Analyzing accent..." hint="Extracting audio and identifying the spoken language. This can take a minute." />;
  }

  return (
    <div className="page">
      <div
        className={`card upload-zone ${dragOver ? 'drag-over' : ''}`}
        onDragOver={e => { e.preventDefault(); setDragOver(true); }}
        onDragLeave={() => setDragOver(false)}
        onDrop={handleDrop}
        onClick={() => fileRef.current?.click()}
      >
        <input
          ref={fileRef}
          type="file"
          accept={limits?.allowedExtensions.map(ext => `.${ext}`).join(',')}
          style={{ display: 'none' }}
          onChange={e => pick(e.target.files)}
        />
        {file ? (
          <>
            <p className="upload-icon">🎬</p>
            <p>{file.name}</p>
            <p className="upload-hint">{formatBytes(file.size)}</p>
          </>
        ) : (
          <>
            <p className="upload-icon">📤</p>
            <p>Drop a video here or click to choose one</p>
            {limits && (
              <p className="upload-hint">
                {limits.allowedExtensions.join(', ').toUpperCase()} · up to {formatBytes(limits.maxUploadBytes)} · at most {limits.maxDurationSeconds / 60} minutes
              </p>
            )}
          </>
        )}
      </div>

      <button className="btn primary" disabled={!file} onClick={() => { void analyze(); }}>
        🔍 Analyze Accent
      </button>

      {outcome && <Outcome outcome={outcome} onReset={reset} />}
    </div>
  );
}
