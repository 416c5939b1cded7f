import React, { useState } from 'react';
import { analyzeUrl, type Limits } from '../api.js';
import type { PipelineOutcome } from '../../core/types.js';
import { useNotice } from './Notice.js';
import Spinner from './Spinner.js';
import Outcome from './Outcome.js';

export default function UrlTab({ limits }: { limits: Limits | null }) {
  const notify = useNotice();
  const [url, setUrl] = useState('');
  const [running, setRunning] = useState(false);
  const [outcome, setOutcome] = useState<PipelineOutcome | null>(null);

  const analyze = async (e: React.FormEvent) => {
    e.preventDefault();
    if (!url.trim()) {
      notify('warning', 'Please enter a video URL');
      return;
    }
    setRunning(true);
    setOutcome(null);
    try {
      setOutcome(await analyzeUrl(url.trim()));
    } catch (err) {
      notify('error', err instanceof Error ? err.message : 'Request failed');
    } finally {
      setRunning(false);
    }
  };

  if (running) {
    return <Spinner text="Downloading and analyzing..." hint="Fetching the audio track and identifying the spoken language." />;
  }

  return (
    <div className="page">
      <form className="card url-form" onSubmit={e => { void analyze(e); }}>
        <label htmlFor="video-url">Video URL</label>
        <input
          id="video-url"
          type="text"
          placeholder="https://www.youtube.com/watch?v=..."
          value={url}
          onChange={e => setUrl(e.target.value)}
        />
        <button className="btn primary" type="submit">🔍 Analyze Accent</button>
      </form>

      <div className="card help">
        <h4>Supported URLs</h4>
        <ul>
          {limits?.allowedHosts.map(host => <li key={host}>{host}</li>)}
          <li>Direct links ending in {limits?.allowedExtensions.map(ext => `.${ext}`).join(', ') ?? 'a video extension'}</li>
        </ul>
        <p className="upload-hint">Public videos only. Some platforms block automated downloads; uploading the file works instead.</p>
      </div>

      {outcome && <Outcome outcome={outcome} onReset={() => setOutcome(null)} />}
    </div>
  );
}
