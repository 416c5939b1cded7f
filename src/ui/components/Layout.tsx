import React from 'react';

export type Tab = 'upload' | 'url';

export const TABS: { tab: Tab; icon: string; label: string }[] = [
  { tab: 'upload', icon: '📤', label: 'Upload File' },
  { tab: 'url', icon: '🔗', label: 'Video URL' },
];

interface Props {
  currentTab: Tab;
  onSelect: (tab: Tab) => void;
  version?: string;
  children: React.ReactNode;
}

export default function Layout({ currentTab, onSelect, version, children }: Props) {
  return (
    <div className="layout">
      <header className="top-bar">
        <span className="logo">🎙️</span>
        <div>
          <h1 className="logo-text">English Accent Detector</h1>
          <p className="subtitle">Upload a video or paste a link to find out which English accent is spoken.</p>
        </div>
      </header>
      <nav className="tabs">
        {TABS.map(item => (
          <button
            key={item.tab}
            className={`tab ${currentTab === item.tab ? 'active' : ''}`}
            onClick={() => onSelect(item.tab)}
          >
            <span className="tab-icon">{item.icon}</span>
            <span className="tab-label">{item.label}</span>
          </button>
        ))}
      </nav>
      <main className="content">{children}</main>
      <footer className="footer">
        {version && <span className="version">v{version}</span>}
        <span>Language identification by AssemblyAI</span>
      </footer>
    </div>
  );
}
