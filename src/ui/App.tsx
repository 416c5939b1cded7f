import React, { useEffect, useState } from 'react';
import Layout, { TABS, type Tab } from './components/Layout.js';
import UploadTab from './components/UploadTab.js';
import UrlTab from './components/UrlTab.js';
import ErrorBoundary from './components/ErrorBoundary.js';
import { NoticeProvider } from './components/Notice.js';
import { getHealth, getLimits, type Limits } from './api.js';

function getTabFromHash(): Tab {
  return window.location.hash.slice(1) === 'url' ? 'url' : 'upload';
}

export default function App() {
  const [tab, setTab] = useState<Tab>(getTabFromHash);
  const [limits, setLimits] = useState<Limits | null>(null);
  const [version, setVersion] = useState<string | undefined>();
  const [resetKey, setResetKey] = useState(0);

  useEffect(() => {
    const handler = () => setTab(getTabFromHash());
    window.addEventListener('hashchange', handler);
    return () => window.removeEventListener('hashchange', handler);
  }, []);

  useEffect(() => {
    getLimits().then(setLimits).catch(() => setLimits(null));
    getHealth().then(h => setVersion(h.version)).catch(() => setVersion(undefined));
  }, []);

  const select = (t: Tab) => {
    window.location.hash = t;
    setTab(t);
  };

  const viewLabel = TABS.find(t => t.tab === tab)?.label ?? tab;

  return (
    <Layout currentTab={tab} onSelect={select} version={version}>
      <NoticeProvider>
        <ErrorBoundary view={viewLabel} onReset={() => setResetKey(k => k + 1)}>
          <React.Fragment key={`${tab}-${resetKey}`}>
            {tab === 'upload' ? <UploadTab limits={limits} /> : <UrlTab limits={limits} />}
          </React.Fragment>
        </ErrorBoundary>
      </NoticeProvider>
    </Layout>
  );
}
