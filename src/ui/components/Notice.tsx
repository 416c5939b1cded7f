import React, { createContext, useCallback, useContext, useEffect, useRef, useState } from 'react';

export type NoticeKind = 'error' | 'warning';

interface Notice {
  id: number;
  kind: NoticeKind;
  message: string;
}

type Notify = (kind: NoticeKind, message: string) => void;

const DISMISS_AFTER_MS = 5000;

const NoticeContext = createContext<Notify>(() => {});

export const useNotice = () => useContext(NoticeContext);

/** One banner above the active tab; a newer notice replaces the current one. */
export function NoticeProvider({ children }: { children: React.ReactNode }) {
  const [notice, setNotice] = useState<Notice | null>(null);
  const counterRef = useRef(0);

  const notify = useCallback<Notify>((kind, message) => {
    setNotice({ id: ++counterRef.current, kind, message });
  }, []);

  useEffect(() => {
    if (!notice) return;
    const timer = setTimeout(() => {
      setNotice(current => (current?.id === notice.id ? null : current));
    }, DISMISS_AFTER_MS);
    return () => clearTimeout(timer);
  }, [notice]);

  return (
    <NoticeContext.Provider value={notify}>
      {notice && (
        <div className={`notice ${notice.kind}`} role="alert">
          <span>{notice.kind === 'error' ? '❌' : '⚠️'}</span>
          <span className="notice-message">{notice.message}</span>
          <button className="notice-close" aria-label="Dismiss" onClick={() => setNotice(null)}>×</button>
        </div>
      )}
      {children}
    </NoticeContext.Provider>
  );
}
