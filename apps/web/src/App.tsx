import React, { useCallback, useEffect, useState } from 'react';
import type { ItinerarySummary, SessionInfo } from '@commute-dashboard/core';
import { getItineraries, getSession, isUnauthorized, logout } from './api.js';
import ErrorBanner from './components/ErrorBanner.js';
import ItineraryTabs from './components/ItineraryTabs.js';
import ItineraryView from './components/ItineraryView.js';
import Login from './components/Login.js';

export default function App() {
  // Held in memory only: a reload asks for the password again.
  const [token, setToken] = useState<string | undefined>(undefined);
  const [session, setSession] = useState<SessionInfo | null>(null);
  const [itineraries, setItineraries] = useState<ItinerarySummary[]>([]);
  const [activeId, setActiveId] = useState<string | undefined>(undefined);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    getSession(token)
      .then(setSession)
      .catch((err: unknown) => setError(err instanceof Error ? err.message : 'Server unreachable'));
  }, [token]);

  const handleError = useCallback((err: unknown) => {
    if (isUnauthorized(err)) {
      setToken(undefined);
      setSession((prev) => (prev ? { ...prev, authenticated: false } : prev));
    }
  }, []);

  useEffect(() => {
    if (!session?.authenticated) return;
    getItineraries(token)
      .then((list) => {
        setItineraries(list);
        setActiveId((current) =>
          current !== undefined && list.some((i) => i.id === current) ? current : list[0]?.id,
        );
      })
      .catch((err: unknown) => {
        setError(err instanceof Error ? err.message : 'Failed to load itineraries');
        handleError(err);
      });
  }, [session, token, handleError]);

  const handleLogout = () => {
    if (token !== undefined) {
      logout(token).catch((err: unknown) => console.warn('[App] logout failed', err));
    }
    setToken(undefined);
    setItineraries([]);
  };

  if (session && !session.authenticated) {
    return <Login onAuthed={setToken} />;
  }

  return (
    <div style={{ maxWidth: 1100, margin: '0 auto', padding: 24, fontFamily: 'sans-serif' }}>
      <header style={{ display: 'flex', alignItems: 'baseline', justifyContent: 'space-between' }}>
        <h1 style={{ fontSize: 24 }}>Commuting time dashboard</h1>
        <div style={{ color: '#666', fontSize: 13 }}>
          {session && <span>Times in {session.timeZone} </span>}
          {session?.passwordRequired && <button onClick={handleLogout}>Log out</button>}
        </div>
      </header>
      {error && <ErrorBanner message={error} />}
      {session && itineraries.length === 0 && !error && <p>No commute data yet.</p>}
      <ItineraryTabs itineraries={itineraries} activeId={activeId} onSelect={setActiveId} />
      {session && activeId !== undefined && (
        <ItineraryView
          key={activeId}
          token={token}
          itineraryId={activeId}
          refreshIntervalMs={session.refreshIntervalMs}
          onError={handleError}
        />
      )}
    </div>
  );
}
