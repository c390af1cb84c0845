import React, { useCallback, useEffect, useRef, useState } from 'react';
import type { ItineraryCharts, WeekdayNumber } from '@commute-dashboard/core';
import { getItineraryCharts } from '../api.js';
import { describeWeekdaySelection } from '../chartData.js';
import { usePolling } from '../hooks/usePolling.js';
import { RequestSequence } from '../requestSequence.js';
import ChartPanelView from './ChartPanelView.js';
import DayFilter from './DayFilter.js';
import ErrorBanner from './ErrorBanner.js';

interface ItineraryViewProps {
  token: string | undefined;
  itineraryId: string;
  refreshIntervalMs: number;
  onError: (error: unknown) => void;
}

export default function ItineraryView({
  token,
  itineraryId,
  refreshIntervalMs,
  onError,
}: ItineraryViewProps) {
  const [weekdays, setWeekdays] = useState<WeekdayNumber[]>([]);
  const [charts, setCharts] = useState<ItineraryCharts | null>(null);
  const [error, setError] = useState<string | null>(null);

  const requests = useRef(new RequestSequence());

  const refresh = useCallback(() => {
    const id = requests.current.next();
    getItineraryCharts(token, itineraryId, weekdays)
      .then((next) => {
        if (!requests.current.isCurrent(id)) return;
        setCharts(next);
        setError(null);
      })
      .catch((err: unknown) => {
        if (!requests.current.isCurrent(id)) return;
        setError(err instanceof Error ? err.message : 'Failed to load charts');
        onError(err);
      });
  }, [token, itineraryId, weekdays, onError]);

  useEffect(refresh, [refresh]);
  usePolling(refresh, refreshIntervalMs);

  return (
    <div>
      <div style={{ margin: '16px 0' }}>
        <DayFilter selected={weekdays} onChange={setWeekdays} />
        <div style={{ color: '#666', fontSize: 13, marginTop: 4 }}>
          Showing: {describeWeekdaySelection(weekdays)}
        </div>
      </div>
      {error && <ErrorBanner message={error} />}
      {charts?.panels.map((panel) => <ChartPanelView key={panel.fileName} panel={panel} />)}
      {charts && charts.panels.length === 0 && <p>No data files for this itinerary.</p>}
    </div>
  );
}
