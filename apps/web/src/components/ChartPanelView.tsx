import React, { useMemo } from 'react';
import type { ChartPanel } from '@commute-dashboard/core';
import { pivotWeekdayRows, toTimeOfDaySeries } from '../chartData.js';
import ErrorBanner from './ErrorBanner.js';
import TimeOfDayChart from './TimeOfDayChart.js';
import WeekdayChart from './WeekdayChart.js';

export default function ChartPanelView({ panel }: { panel: ChartPanel }) {
  const series = useMemo(() => toTimeOfDaySeries(panel.byTime), [panel.byTime]);
  const pivot = useMemo(() => pivotWeekdayRows(panel.byWeekday), [panel.byWeekday]);

  return (
    <section style={{ marginBottom: 32 }}>
      <h2 style={{ fontSize: 18, marginBottom: 4 }}>{panel.title}</h2>
      <div style={{ color: '#666', fontSize: 13 }}>
        {panel.fileName} · {panel.sampleCount} samples
      </div>
      {panel.warning && <ErrorBanner message={panel.warning.message} />}
      <TimeOfDayChart data={series} />
      <h3 style={{ fontSize: 15 }}>By day of the week</h3>
      <WeekdayChart pivot={pivot} />
    </section>
  );
}
