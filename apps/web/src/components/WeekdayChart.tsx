import React from 'react';
import {
  Bar,
  BarChart,
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import type { WeekdayPivot } from '../chartData.js';

const SERIES_COLORS = ['#636efa', '#ef553b', '#00cc96', '#ab63fa', '#ffa15a', '#19d3f3', '#ff6692'];

export default function WeekdayChart({ pivot }: { pivot: WeekdayPivot }) {
  return (
    <div style={{ height: 320 }}>
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={pivot.rows}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="timeOfDay" />
          <YAxis label={{ value: 'Commute time (minutes)', angle: -90, position: 'insideLeft' }} />
          <Tooltip />
          <Legend />
          {pivot.series.map((label, i) => (
            <Bar key={label} dataKey={label} fill={SERIES_COLORS[i % SERIES_COLORS.length]} />
          ))}
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
