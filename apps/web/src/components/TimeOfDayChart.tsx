import React from 'react';
import {
  Bar,
  BarChart,
  CartesianGrid,
  ErrorBar,
  LabelList,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import type { TimeOfDayPoint } from '../chartData.js';

/**
 * Mean commute time per time of day with ± one standard deviation.
 */
export default function TimeOfDayChart({ data }: { data: TimeOfDayPoint[] }) {
  return (
    <div style={{ height: 320 }}>
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis
            dataKey="timeOfDay"
            label={{ value: 'Time of day', position: 'insideBottom', offset: -4 }}
          />
          <YAxis label={{ value: 'Commute time (minutes)', angle: -90, position: 'insideLeft' }} />
          <Tooltip />
          <Bar dataKey="commuteTime" name="Mean commute time" fill="#636efa">
            <LabelList dataKey="commuteTime" position="top" />
            <ErrorBar dataKey="stdDev" width={4} strokeWidth={1.5} stroke="#333" />
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
