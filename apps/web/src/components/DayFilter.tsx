import React from 'react';
import type { WeekdayNumber } from '@commute-dashboard/core';
import { ALL_WEEKDAYS, weekdayName } from '@commute-dashboard/core/time';
import { isOnlySelectedWeekday, toggleWeekday } from '../chartData.js';

interface DayFilterProps {
  /** Selected days; empty means every day */
  selected: readonly WeekdayNumber[];
  onChange: (weekdays: WeekdayNumber[]) => void;
}

export default function DayFilter({ selected, onChange }: DayFilterProps) {
  const isChecked = (day: WeekdayNumber) => selected.length === 0 || selected.includes(day);

  return (
    <fieldset style={{ border: 'none', padding: 0, display: 'flex', gap: 12, flexWrap: 'wrap' }}>
      {ALL_WEEKDAYS.map((day) => (
        <label key={day}>
          <input
            type="checkbox"
            checked={isChecked(day)}
            disabled={isOnlySelectedWeekday(selected, day)}
            onChange={() => onChange(toggleWeekday(selected, day))}
          />{' '}
          {weekdayName(day)}
        </label>
      ))}
    </fieldset>
  );
}
