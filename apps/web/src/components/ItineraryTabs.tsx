import React from 'react';
import type { ItinerarySummary } from '@commute-dashboard/core';

interface ItineraryTabsProps {
  itineraries: ItinerarySummary[];
  activeId: string | undefined;
  onSelect: (id: string) => void;
}

export default function ItineraryTabs({ itineraries, activeId, onSelect }: ItineraryTabsProps) {
  return (
    <nav role="tablist" style={{ display: 'flex', gap: 4, borderBottom: '1px solid #ddd' }}>
      {itineraries.map((itinerary) => {
        const active = itinerary.id === activeId;
        return (
          <button
            key={itinerary.id}
            role="tab"
            aria-selected={active}
            title={itinerary.description}
            onClick={() => onSelect(itinerary.id)}
            style={{
              border: 'none',
              borderBottom: active ? '3px solid #636efa' : '3px solid transparent',
              background: 'none',
              padding: '8px 14px',
              fontWeight: active ? 600 : 400,
              cursor: 'pointer',
            }}
          >
            {itinerary.name}
          </button>
        );
      })}
    </nav>
  );
}
