import { useEffect, useRef } from 'react';

/**
 * Calls `callback` every `intervalMs` while mounted. The latest callback is
 * used without restarting the timer.
 */
export function usePolling(callback: () => void, intervalMs: number | undefined): void {
  const latest = useRef(callback);
  latest.current = callback;

  useEffect(() => {
    if (intervalMs === undefined || intervalMs <= 0) {
      return;
    }
    const timer = setInterval(() => latest.current(), intervalMs);
    return () => clearInterval(timer);
  }, [intervalMs]);
}
