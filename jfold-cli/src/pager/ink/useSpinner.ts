/**
 * Braille spinner frames on an interval, for the loading indicator.
 */

import { useState, useEffect } from 'react';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠇', '⠏'];
const DEFAULT_INTERVAL_MS = 80;

/** Pass `active: false` to stop the timer. */
export function useSpinner(active: boolean, intervalMs = DEFAULT_INTERVAL_MS): string {
  const [frameIndex, setFrameIndex] = useState(0);

  useEffect(() => {
    if (!active) return undefined;
    const timer = setInterval(() => {
      setFrameIndex(prev => (prev + 1) % FRAMES.length);
    }, intervalMs);
    return () => clearInterval(timer);
  }, [active, intervalMs]);

  return FRAMES[frameIndex];
}
