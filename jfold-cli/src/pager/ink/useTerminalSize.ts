/**
 * Terminal dimensions, re-read on resize.
 */

import { useState, useEffect } from 'react';

export interface TerminalSize {
  columns: number;
  rows: number;
}

function currentSize(): TerminalSize {
  return {
    columns: process.stdout.columns || 80,
    rows: process.stdout.rows || 24,
  };
}

export function useTerminalSize(): TerminalSize {
  const [size, setSize] = useState<TerminalSize>(currentSize);

  useEffect(() => {
    const onResize = () => setSize(currentSize());
    process.stdout.on('resize', onResize);
    return () => {
      process.stdout.off('resize', onResize);
    };
  }, []);

  return size;
}
