/**
 * Turns on mouse tracking while mounted and reports parsed events from the
 * stream Ink reads keys from.
 */

import React, { useEffect } from 'react';
import { useStdin } from 'ink';
import { disableMouse, enableMouse } from './mouseProtocol';
import { parseMouseEvents } from './parseMouseEvent';
import type { TerminalMouseEvent } from './parseMouseEvent';

interface MouseProviderProps {
  onMouse: (event: TerminalMouseEvent) => void;
  children: React.ReactNode;
}

export function MouseProvider({ onMouse, children }: MouseProviderProps): React.ReactElement {
  const { stdin } = useStdin();

  useEffect(() => {
    enableMouse();

    const handler = (data: Buffer | string) => {
      for (const event of parseMouseEvents(data)) onMouse(event);
    };
    stdin?.on('data', handler);

    return () => {
      stdin?.removeListener('data', handler);
      disableMouse();
    };
  }, [stdin, onMouse]);

  return <>{children}</>;
}
