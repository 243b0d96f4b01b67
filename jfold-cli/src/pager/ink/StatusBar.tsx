/**
 * Status bar (bottom row) with segmented zones:
 * Left: file + view mode | Center: focused path or load error | Right: pending keys, search, load state, position
 *
 * While a search prompt is open the whole row is the prompt.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { PagerSession } from '../PagerSession';
import { loadLabel, positionLabel, searchLabel, shortenPath } from '../formatters';
import { useSpinner } from './useSpinner';

interface StatusBarProps {
  session: PagerSession;
  label: string;
  width: number;
}

const SEPARATOR = ' │ ';

export function StatusBar({ session, label, width }: StatusBarProps): React.ReactElement {
  const { controller, load, prompt } = session;
  const loading = loadLabel(load);
  const spinner = useSpinner(loading !== null);

  if (prompt) {
    return (
      <Box height={1} width={width}>
        <Text wrap="truncate-start">
          <Text bold color="yellow">{prompt.direction === 'forward' ? '/' : '?'}</Text>
          {prompt.text}
          <Text inverse> </Text>
        </Text>
      </Box>
    );
  }

  const search = session.searchStatus();
  const path = controller.focusedPathText();

  return (
    <Box height={1} width={width}>
      {/* Left zone: file + mode */}
      <Box flexShrink={0}>
        <Text bold color="magenta">{shortenPath(label)}</Text>
        <Text dimColor>{SEPARATOR}</Text>
        <Text color="cyan">{controller.mode}</Text>
      </Box>

      {/* Center zone: load error, else the focused path */}
      <Box flexGrow={1} flexShrink={1} paddingX={1}>
        {load.status === 'failed'
          ? <Text color="red" wrap="truncate-end">{load.error.message}</Text>
          : path !== null && <Text wrap="truncate-middle">{path}</Text>}
      </Box>

      {/* Right zone */}
      <Box flexShrink={0}>
        {session.pending !== '' && (
          <><Text color="yellow">{session.pending}</Text><Text dimColor>{SEPARATOR}</Text></>
        )}
        {search && (
          <><Text color="yellow">{searchLabel(search)}</Text><Text dimColor>{SEPARATOR}</Text></>
        )}
        {loading !== null && (
          <><Text color="cyan">{spinner} {loading}</Text><Text dimColor>{SEPARATOR}</Text></>
        )}
        <Text>{positionLabel(controller.cursor?.line ?? null, controller.totalLines)}</Text>
      </Box>
    </Box>
  );
}
