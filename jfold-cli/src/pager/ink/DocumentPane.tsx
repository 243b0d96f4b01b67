/**
 * The document rows in the viewport, one Ink <Text> per row.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { lineSegments } from 'jfold-core';
import type { PagerSession } from '../PagerSession';
import { styleRow } from '../rowStyle';
import type { StyledSpan } from '../rowStyle';
import { useSpinner } from './useSpinner';

interface DocumentPaneProps {
  session: PagerSession;
  width: number;
  height: number;
}

function renderSpans(spans: readonly StyledSpan[]): React.ReactElement[] {
  return spans.map((span, i) => (
    <Text key={i} {...span.style}>{span.text}</Text>
  ));
}

export function DocumentPane({ session, width, height }: DocumentPaneProps): React.ReactElement {
  const { controller, tree, search } = session;
  const loading = session.load.status === 'loading';
  const spinner = useSpinner(loading && controller.totalLines === 0);

  if (controller.totalLines === 0) {
    return (
      <Box height={height} width={width} justifyContent="center" alignItems="center">
        {loading
          ? <Text color="cyan">{spinner} Reading document...</Text>
          : <Text dimColor>(empty document)</Text>}
      </Box>
    );
  }

  const cursorLine = controller.cursor?.line ?? -1;
  const current = session.currentMatch();
  const left = controller.viewport.left;

  return (
    <Box flexDirection="column" height={height} width={width}>
      {controller.visibleLines().map((line) => {
        const spans = styleRow(lineSegments(tree, line, controller.mode), {
          mode: controller.mode,
          focused: line.index === cursorLine,
          matches: search.active && line.role !== 'container-close' ? search.matchesOnNode(line.node) : [],
          current,
          left,
          width,
        });
        return (
          <Text key={line.index} wrap="truncate">
            {spans.length > 0 ? renderSpans(spans) : ' '}
          </Text>
        );
      })}
    </Box>
  );
}
