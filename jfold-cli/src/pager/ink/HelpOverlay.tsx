/**
 * Key binding reference, one column per binding group.
 * Dot-leader alignment between keys and descriptions.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { Binding } from 'jfold-core';
import { formatChord } from '../keys';

interface HelpOverlayProps {
  bindings: readonly Binding[];
  width: number;
  height: number;
}

const KEY_WIDTH = 14;
const ROW_WIDTH = 54;

/** Render a key-description row with dot-leader fill. */
function helpRow(key: string, desc: string): React.ReactElement {
  const padding = KEY_WIDTH - key.length;
  const dotCount = Math.max(1, ROW_WIDTH - KEY_WIDTH - desc.length);
  const dots = '\u00B7'.repeat(dotCount);
  return (
    <Text key={`${key}:${desc}`} wrap="truncate">
      {'  '}<Text bold>{key}</Text>{' '.repeat(Math.max(0, padding))} <Text dimColor>{dots}</Text> {desc}
    </Text>
  );
}

function groupBindings(bindings: readonly Binding[]): Map<string, Binding[]> {
  const groups = new Map<string, Binding[]>();
  for (const binding of bindings) {
    const group = groups.get(binding.group);
    if (group) group.push(binding);
    else groups.set(binding.group, [binding]);
  }
  return groups;
}

export function HelpOverlay({ bindings, width, height }: HelpOverlayProps): React.ReactElement {
  const groups = [...groupBindings(bindings)];

  return (
    <Box flexDirection="column" width={width} height={height} overflow="hidden">
      <Text bold color="magenta">  Keys <Text dimColor>(Esc or q to close; counts go before a key, e.g. 5j)</Text></Text>
      <Box flexDirection="row" flexWrap="wrap">
        {groups.map(([group, entries]) => (
          <Box key={group} flexDirection="column" width={ROW_WIDTH + 4} marginTop={1}>
            <Text bold>  {group}</Text>
            {entries.map((b) => helpRow(b.keys.map(formatChord).join(' / '), b.description))}
          </Box>
        ))}
      </Box>
    </Box>
  );
}
