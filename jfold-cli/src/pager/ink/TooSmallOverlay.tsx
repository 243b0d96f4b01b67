/**
 * Shown instead of the pager when the terminal is below minimum size.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface TooSmallOverlayProps {
  columns: number;
  rows: number;
  minColumns: number;
  minRows: number;
}

export function TooSmallOverlay({ columns, rows, minColumns, minRows }: TooSmallOverlayProps): React.ReactElement {
  return (
    <Box width={columns} height={rows} justifyContent="center" alignItems="center">
      <Box flexDirection="column">
        <Text color="red">Terminal too small</Text>
        <Text color="gray">{minColumns}x{minRows} ({columns}x{rows})</Text>
      </Box>
    </Box>
  );
}
