/**
 * Toast at the top-right of the screen. The parent removes it on a timer.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ToastSeverity } from '../PagerSession';

const SEVERITY_COLOR: Record<ToastSeverity, string> = {
  error: 'red',
  warning: 'yellow',
  info: 'cyan',
};

const SEVERITY_ICON: Record<ToastSeverity, string> = {
  error: '\u2718',   // ✘
  warning: '\u26A0', // ⚠
  info: '\u25CF',    // ●
};

export interface ToastEntry {
  id: number;
  message: string;
  severity: ToastSeverity;
}

interface ToastNotificationProps {
  toast: ToastEntry;
  columns: number;
}

export function ToastNotification({ toast, columns }: ToastNotificationProps): React.ReactElement {
  const color = SEVERITY_COLOR[toast.severity];
  const maxLength = Math.max(10, Math.min(72, columns - 8));
  const message = toast.message.length > maxLength ? toast.message.substring(0, maxLength - 3) + '...' : toast.message;

  return (
    <Box
      position="absolute"
      marginLeft={Math.max(0, columns - message.length - 6)}
      marginTop={0}
      borderStyle="single"
      borderColor={color}
      paddingX={1}
    >
      <Text color={color}>{SEVERITY_ICON[toast.severity]} {message}</Text>
    </Box>
  );
}
