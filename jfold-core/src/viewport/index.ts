export { Viewport } from './Viewport';
export type { Alignment, CursorBounds, ViewportOptions } from './Viewport';
