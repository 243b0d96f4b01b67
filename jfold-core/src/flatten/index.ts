export { LineFlattener } from './LineFlattener';
export type { Line, LineRange, LineRole } from './LineFlattener';
export { INDENT, formatLinePlain, lineSegments } from './lineFormat';
export type { Segment, TokenKind } from './lineFormat';
