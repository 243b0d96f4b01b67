export { IncrementalParser } from './IncrementalParser';
export { parseDocument } from './parseDocument';
