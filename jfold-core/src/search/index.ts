export { SearchEngine, keyPattern } from './SearchEngine';
export type { PatternOptions, SearchDirection, SearchMatch, SearchScope } from './SearchEngine';
