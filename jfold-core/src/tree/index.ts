export * from './types';
export { ValueTree } from './ValueTree';
export type { NodeKey, ValueTreeOptions } from './ValueTree';
