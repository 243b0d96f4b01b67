/**
 * jfold-core: document and viewport engine for the jfold pager.
 *
 * No terminal or rendering dependency; the CLI package drives it.
 */

export * from './errors';
export * from './tree';
export * from './parser';
export * from './flatten';
export * from './viewport';
export * from './controller';
export * from './search';
export * from './input';
export * from './serialize';
export * from './loader';
