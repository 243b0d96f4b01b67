export { DocumentLoader } from './DocumentLoader';
export type { ByteSource, DocumentLoaderOptions, LoadProgress, LoadResult } from './DocumentLoader';
