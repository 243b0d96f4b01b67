export { DocumentController } from './DocumentController';
export type { ControllerOptions, Cursor, SiblingDirection } from './DocumentController';
