export { pathOf, serializeValue } from './serialize';
export type { SerializeOptions } from './serialize';
