export { createContainer } from './container';
export type { Deps, DepsOverrides } from './container';
