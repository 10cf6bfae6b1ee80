export type * from './kubernetes.js';
export type * from './external.js';
export type * from './component.js';
export { desired } from './component.js';
