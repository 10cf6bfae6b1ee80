export { ReadyFlag } from './ready-flag.js';
