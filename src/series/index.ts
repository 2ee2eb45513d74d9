export { Series } from './series';
export * as ops from './ops';
