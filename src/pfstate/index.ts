export { PfState } from './pfstate';
export type { PfStateOptions, PfStateSeries } from './pfstate';
export type { Factor, PfStateRatios } from './arithmetic';
