export type { Freq } from './freq';
export { FREQUENCIES, isFreq, upOrDown, isSubDaily } from './freq';
export {
    addPeriods,
    floorInstant,
    isPeriodStart,
    minutesOfDay,
    toInstant,
    formatInstant,
} from './calendar';
export type { InstantLike, TimeIndexSpec } from './timeIndex';
export { TimeIndex } from './timeIndex';
