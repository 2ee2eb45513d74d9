import { Series } from '../series';
import { isQuantity } from '../units';
import { FlatPfLine } from './flat';
import { NestedPfLine } from './nested';
import { ChildMapping, PfLine, PfLineInput, TagMapping, TagValue } from './types';

export function isPfLine(value: unknown): value is PfLine {
    return value instanceof FlatPfLine || value instanceof NestedPfLine;
}

export function isTagValue(value: unknown): value is TagValue {
    return typeof value === 'number' || value instanceof Series || isQuantity(value);
}

export function isPlainMapping(value: unknown): value is TagMapping | ChildMapping {
    return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

export function isPfLineInput(value: unknown): value is PfLineInput {
    return isPfLine(value) || value instanceof Series || isQuantity(value) || isPlainMapping(value);
}
