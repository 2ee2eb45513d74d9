/**
 * Element-wise bulk transforms over Float64Arrays.
 *
 * Every per-timestamp computation of the algebra goes through these helpers so
 * that arithmetic and resampling stay linear in the index length.
 */

export function filled(length: number, value: number): Float64Array {
    return new Float64Array(length).fill(value);
}

export function add(a: Float64Array, b: Float64Array): Float64Array {
    const out = new Float64Array(a.length);
    for (let i = 0; i < a.length; i++) out[i] = a[i] + b[i];
    return out;
}

export function subtract(a: Float64Array, b: Float64Array): Float64Array {
    const out = new Float64Array(a.length);
    for (let i = 0; i < a.length; i++) out[i] = a[i] - b[i];
    return out;
}

export function multiply(a: Float64Array, b: Float64Array): Float64Array {
    const out = new Float64Array(a.length);
    for (let i = 0; i < a.length; i++) out[i] = a[i] * b[i];
    return out;
}

export function divide(a: Float64Array, b: Float64Array): Float64Array {
    const out = new Float64Array(a.length);
    for (let i = 0; i < a.length; i++) out[i] = a[i] / b[i];
    return out;
}

export function scale(a: Float64Array, factor: number): Float64Array {
    const out = new Float64Array(a.length);
    for (let i = 0; i < a.length; i++) out[i] = a[i] * factor;
    return out;
}

export function reciprocal(a: Float64Array): Float64Array {
    const out = new Float64Array(a.length);
    for (let i = 0; i < a.length; i++) out[i] = 1 / a[i];
    return out;
}

/**
 * Element-wise sum of several equally long arrays.
 */
export function sumAll(arrays: readonly Float64Array[]): Float64Array {
    const out = new Float64Array(arrays.length ? arrays[0].length : 0);
    for (const a of arrays) {
        for (let i = 0; i < a.length; i++) out[i] += a[i];
    }
    return out;
}

export function total(a: ArrayLike<number>): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) sum += a[i];
    return sum;
}

export function isClose(a: number, b: number, rtol: number, atol: number): boolean {
    if (Number.isNaN(a) || Number.isNaN(b)) return Number.isNaN(a) && Number.isNaN(b);
    if (a === b) return true;
    return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

export function allClose(a: ArrayLike<number>, b: ArrayLike<number>, rtol: number, atol: number): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (!isClose(a[i], b[i], rtol, atol)) return false;
    }
    return true;
}

/**
 * Weighted average of `values`. If the weights sum to zero, the average is only
 * defined when all values are equal (then it is that value); otherwise NaN.
 */
export function weightedAverage(values: ArrayLike<number>, weights: ArrayLike<number>): number {
    let weightSum = 0;
    let product = 0;
    for (let i = 0; i < values.length; i++) {
        weightSum += weights[i];
        product += values[i] * weights[i];
    }
    if (weightSum !== 0) return product / weightSum;
    for (let i = 1; i < values.length; i++) {
        if (values[i] !== values[0]) return NaN;
    }
    return values.length ? values[0] : NaN;
}

/**
 * Row-wise weighted average over several columns: result[i] = wavg(values[*][i], weights[*][i]).
 */
export function weightedAverageRows(
    values: readonly Float64Array[],
    weights: readonly Float64Array[]
): Float64Array {
    const length = values.length ? values[0].length : 0;
    const out = new Float64Array(length);
    const rowValues = new Float64Array(values.length);
    const rowWeights = new Float64Array(values.length);
    for (let i = 0; i < length; i++) {
        for (let k = 0; k < values.length; k++) {
            rowValues[k] = values[k][i];
            rowWeights[k] = weights[k][i];
        }
        out[i] = weightedAverage(rowValues, rowWeights);
    }
    return out;
}

/**
 * Price from revenue and volume, r / q; where q is 0, the volume-weighted
 * average of the component prices is used instead.
 */
export function priceFromParts(
    q: Float64Array,
    r: Float64Array,
    componentPrices: readonly Float64Array[],
    componentVolumes: readonly Float64Array[]
): Float64Array {
    const out = new Float64Array(q.length);
    let fallback: Float64Array | undefined;
    for (let i = 0; i < q.length; i++) {
        if (q[i] !== 0) {
            out[i] = r[i] / q[i];
        } else {
            fallback = fallback ?? weightedAverageRows(componentPrices, componentVolumes);
            out[i] = fallback[i];
        }
    }
    return out;
}

/**
 * Element-wise a / b, taking `fallback` wherever b is zero.
 */
export function divideOr(a: Float64Array, b: Float64Array, fallback: Float64Array): Float64Array {
    const out = new Float64Array(a.length);
    for (let i = 0; i < a.length; i++) out[i] = b[i] !== 0 ? a[i] / b[i] : fallback[i];
    return out;
}

export function concatAll(arrays: readonly Float64Array[]): Float64Array {
    const out = new Float64Array(arrays.reduce((n, a) => n + a.length, 0));
    let offset = 0;
    for (const a of arrays) {
        out.set(a, offset);
        offset += a.length;
    }
    return out;
}

export function isAllZero(a: ArrayLike<number>, atol: number): boolean {
    for (let i = 0; i < a.length; i++) {
        if (!(Math.abs(a[i]) <= atol)) return false;
    }
    return true;
}
