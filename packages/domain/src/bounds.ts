import type { Bounds, BoundsTable } from './currency.js';

export type BoundsStatus = 'PASS' | 'FAIL' | 'NO_BOUNDS';

export type BoundsClassification =
    | { status: 'PASS'; bounds: Bounds }
    | { status: 'FAIL'; bounds: Bounds }
    | { status: 'NO_BOUNDS' };

/** Inclusive range check of a USD-based rate against the static bounds table. */
export function classifyBounds(code: string, rate: number, table: BoundsTable): BoundsClassification {
    const bounds = table.get(code);
    if (!bounds) {
        return { status: 'NO_BOUNDS' };
    }

    const [low, high] = bounds;
    return low <= rate && rate <= high ? { status: 'PASS', bounds } : { status: 'FAIL', bounds };
}

export function formatBounds(bounds: Bounds): string {
    return `[${bounds[0]}, ${bounds[1]}]`;
}
