/**
 * Deviation of scraped rates from an independent reference feed.
 *
 * Two threshold ladders are applied to the same deviation figure:
 * the collector flags loosely and never blocks, the audit gates strictly.
 * They are kept as separate constants on purpose.
 */

import { BASE_CURRENCY } from './currency.js';
import { PRECISION, roundTo } from './rounding.js';

/** code → rate relative to the feed's base; USD-based after rebasing. */
export type ReferenceRateSet = Readonly<Record<string, number>>;

export const ACQUISITION_DEVIATION_THRESHOLDS = {
    /** Above this the deviation is recorded in the acquisition audit. */
    flagPct: 2,
    /** At or above this the deviation is also logged at error severity. */
    criticalPct: 15
} as const;

export const AUDIT_DEVIATION_THRESHOLDS = {
    warningPct: 3,
    criticalPct: 10
} as const;

export interface Deviation {
    code: string;
    scraped: number;
    reference: number;
    /** Unrounded |scraped − reference| / reference × 100. */
    deviationPct: number;
}

export type AcquisitionDeviationTier = 'WITHIN' | 'FLAGGED' | 'CRITICAL';
export type AuditDeviationTier = 'PASS' | 'WARNING' | 'CRITICAL';

/**
 * Converts a feed quoted against `nativeBase` into USD-based rates by dividing
 * every entry by the feed's USD entry. Returns an empty set when the USD entry is
 * missing or non-positive.
 */
export function rebaseReferenceRates(native: ReferenceRateSet, nativeBase: string): ReferenceRateSet {
    const withBase: Record<string, number> = { ...native, [nativeBase]: 1 };
    const usdInNative = withBase[BASE_CURRENCY];

    if (usdInNative === undefined || !Number.isFinite(usdInNative) || usdInNative <= 0) {
        return {};
    }

    const rebased: Record<string, number> = { [BASE_CURRENCY]: 1 };
    for (const [code, value] of Object.entries(withBase)) {
        if (code === BASE_CURRENCY || !Number.isFinite(value) || value <= 0) {
            continue;
        }
        rebased[code] = roundTo(value / usdInNative, PRECISION.internal);
    }
    return rebased;
}

export function deviationPercent(scraped: number, reference: number): number {
    return (Math.abs(scraped - reference) / reference) * 100;
}

/** Deviations for every non-base code present in both sets with a positive reference. */
export function computeDeviations(scraped: Readonly<Record<string, number>>, reference: ReferenceRateSet): Deviation[] {
    const deviations: Deviation[] = [];
    for (const [code, rate] of Object.entries(scraped)) {
        if (code === BASE_CURRENCY) {
            continue;
        }
        const referenceRate = reference[code];
        if (referenceRate === undefined || referenceRate <= 0) {
            continue;
        }
        deviations.push({ code, scraped: rate, reference: referenceRate, deviationPct: deviationPercent(rate, referenceRate) });
    }
    return deviations;
}

export function classifyAcquisitionDeviation(deviationPct: number): AcquisitionDeviationTier {
    if (deviationPct >= ACQUISITION_DEVIATION_THRESHOLDS.criticalPct) {
        return 'CRITICAL';
    }
    if (deviationPct > ACQUISITION_DEVIATION_THRESHOLDS.flagPct) {
        return 'FLAGGED';
    }
    return 'WITHIN';
}

export function classifyAuditDeviation(deviationPct: number): AuditDeviationTier {
    if (deviationPct > AUDIT_DEVIATION_THRESHOLDS.criticalPct) {
        return 'CRITICAL';
    }
    if (deviationPct > AUDIT_DEVIATION_THRESHOLDS.warningPct) {
        return 'WARNING';
    }
    return 'PASS';
}
