import { describe, expect, it } from 'vitest';
import { aggregateStatus, type CheckStatus } from '../src/report.js';

describe('aggregateStatus', () => {
    it('is PASS when every check passes or there are none', () => {
        expect(aggregateStatus([])).toBe('PASS');
        expect(aggregateStatus(['PASS', 'PASS'])).toBe('PASS');
    });

    it('is WARNING when the worst check is a warning', () => {
        expect(aggregateStatus(['PASS', 'WARNING', 'PASS'])).toBe('WARNING');
    });

    it('is CRITICAL whenever any check is critical, regardless of order', () => {
        const orders: CheckStatus[][] = [
            ['CRITICAL', 'PASS', 'WARNING'],
            ['PASS', 'WARNING', 'CRITICAL'],
            ['WARNING', 'CRITICAL', 'WARNING']
        ];
        for (const statuses of orders) {
            expect(aggregateStatus(statuses)).toBe('CRITICAL');
        }
    });
});
