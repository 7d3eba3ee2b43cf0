import { describe, it, expect } from '@jest/globals';
import {
    annotateTimeBuckets,
    bucketDate,
    bucketLabel,
    compareBuckets,
    isBeforeMonth,
    toMonthKey,
} from '../../js/time-buckets.js';

describe('time buckets', () => {
    it('zero-pads the month in the sortable key', () => {
        expect(toMonthKey(2024, 3)).toBe('2024-03');
        expect(toMonthKey(2024, 12)).toBe('2024-12');
    });

    it('derives year, month, abbreviation and key from a date', () => {
        expect(bucketDate('2023-11-30')).toEqual({
            year: 2023,
            month: 11,
            monthName: 'Nov',
            monthKey: '2023-11',
        });
    });

    it('rejects dates that are not on the calendar', () => {
        expect(bucketDate('2023-02-30')).toBeNull();
        expect(bucketDate('not a date')).toBeNull();
    });

    it('annotates without mutating the input', () => {
        const records = [{ date: '2024-01-15', id: 1 }];
        const annotated = annotateTimeBuckets(records);

        expect(annotated[0]).toEqual({
            date: '2024-01-15',
            id: 1,
            year: 2024,
            month: 1,
            monthName: 'Jan',
            monthKey: '2024-01',
        });
        expect(records[0]).toEqual({ date: '2024-01-15', id: 1 });
    });

    it('orders buckets by year then month', () => {
        const buckets = [
            { year: 2024, month: 2 },
            { year: 2023, month: 12 },
            { year: 2024, month: 1 },
        ];
        expect([...buckets].sort(compareBuckets)).toEqual([
            { year: 2023, month: 12 },
            { year: 2024, month: 1 },
            { year: 2024, month: 2 },
        ]);
    });

    it('treats only earlier months as before the reference month', () => {
        const reference = { year: 2024, month: 3 };
        expect(isBeforeMonth({ year: 2024, month: 2 }, reference)).toBe(true);
        expect(isBeforeMonth({ year: 2024, month: 3 }, reference)).toBe(false);
        expect(isBeforeMonth({ year: 2023, month: 12 }, reference)).toBe(true);
    });

    it('labels buckets with the fixed abbreviation', () => {
        expect(bucketLabel({ year: 2024, month: 5 })).toBe('May 2024');
    });
});
