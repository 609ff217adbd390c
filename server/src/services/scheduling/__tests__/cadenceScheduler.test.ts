/**
 * Unit tests for cadence selection
 */

import { CadenceScheduler, findCadenceOrderingIssues } from '../cadenceScheduler.js';
import { parseCadenceWindows } from '../cadenceParser.js';

const TZ = 'Africa/Nairobi'; // UTC+3, no DST

const defaults = parseCadenceWindows(
    {
        businessHours: '*/2 8-17 * * 1-5',
        offHours: '*/15 18-23,0-7 * * 1-5',
        weekend: '*/30 * * * 0,6',
    },
    TZ
);

function scheduler(smartScheduling = true, windows = defaults) {
    return new CadenceScheduler({ windows, smartScheduling, timeZone: TZ });
}

describe('CadenceScheduler', () => {
    it.each([
        { label: 'Monday 12:00 local', iso: '2026-03-02T09:00:00Z', expected: 'businessHours', minutes: 2 },
        { label: 'Monday 08:00 local', iso: '2026-03-02T05:00:00Z', expected: 'businessHours', minutes: 2 },
        { label: 'Monday 17:59 local', iso: '2026-03-02T14:59:00Z', expected: 'businessHours', minutes: 2 },
        { label: 'Monday 18:00 local', iso: '2026-03-02T15:00:00Z', expected: 'offHours', minutes: 15 },
        { label: 'Monday 05:00 local', iso: '2026-03-02T02:00:00Z', expected: 'offHours', minutes: 15 },
        { label: 'Saturday 12:00 local', iso: '2026-03-07T09:00:00Z', expected: 'weekend', minutes: 30 },
        { label: 'Sunday 23:00 local', iso: '2026-03-08T20:00:00Z', expected: 'weekend', minutes: 30 },
    ])('$label uses the $expected window', ({ iso, expected, minutes }) => {
        const now = new Date(iso);

        expect(scheduler().currentCadence(now).name).toBe(expected);
        expect(scheduler().nextRunDelay(now)).toBe(minutes * 60_000);
    });

    it('reads the weekday in the configured zone, not UTC', () => {
        // Sunday 21:30 UTC is Monday 00:30 in Nairobi
        const now = new Date('2026-03-01T21:30:00Z');

        expect(scheduler().zonedTime(now)).toEqual({ dayOfWeek: 1, hour: 0 });
        expect(scheduler().currentCadence(now).name).toBe('offHours');
    });

    it('always uses business hours when smart scheduling is off', () => {
        const saturday = new Date('2026-03-07T09:00:00Z');

        expect(scheduler(false).currentCadence(saturday).name).toBe('businessHours');
        expect(scheduler(false).nextRunDelay(saturday)).toBe(2 * 60_000);
    });

    it('falls back to the weekend window when nothing matches', () => {
        const sparse = parseCadenceWindows(
            {
                businessHours: '*/5 9-10 * * 1-5',
                offHours: '*/10 20 * * 1-5',
                weekend: '*/30 * * * 6',
            },
            TZ
        );
        // Monday 12:00 local: no window covers it
        const now = new Date('2026-03-02T09:00:00Z');

        expect(scheduler(true, sparse).currentCadence(now).name).toBe('weekend');
    });

    it('prefers business hours when windows overlap', () => {
        const overlapping = parseCadenceWindows(
            {
                businessHours: '*/2 8-17 * * 1-5',
                offHours: '*/15 * * * 1-5',
                weekend: '*/30 * * * *',
            },
            TZ
        );

        expect(scheduler(true, overlapping).currentCadence(new Date('2026-03-02T09:00:00Z')).name).toBe('businessHours');
    });
});

describe('findCadenceOrderingIssues', () => {
    it('accepts the defaults', () => {
        expect(findCadenceOrderingIssues(defaults)).toEqual([]);
    });

    it('reports intervals in the wrong order', () => {
        const inverted = parseCadenceWindows(
            {
                businessHours: '*/30 8-17 * * 1-5',
                offHours: '*/15 18-23,0-7 * * 1-5',
                weekend: '*/5 * * * 0,6',
            },
            TZ
        );

        expect(findCadenceOrderingIssues(inverted)).toEqual([
            'businessHours interval (30m) is longer than offHours (15m)',
            'offHours interval (15m) is longer than weekend (5m)',
        ]);
    });
});
