/**
 * Cadence Scheduler
 *
 * Picks the active batch cadence from wall-clock time in the configured zone.
 * Precedence: business hours → off hours → weekend. Weekend is the catch-all,
 * so every instant maps to exactly one window.
 *
 * Pure apart from the one-off ordering warning at construction; `now` is always injected.
 */

import { schedulerLogger } from '../../utils/logger.js';
import {
    CADENCE_PRECEDENCE,
    assertValidTimeZone,
    type CadenceWindow,
    type CadenceWindows,
} from './cadenceParser.js';

// ============================================
// TYPES
// ============================================

export interface CadenceSchedulerOptions {
    windows: CadenceWindows;
    /** false = always use the business-hours window */
    smartScheduling: boolean;
    timeZone: string;
}

export interface ZonedTime {
    /** 0 = Sunday */
    dayOfWeek: number;
    hour: number;
}

const WEEKDAY_INDEX: Readonly<Record<string, number>> = {
    Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6,
};

// ============================================
// HELPERS
// ============================================

/**
 * Interval ordering problems (business should fire at least as often as
 * off hours, and off hours at least as often as weekends)
 */
export function findCadenceOrderingIssues(windows: CadenceWindows): string[] {
    const issues: string[] = [];
    const { businessHours, offHours, weekend } = windows;

    if (businessHours.intervalMinutes > offHours.intervalMinutes) {
        issues.push(`businessHours interval (${businessHours.intervalMinutes}m) is longer than offHours (${offHours.intervalMinutes}m)`);
    }
    if (offHours.intervalMinutes > weekend.intervalMinutes) {
        issues.push(`offHours interval (${offHours.intervalMinutes}m) is longer than weekend (${weekend.intervalMinutes}m)`);
    }
    return issues;
}

function windowMatches(window: CadenceWindow, time: ZonedTime): boolean {
    return window.daysOfWeek.has(time.dayOfWeek) && window.hours.has(time.hour);
}

// ============================================
// SCHEDULER CLASS
// ============================================

export class CadenceScheduler {
    private readonly windows: CadenceWindows;
    private readonly smartScheduling: boolean;
    private readonly formatter: Intl.DateTimeFormat;

    constructor(options: CadenceSchedulerOptions) {
        assertValidTimeZone(options.timeZone);

        this.windows = options.windows;
        this.smartScheduling = options.smartScheduling;
        this.formatter = new Intl.DateTimeFormat('en-US', {
            timeZone: options.timeZone,
            weekday: 'short',
            hour: '2-digit',
            hourCycle: 'h23',
        });

        for (const issue of findCadenceOrderingIssues(options.windows)) {
            schedulerLogger.warn({ issue }, 'Cadence intervals are not ordered business ≤ off-hours ≤ weekend');
        }
    }

    /** Weekday and hour of `now` in the scheduler's zone */
    zonedTime(now: Date): ZonedTime {
        let dayOfWeek = 0;
        let hour = 0;

        for (const part of this.formatter.formatToParts(now)) {
            if (part.type === 'weekday') {
                dayOfWeek = WEEKDAY_INDEX[part.value] ?? 0;
            } else if (part.type === 'hour') {
                hour = Number(part.value) % 24;
            }
        }

        return { dayOfWeek, hour };
    }

    /**
     * Active window at `now`
     */
    currentCadence(now: Date): CadenceWindow {
        if (!this.smartScheduling) {
            return this.windows.businessHours;
        }

        const time = this.zonedTime(now);
        for (const name of CADENCE_PRECEDENCE) {
            const window = this.windows[name];
            if (windowMatches(window, time)) {
                return window;
            }
        }

        return this.windows.weekend;
    }

    /**
     * Milliseconds to wait before the next batch run
     */
    nextRunDelay(now: Date): number {
        return this.currentCadence(now).intervalMinutes * 60_000;
    }
}
