/**
 * Cadence Parser
 *
 * Turns the three configured cron expressions into immutable CadenceWindows.
 * Parsed once at startup; a malformed expression is a ConfigurationError.
 *
 * Supported shape: `minute hour * * day-of-week`
 * - minute / hour / day-of-week accept `*`, `a`, `a-b`, `*\/n`, `a-b/n` and comma lists
 * - day-of-week accepts 0-7 (0 and 7 are Sunday) and sun..sat
 * - day-of-month and month must be `*`; cadences are chosen by weekday and hour only
 *
 * The minute field decides the interval: the smallest gap between two
 * consecutive firing minutes, wrapping across the hour.
 */

import cron from 'node-cron';
import { ConfigurationError } from '../../utils/errors.js';

// ============================================
// TYPES
// ============================================

export type CadenceWindowName = 'businessHours' | 'offHours' | 'weekend';

/** Evaluation precedence: earlier names win when windows overlap */
export const CADENCE_PRECEDENCE: readonly CadenceWindowName[] = ['businessHours', 'offHours', 'weekend'];

export interface CadenceWindow {
    readonly name: CadenceWindowName;
    readonly expression: string;
    readonly intervalMinutes: number;
    readonly hours: ReadonlySet<number>;
    readonly daysOfWeek: ReadonlySet<number>;
    readonly timeZone: string;
}

export type CadenceWindows = Readonly<Record<CadenceWindowName, CadenceWindow>>;

interface FieldSpec {
    label: string;
    min: number;
    max: number;
    names?: Readonly<Record<string, number>>;
}

const MINUTE_FIELD: FieldSpec = { label: 'minute', min: 0, max: 59 };
const HOUR_FIELD: FieldSpec = { label: 'hour', min: 0, max: 23 };
const DAY_OF_WEEK_FIELD: FieldSpec = {
    label: 'day-of-week',
    min: 0,
    max: 7,
    names: { sun: 0, mon: 1, tue: 2, wed: 3, thu: 4, fri: 5, sat: 6 },
};

// ============================================
// TIME ZONE
// ============================================

/**
 * @throws ConfigurationError for an unknown IANA zone
 */
export function assertValidTimeZone(timeZone: string): void {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone });
    } catch {
        throw new ConfigurationError(`Invalid time zone '${timeZone}'`);
    }
}

// ============================================
// FIELD PARSING
// ============================================

function parseValue(raw: string, spec: FieldSpec, expression: string): number {
    const named = spec.names?.[raw.toLowerCase()];
    if (named !== undefined) return named;

    if (!/^\d+$/.test(raw)) {
        throw new ConfigurationError(`Invalid ${spec.label} value '${raw}' in cron expression '${expression}'`);
    }
    const value = Number(raw);
    if (value < spec.min || value > spec.max) {
        throw new ConfigurationError(
            `${spec.label} value ${value} out of range ${spec.min}-${spec.max} in cron expression '${expression}'`
        );
    }
    return value;
}

/**
 * Expand one cron field into the set of values it matches
 */
export function expandCronField(field: string, spec: FieldSpec, expression: string): Set<number> {
    const values = new Set<number>();

    for (const part of field.split(',')) {
        const [rangePart, stepPart, extra] = part.split('/');
        if (!rangePart || extra !== undefined) {
            throw new ConfigurationError(`Invalid ${spec.label} field '${field}' in cron expression '${expression}'`);
        }

        let step = 1;
        if (stepPart !== undefined) {
            if (!/^\d+$/.test(stepPart) || Number(stepPart) === 0) {
                throw new ConfigurationError(`Invalid step '${stepPart}' in cron expression '${expression}'`);
            }
            step = Number(stepPart);
        }

        let start: number;
        let end: number;
        if (rangePart === '*') {
            start = spec.min;
            end = spec.max;
        } else if (rangePart.includes('-')) {
            const [from, to] = rangePart.split('-');
            start = parseValue(from ?? '', spec, expression);
            end = parseValue(to ?? '', spec, expression);
            if (start > end) {
                throw new ConfigurationError(`Descending range '${rangePart}' in cron expression '${expression}'`);
            }
        } else {
            start = parseValue(rangePart, spec, expression);
            end = stepPart === undefined ? start : spec.max;
        }

        for (let value = start; value <= end; value += step) {
            values.add(value);
        }
    }

    return values;
}

/**
 * Smallest gap in minutes between consecutive firings within an hour.
 * A single minute fires once an hour.
 */
export function computeIntervalMinutes(minutes: ReadonlySet<number>): number {
    const sorted = [...minutes].sort((a, b) => a - b);
    if (sorted.length <= 1) return 60;

    let smallest = 60;
    for (let i = 1; i < sorted.length; i++) {
        smallest = Math.min(smallest, sorted[i] - sorted[i - 1]);
    }
    const wrap = sorted[0] + 60 - sorted[sorted.length - 1];
    return Math.min(smallest, wrap);
}

// ============================================
// PUBLIC API
// ============================================

/**
 * Parse a five-field cron expression into a CadenceWindow
 *
 * @throws ConfigurationError when the expression is malformed or uses unsupported fields
 */
export function parseCadence(name: CadenceWindowName, expression: string, timeZone: string): CadenceWindow {
    const trimmed = expression.trim();
    const fields = trimmed.split(/\s+/);

    if (fields.length !== 5) {
        throw new ConfigurationError(
            `Cron expression for ${name} must have 5 fields (minute hour day-of-month month day-of-week), got '${expression}'`
        );
    }
    if (!cron.validate(trimmed)) {
        throw new ConfigurationError(`Invalid cron expression for ${name}: '${expression}'`);
    }

    const [minuteField, hourField, dayOfMonthField, monthField, dayOfWeekField] = fields;
    if (dayOfMonthField !== '*' || monthField !== '*') {
        throw new ConfigurationError(
            `Cron expression for ${name} must use '*' for day-of-month and month, got '${expression}'`
        );
    }

    assertValidTimeZone(timeZone);

    const minutes = expandCronField(minuteField, MINUTE_FIELD, expression);
    const hours = expandCronField(hourField, HOUR_FIELD, expression);
    const daysOfWeek = new Set(
        [...expandCronField(dayOfWeekField, DAY_OF_WEEK_FIELD, expression)].map(day => day % 7)
    );

    return Object.freeze({
        name,
        expression: trimmed,
        intervalMinutes: computeIntervalMinutes(minutes),
        hours,
        daysOfWeek,
        timeZone,
    });
}

/** Parse all three windows against one time zone */
export function parseCadenceWindows(
    expressions: Readonly<Record<CadenceWindowName, string>>,
    timeZone: string
): CadenceWindows {
    return Object.freeze({
        businessHours: parseCadence('businessHours', expressions.businessHours, timeZone),
        offHours: parseCadence('offHours', expressions.offHours, timeZone),
        weekend: parseCadence('weekend', expressions.weekend, timeZone),
    });
}
