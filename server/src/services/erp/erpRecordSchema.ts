/**
 * ERP payload parsing
 *
 * The ERP answers either with a bare array or with `{ ExEmployeesView: [...] }`.
 * Field names arrive upper-case (`STAFFID`) or camel/lower-case (`staffid`),
 * and missing values may be the null marker `{ "@nil": "true" }`.
 * Records without a staff id are skipped.
 */

import { z } from 'zod';
import type { EmployeeRecord } from '@regverify/shared';
import { TransientRemoteError } from '../../utils/errors.js';

// ============================================
// SCHEMAS
// ============================================

const nilMarkerSchema = z.object({ '@nil': z.union([z.literal('true'), z.literal(true)]) });

/** A scalar ERP value; the nil marker, null and blanks become null */
const erpScalarSchema = z
    .union([z.string(), z.number(), nilMarkerSchema, z.null()])
    .transform((value): string | null => {
        if (value === null || typeof value === 'object') return null;
        const text = String(value).trim();
        return text.length > 0 ? text : null;
    });

const rawRecordSchema = z.record(z.string(), z.unknown());

const wrappedResponseSchema = z.object({
    ExEmployeesView: z.array(z.unknown()),
});

/** Accepted spellings per field, matched case-insensitively */
const FIELD_ALIASES = {
    staffId: ['staffid', 'staff_id'],
    fullName: ['fullname', 'full_name'],
    nationalId: ['nationalidentifier', 'national_identifier'],
    department: ['department', 'organisation'],
    employmentStatus: ['persontype', 'person_type', 'employmentstatus'],
    hireDate: ['hiredate', 'hire_date'],
    exitDate: ['actualterminationdate', 'actual_termination_date'],
} as const satisfies Record<keyof EmployeeRecord, readonly string[]>;

// ============================================
// HELPERS
// ============================================

/** Normalised key used by the cache and lookups */
export function normalizeStaffId(staffId: string): string {
    return staffId.trim().toUpperCase();
}

function pickScalar(fields: ReadonlyMap<string, unknown>, aliases: readonly string[]): string | null {
    for (const alias of aliases) {
        if (!fields.has(alias)) continue;
        const parsed = erpScalarSchema.safeParse(fields.get(alias));
        if (parsed.success && parsed.data !== null) {
            return parsed.data;
        }
    }
    return null;
}

function toDate(value: string | null): Date | null {
    if (!value) return null;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Parse a single ERP row. Returns null for rows without a staff id.
 */
export function parseEmployeeRecord(raw: unknown): EmployeeRecord | null {
    const parsed = rawRecordSchema.safeParse(raw);
    if (!parsed.success) return null;

    const fields = new Map<string, unknown>();
    for (const [key, value] of Object.entries(parsed.data)) {
        fields.set(key.toLowerCase(), value);
    }

    const staffId = pickScalar(fields, FIELD_ALIASES.staffId);
    if (!staffId) return null;

    return {
        staffId: normalizeStaffId(staffId),
        fullName: pickScalar(fields, FIELD_ALIASES.fullName),
        nationalId: pickScalar(fields, FIELD_ALIASES.nationalId),
        department: pickScalar(fields, FIELD_ALIASES.department),
        employmentStatus: pickScalar(fields, FIELD_ALIASES.employmentStatus),
        hireDate: toDate(pickScalar(fields, FIELD_ALIASES.hireDate)),
        exitDate: toDate(pickScalar(fields, FIELD_ALIASES.exitDate)),
    };
}

// ============================================
// PUBLIC API
// ============================================

export interface ParsedEmployeePayload {
    records: EmployeeRecord[];
    skipped: number;
}

/**
 * Parse a full ERP response body
 *
 * @throws TransientRemoteError when the body is neither an array, the wrapped form nor a single row
 */
export function parseEmployeePayload(payload: unknown): ParsedEmployeePayload {
    let rows: unknown[];

    if (Array.isArray(payload)) {
        rows = payload;
    } else {
        const wrapped = wrappedResponseSchema.safeParse(payload);
        if (wrapped.success) {
            rows = wrapped.data.ExEmployeesView;
        } else if (rawRecordSchema.safeParse(payload).success) {
            rows = [payload];
        } else {
            throw new TransientRemoteError('ERP returned an unrecognised response body');
        }
    }

    const records: EmployeeRecord[] = [];
    let skipped = 0;
    for (const row of rows) {
        const record = parseEmployeeRecord(row);
        if (record) {
            records.push(record);
        } else {
            skipped++;
        }
    }

    return { records, skipped };
}
