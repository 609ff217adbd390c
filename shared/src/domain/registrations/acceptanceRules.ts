/**
 * Business rules an ERP record must pass before a registration is approved.
 * Pure functions; the validator decides what to do with the verdict.
 */

import type { EmployeeRecord, Registration } from './types.js';
import { calculateNameSimilarity } from './nameSimilarity.js';

export const DEFAULT_NAME_MATCH_THRESHOLD = 80;

export interface AcceptanceRuleOptions {
    /** Minimum name similarity percentage; 0 disables the check */
    nameMatchThreshold: number;
}

export type RuleVerdict =
    | { passed: true; nameSimilarity: number | null }
    | { passed: false; rule: AcceptanceRule; reason: string };

export type AcceptanceRule = 'former_employee' | 'name_match';

/**
 * Evaluate a found record against the registration.
 *
 * Rules, in order:
 * 1. former_employee - an exit date must exist and not lie after `now`
 * 2. name_match - names must be similar enough when both sides have one
 */
export function evaluateEmployeeRecord(
    registration: Pick<Registration, 'fullName'>,
    record: EmployeeRecord,
    options: AcceptanceRuleOptions,
    now: Date
): RuleVerdict {
    if (!record.exitDate) {
        return {
            passed: false,
            rule: 'former_employee',
            reason: `ERP has no exit date for staff number ${record.staffId}`,
        };
    }

    if (record.exitDate.getTime() > now.getTime()) {
        return {
            passed: false,
            rule: 'former_employee',
            reason: `Exit date ${record.exitDate.toISOString().split('T')[0]} for staff number ${record.staffId} is in the future`,
        };
    }

    const provided = registration.fullName.trim();
    const recorded = record.fullName?.trim() ?? '';

    if (options.nameMatchThreshold <= 0 || !provided || !recorded) {
        return { passed: true, nameSimilarity: null };
    }

    const similarity = calculateNameSimilarity(provided, recorded);
    if (similarity < options.nameMatchThreshold) {
        return {
            passed: false,
            rule: 'name_match',
            reason: `Name does not match ERP records (similarity ${similarity}%, required ${options.nameMatchThreshold}%)`,
        };
    }

    return { passed: true, nameSimilarity: similarity };
}
