/**
 * Kysely-backed RegistrationStore (PostgreSQL)
 *
 * Query failures are wrapped in StorageError; the row is left as it was.
 */

import { sql, type Selectable } from 'kysely';
import { isValidRegistrationStatus, type Registration } from '@regverify/shared';
import type { KyselyDB } from '../../db/index.js';
import type { RegistrationsTable } from '../../db/types.js';
import { StorageError, toError } from '../../utils/errors.js';
import type { RegistrationAuditEntry, RegistrationStore } from './registrationStore.js';

type RegistrationRow = Selectable<RegistrationsTable>;

function toRegistration(row: RegistrationRow): Registration {
    if (!isValidRegistrationStatus(row.status)) {
        throw new StorageError(`Registration ${row.id} has unknown status '${row.status}'`, 'read');
    }
    return { ...row, status: row.status };
}

export class KyselyRegistrationStore implements RegistrationStore {
    private readonly db: KyselyDB;

    constructor(db: KyselyDB) {
        this.db = db;
    }

    async loadEligiblePending(limit: number, now: Date): Promise<Registration[]> {
        try {
            const rows = await this.db
                .selectFrom('registrations')
                .selectAll()
                .where('status', '=', 'pending')
                .where((eb) => eb.or([
                    eb('nextAttemptAt', 'is', null),
                    eb('nextAttemptAt', '<=', now),
                ]))
                .orderBy(sql`"nextAttemptAt" asc nulls first`)
                .orderBy('createdAt', 'asc')
                .limit(limit)
                .execute();

            return rows.map(toRegistration);
        } catch (error) {
            if (error instanceof StorageError) throw error;
            throw new StorageError('Failed to load eligible registrations', 'loadEligiblePending', toError(error));
        }
    }

    async save(registration: Registration): Promise<void> {
        let updated: bigint;
        try {
            const result = await this.db
                .updateTable('registrations')
                .set({
                    status: registration.status,
                    retryCount: registration.retryCount,
                    nextAttemptAt: registration.nextAttemptAt,
                    lastValidationError: registration.lastValidationError,
                    lastAttemptAt: registration.lastAttemptAt,
                    approvedAt: registration.approvedAt,
                    activatedAt: registration.activatedAt,
                    rejectedAt: registration.rejectedAt,
                    verificationEmailSentAt: registration.verificationEmailSentAt,
                    erpStaffName: registration.erpStaffName,
                    erpDepartment: registration.erpDepartment,
                    erpExitDate: registration.erpExitDate,
                    updatedAt: registration.updatedAt,
                })
                .where('id', '=', registration.id)
                .executeTakeFirst();
            updated = result.numUpdatedRows;
        } catch (error) {
            throw new StorageError(`Failed to save registration ${registration.id}`, 'save', toError(error));
        }

        if (Number(updated) === 0) {
            throw new StorageError(`Registration ${registration.id} does not exist`, 'save');
        }
    }

    async findById(id: string): Promise<Registration | null> {
        try {
            const row = await this.db
                .selectFrom('registrations')
                .selectAll()
                .where('id', '=', id)
                .executeTakeFirst();

            return row ? toRegistration(row) : null;
        } catch (error) {
            if (error instanceof StorageError) throw error;
            throw new StorageError(`Failed to load registration ${id}`, 'findById', toError(error));
        }
    }

    async recordAudit(entry: RegistrationAuditEntry): Promise<void> {
        try {
            await this.db
                .insertInto('audit_logs')
                .values({
                    registrationId: entry.registrationId,
                    action: entry.action,
                    previousStatus: entry.previousStatus,
                    newStatus: entry.newStatus,
                    notes: entry.notes,
                    isAutomated: entry.isAutomated,
                    timestamp: entry.timestamp,
                })
                .execute();
        } catch (error) {
            throw new StorageError(
                `Failed to write audit entry for registration ${entry.registrationId}`,
                'recordAudit',
                toError(error)
            );
        }
    }
}
