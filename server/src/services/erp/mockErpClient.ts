/**
 * Mock ERP client for local development (ERP_MOCK_MODE=true).
 * Serves the bundled fixture through the same parser as the HTTP client.
 */

import type { EmployeeRecord } from '@regverify/shared';
import mockEmployees from '../../config/erp/mockEmployees.json' with { type: 'json' };
import { erpLogger } from '../../utils/logger.js';
import type { ErpRemote } from './erpClient.js';
import { normalizeStaffId, parseEmployeePayload } from './erpRecordSchema.js';

export interface MockErpClientOptions {
    /** Raw ERP payload to serve; defaults to the bundled fixture */
    payload?: unknown;
    /** Artificial latency per call */
    latencyMs?: number;
}

export class MockErpClient implements ErpRemote {
    private readonly records: ReadonlyMap<string, EmployeeRecord>;
    private readonly latencyMs: number;

    constructor(options: MockErpClientOptions = {}) {
        const { records } = parseEmployeePayload(options.payload ?? mockEmployees);
        this.records = new Map(records.map(record => [record.staffId, record]));
        this.latencyMs = options.latencyMs ?? 0;
        erpLogger.info({ records: this.records.size }, 'Mock ERP client loaded');
    }

    async fetchAll(): Promise<EmployeeRecord[]> {
        await this.delay();
        return [...this.records.values()];
    }

    async fetchOne(staffId: string): Promise<EmployeeRecord | null> {
        await this.delay();
        return this.records.get(normalizeStaffId(staffId)) ?? null;
    }

    private async delay(): Promise<void> {
        if (this.latencyMs > 0) {
            await new Promise(resolve => setTimeout(resolve, this.latencyMs));
        }
    }
}
