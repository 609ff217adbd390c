/**
 * ERP Directory
 * Cache-first employee lookups for the validator.
 *
 * - cache enabled: look in the snapshot first
 * - cache-only: a cache miss is final, the ERP is never called per registration
 * - otherwise a miss falls through to a live fetchOne()
 *
 * Remote failures propagate as TransientRemoteError.
 */

import type { EmployeeRecord, RecordSource } from '@regverify/shared';
import { erpLogger } from '../../utils/logger.js';
import type { ErpRemote } from './erpClient.js';
import type { ErpCache } from './erpCache.js';

export interface ErpDirectoryOptions {
    cacheEnabled: boolean;
    /** Only meaningful with the cache enabled */
    cacheOnly: boolean;
}

export type EmployeeResolution =
    | { found: true; record: EmployeeRecord; source: RecordSource }
    | { found: false; searched: RecordSource };

export class ErpDirectory {
    private readonly remote: ErpRemote;
    private readonly cache: ErpCache | null;
    private readonly options: ErpDirectoryOptions;

    constructor(remote: ErpRemote, cache: ErpCache | null, options: ErpDirectoryOptions) {
        this.remote = remote;
        this.cache = options.cacheEnabled ? cache : null;
        this.options = options;
    }

    get cacheOnly(): boolean {
        return this.cache !== null && this.options.cacheOnly;
    }

    async resolve(staffId: string): Promise<EmployeeResolution> {
        if (this.cache) {
            const cached = this.cache.lookup(staffId);
            if (cached) {
                return { found: true, record: cached, source: 'cache' };
            }
            if (this.options.cacheOnly) {
                return { found: false, searched: 'cache' };
            }
            erpLogger.debug({ staffId }, 'Cache miss, querying ERP');
        }

        const record = await this.remote.fetchOne(staffId);
        if (record) {
            return { found: true, record, source: 'remote' };
        }
        return { found: false, searched: 'remote' };
    }
}
