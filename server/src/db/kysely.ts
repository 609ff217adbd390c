/**
 * Kysely Factory
 *
 * Creates and manages a singleton Kysely instance over a pg pool.
 * Apply server/src/db/schema.sql before first use.
 *
 * Usage:
 *   const db = createKysely(config.databaseUrl);
 *   const rows = await db
 *     .selectFrom('registrations')
 *     .selectAll()
 *     .where('status', '=', 'pending')
 *     .execute();
 */

import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { DB } from './types.js';

let kyselyInstance: Kysely<DB> | null = null;

/**
 * Create or return the singleton Kysely instance
 */
export function createKysely(connectionString: string, maxConnections = 10): Kysely<DB> {
    if (kyselyInstance) return kyselyInstance;

    const pool = new pg.Pool({
        connectionString,
        max: maxConnections,
    });

    kyselyInstance = new Kysely<DB>({
        dialect: new PostgresDialect({ pool }),
    });

    return kyselyInstance;
}

/**
 * Get the existing Kysely instance
 *
 * @throws Error if createKysely() hasn't been called yet
 */
export function getKysely(): Kysely<DB> {
    if (!kyselyInstance) {
        throw new Error('Kysely not initialized. Call createKysely() first.');
    }
    return kyselyInstance;
}

/**
 * Close the pool; the next createKysely() builds a new one
 */
export async function destroyKysely(): Promise<void> {
    if (!kyselyInstance) return;
    const instance = kyselyInstance;
    kyselyInstance = null;
    await instance.destroy();
}

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance
 */
export type KyselyDB = Kysely<DB>;

export type { DB } from './types.js';
