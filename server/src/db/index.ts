/**
 * Database access (Kysely over pg)
 */

export { createKysely, getKysely, destroyKysely, type KyselyDB, type DB } from './kysely.js';
