/**
 * Domain Layer
 *
 * Pure business logic shared by the pipeline services and their tests.
 */

export * from './registrations/index.js';
