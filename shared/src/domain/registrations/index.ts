/**
 * Registrations Domain Layer
 *
 * Lifecycle rules for alumni registrations.
 */

export * from './types.js';
export * from './stateMachine.js';
export * from './acceptanceRules.js';
export * from './nameSimilarity.js';
