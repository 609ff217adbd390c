/**
 * Shared Error Utilities
 *
 * Export barrel for domain-specific error utilities.
 */

export {
  InvalidTransitionError,
  requireTransition,
} from './registrations.js';
