/**
 * @regverify/shared - Domain types and pure logic for the verification pipeline
 *
 * Registration lifecycle (state machine, acceptance rules) and the errors
 * that go with it. No I/O lives in this package.
 */

export * from './domain/index.js';
export * from './errors/index.js';
