/**
 * Unit tests for log level resolution
 */

import { resolveStreamLevel } from '../logger.js';

describe('resolveStreamLevel', () => {
    it('honours LOG_LEVEL in production', () => {
        expect(resolveStreamLevel('debug', false)).toBe('debug');
        expect(resolveStreamLevel('trace', false)).toBe('trace');
    });

    it('honours LOG_LEVEL in development', () => {
        expect(resolveStreamLevel('warn', true)).toBe('warn');
    });

    it('falls back to info in production and debug in development', () => {
        expect(resolveStreamLevel(undefined, false)).toBe('info');
        expect(resolveStreamLevel(undefined, true)).toBe('debug');
    });

    it('ignores a value that is not a pino level', () => {
        expect(resolveStreamLevel('verbose', false)).toBe('info');
    });
});
