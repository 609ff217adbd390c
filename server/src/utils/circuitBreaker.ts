/**
 * Circuit Breaker
 *
 * Guards ERP calls so an unreachable ERP fails fast instead of tying up every
 * registration in a batch with timeouts. While open, the validator sees
 * CircuitBreakerOpenError and classifies the outcome as transient.
 *
 * States:
 * - CLOSED: calls pass through; consecutive failures are counted
 * - OPEN: calls fail immediately until the reset time
 * - HALF_OPEN: a limited number of probe calls decide between CLOSED and OPEN
 */

import logger from './logger.js';

const circuitLogger = logger.child({ module: 'circuit-breaker' });

// ============================================
// TYPE DEFINITIONS
// ============================================

type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

interface CircuitBreakerOptions {
    /** Consecutive failures that open the circuit */
    failureThreshold?: number;
    /** Time the circuit stays open before probing */
    resetTimeoutMs?: number;
    /** Probe calls allowed while half-open */
    halfOpenMaxRequests?: number;
    /** Clock in epoch ms */
    now?: () => number;
}

interface CircuitStatus {
    name: string;
    state: CircuitState;
    failures: number;
    successes: number;
    lastFailureAt: Date | null;
    nextResetAt: Date | null;
}

export const CIRCUIT_BREAKER_DEFAULTS = {
    failureThreshold: 5,
    resetTimeoutMs: 30_000,
    halfOpenMaxRequests: 1,
} as const;

// ============================================
// CIRCUIT BREAKER CLASS
// ============================================

class CircuitBreaker {
    readonly name: string;
    private readonly failureThreshold: number;
    private readonly resetTimeoutMs: number;
    private readonly halfOpenMaxRequests: number;
    private readonly now: () => number;

    private state: CircuitState = 'CLOSED';
    private failures = 0;
    private successes = 0;
    private probesInFlight = 0;
    private lastFailureAt: number | null = null;
    private openUntil: number | null = null;

    constructor(name: string, options: CircuitBreakerOptions = {}) {
        this.name = name;
        this.failureThreshold = options.failureThreshold ?? CIRCUIT_BREAKER_DEFAULTS.failureThreshold;
        this.resetTimeoutMs = options.resetTimeoutMs ?? CIRCUIT_BREAKER_DEFAULTS.resetTimeoutMs;
        this.halfOpenMaxRequests = options.halfOpenMaxRequests ?? CIRCUIT_BREAKER_DEFAULTS.halfOpenMaxRequests;
        this.now = options.now ?? Date.now;
    }

    /**
     * Whether a call may go through now. Moves OPEN → HALF_OPEN once the
     * reset time has passed.
     */
    isAvailable(): boolean {
        switch (this.state) {
            case 'CLOSED':
                return true;
            case 'OPEN':
                if (this.openUntil !== null && this.now() >= this.openUntil) {
                    this.transitionTo('HALF_OPEN');
                    return true;
                }
                return false;
            case 'HALF_OPEN':
                return this.probesInFlight < this.halfOpenMaxRequests;
        }
    }

    /**
     * Run `fn` under the breaker.
     *
     * @throws CircuitBreakerOpenError without calling `fn` while the circuit is open
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (!this.isAvailable()) {
            throw new CircuitBreakerOpenError(this.name, this.toDate(this.openUntil));
        }

        const probing = this.state === 'HALF_OPEN';
        if (probing) this.probesInFlight++;

        try {
            const result = await fn();
            this.recordSuccess();
            return result;
        } catch (error) {
            this.recordFailure();
            throw error;
        } finally {
            if (probing && this.probesInFlight > 0) this.probesInFlight--;
        }
    }

    recordSuccess(): void {
        this.successes++;
        this.failures = 0;

        if (this.state === 'HALF_OPEN') {
            circuitLogger.info({ name: this.name }, 'ERP reachable again, closing circuit');
            this.transitionTo('CLOSED');
        }
    }

    recordFailure(): void {
        this.failures++;
        this.lastFailureAt = this.now();

        if (this.state === 'HALF_OPEN') {
            circuitLogger.warn({ name: this.name }, 'Probe call failed, reopening circuit');
            this.transitionTo('OPEN');
        } else if (this.state === 'CLOSED' && this.failures >= this.failureThreshold) {
            circuitLogger.warn({ name: this.name, failures: this.failures }, 'Failure threshold reached, opening circuit');
            this.transitionTo('OPEN');
        }
    }

    /** Close the circuit and forget past failures */
    reset(): void {
        circuitLogger.info({ name: this.name }, 'Circuit manually reset');
        this.transitionTo('CLOSED');
    }

    getStatus(): CircuitStatus {
        return {
            name: this.name,
            state: this.state,
            failures: this.failures,
            successes: this.successes,
            lastFailureAt: this.toDate(this.lastFailureAt),
            nextResetAt: this.toDate(this.openUntil),
        };
    }

    private transitionTo(next: CircuitState): void {
        const previous = this.state;
        this.state = next;

        switch (next) {
            case 'CLOSED':
                this.failures = 0;
                this.successes = 0;
                this.openUntil = null;
                this.probesInFlight = 0;
                break;
            case 'OPEN':
                this.openUntil = this.now() + this.resetTimeoutMs;
                break;
            case 'HALF_OPEN':
                this.probesInFlight = 0;
                break;
        }

        circuitLogger.debug({ name: this.name, from: previous, to: next }, 'Circuit state transition');
    }

    private toDate(epochMs: number | null): Date | null {
        return epochMs === null ? null : new Date(epochMs);
    }
}

// ============================================
// ERROR CLASS
// ============================================

export class CircuitBreakerOpenError extends Error {
    readonly name = 'CircuitBreakerOpenError' as const;
    readonly circuitName: string;
    readonly resetAt: Date | null;

    constructor(circuitName: string, resetAt: Date | null) {
        super(`Circuit breaker '${circuitName}' is open`);
        this.circuitName = circuitName;
        this.resetAt = resetAt;
        Object.setPrototypeOf(this, CircuitBreakerOpenError.prototype);
    }
}

// ============================================
// REGISTRY
// ============================================

const circuitBreakers = new Map<string, CircuitBreaker>();

/**
 * Get or create a circuit breaker by name.
 * Options only apply when the breaker is created.
 */
export function getCircuitBreaker(name: string, options?: CircuitBreakerOptions): CircuitBreaker {
    let breaker = circuitBreakers.get(name);
    if (!breaker) {
        breaker = new CircuitBreaker(name, options);
        circuitBreakers.set(name, breaker);
    }
    return breaker;
}

/** Name of the breaker guarding ERP calls */
export const ERP_CIRCUIT_NAME = 'erp_api';

// ============================================
// EXPORTS
// ============================================

export { CircuitBreaker };
export type { CircuitBreakerOptions, CircuitStatus, CircuitState };
