/**
 * Shutdown Coordinator
 *
 * Manages graceful shutdown for the background loops.
 * Every registered handler gets its own timeout; a slow handler
 * cannot keep the process alive past it.
 */

import { shutdownLogger } from './logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

/**
 * Registered shutdown handler
 */
interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

/**
 * Status of a shutdown handler
 */
interface HandlerStatus {
    name: string;
    registered: boolean;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private handlers: Map<string, ShutdownHandler>;
    private isShuttingDown: boolean;

    constructor() {
        this.handlers = new Map();
        this.isShuttingDown = false;
    }

    /**
     * Register a shutdown handler
     * @param name - Unique identifier for the handler
     * @param handler - Async function to call on shutdown
     * @param timeout - Max time to wait for handler (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            shutdownLogger.warn({ name }, 'Shutdown handler already registered, replacing');
        }

        this.handlers.set(name, { name, handler, timeout });
        shutdownLogger.debug({ name, timeout }, 'Shutdown handler registered');
    }

    unregister(name: string): void {
        if (this.handlers.delete(name)) {
            shutdownLogger.debug({ name }, 'Shutdown handler unregistered');
        }
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    getStatus(): HandlerStatus[] {
        return Array.from(this.handlers.values()).map(h => ({
            name: h.name,
            registered: true,
            timeout: h.timeout,
        }));
    }

    /**
     * Execute all shutdown handlers in parallel, each bounded by its timeout
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.isShuttingDown) {
            shutdownLogger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        shutdownLogger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results = await Promise.all(
            Array.from(this.handlers.values()).map(handler => this.runHandler(handler))
        );

        const successful = results.filter(r => r.success).length;
        const failed = results.length - successful;
        shutdownLogger.info({ successful, failed, total: results.length }, 'Shutdown complete');

        return results;
    }

    private async runHandler({ name, handler, timeout }: ShutdownHandler): Promise<ShutdownResult> {
        const start = Date.now();
        let timer: NodeJS.Timeout | undefined;

        try {
            const result = await Promise.race([
                (async () => {
                    await handler();
                    return { timedOut: false };
                })(),
                new Promise<{ timedOut: boolean }>((resolve) => {
                    timer = setTimeout(() => resolve({ timedOut: true }), timeout);
                }),
            ]);

            const duration = Date.now() - start;
            if (result.timedOut) {
                shutdownLogger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                return { name, success: false, error: 'Timeout', duration };
            }

            shutdownLogger.debug({ name, duration }, 'Shutdown handler completed');
            return { name, success: true, duration };
        } catch (error: unknown) {
            const duration = Date.now() - start;
            const errorMsg = error instanceof Error ? error.message : 'Unknown error';
            shutdownLogger.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
            return { name, success: false, error: errorMsg, duration };
        } finally {
            clearTimeout(timer);
        }
    }
}

// ============================================
// EXPORTS
// ============================================

// Export singleton instance
export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
