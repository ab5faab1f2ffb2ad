import type { ILogger } from '../config/logger';

export type CircuitState = 'closed' | 'open' | 'half_open';

/** Outcome of asking the breaker whether a call may go through. */
export type CircuitPermit = 'pass' | 'probe' | 'reject';

export interface CircuitBreakerOptions {
    failureThreshold: number;
    windowMs: number;
    cooldownMs: number;
}

/**
 * Rolling-window circuit breaker for one provider.
 *
 * closed → open after `failureThreshold` failures within `windowMs`;
 * open → half_open once `cooldownMs` has elapsed, admitting a single probe;
 * the probe's outcome closes or reopens the circuit.
 */
export class CircuitBreaker {
    private failures: number[] = [];
    private current: CircuitState = 'closed';
    private openedAt = 0;
    private probeInFlight = false;

    constructor(
        readonly name: string,
        private options: CircuitBreakerOptions,
        private logger: ILogger,
        private now: () => number = Date.now
    ) { }

    get state(): CircuitState {
        return this.current;
    }

    acquire(): CircuitPermit {
        if (this.current === 'closed') {
            return 'pass';
        }
        if (this.current === 'open' && this.now() - this.openedAt >= this.options.cooldownMs) {
            this.transition('half_open');
            this.probeInFlight = true;
            return 'probe';
        }
        return 'reject';
    }

    recordSuccess(): void {
        if (this.current === 'half_open') {
            this.failures = [];
            this.probeInFlight = false;
            this.transition('closed');
        }
    }

    recordFailure(): void {
        const now = this.now();
        if (this.current === 'half_open') {
            this.open(now);
            return;
        }
        if (this.current === 'open') {
            return;
        }
        this.failures = this.failures.filter(at => now - at < this.options.windowMs);
        this.failures.push(now);
        if (this.failures.length >= this.options.failureThreshold) {
            this.open(now);
        }
    }

    /**
     * The probe ended without an outcome (the caller gave up). Return to open
     * with the original timestamp so the next call probes again.
     */
    abandonProbe(): void {
        if (this.current === 'half_open' && this.probeInFlight) {
            this.probeInFlight = false;
            this.transition('open');
        }
    }

    private open(now: number): void {
        this.openedAt = now;
        this.failures = [];
        this.probeInFlight = false;
        this.transition('open');
    }

    private transition(next: CircuitState): void {
        if (next === this.current) {
            return;
        }
        this.logger.warn({ provider: this.name, from: this.current, to: next }, 'Provider circuit state changed');
        this.current = next;
    }
}
