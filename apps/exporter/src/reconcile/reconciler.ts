/**
 * Monotonic reconciliation for resettable counters.
 *
 * PostgreSQL statistics counters drop back toward zero whenever someone calls
 * pg_stat_reset(). Published counters must never decrease, so each key keeps
 * an offset that is re-anchored at the highest value ever published whenever
 * a raw reading would take the corrected value below it.
 *
 * A reset followed by enough growth to pass the old maximum before the next
 * poll looks exactly like ordinary growth and is not detected.
 */

import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "reconciler" });

export interface ReconciliationState {
    /** Highest corrected value returned for the key */
    lastCorrected: number;
    /** Bias added to raw readings since the last detected reset */
    offset: number;
    /** Number of resets detected for the key */
    resets: number;
}

/**
 * Tracks one ReconciliationState per metric key.
 *
 * Keys must be unique per logical counter: two statistics sharing a key
 * corrupt each other's state, and nothing here can detect that.
 *
 * reconcile() is synchronous, so one call's read-modify-write of a key can
 * never interleave with another call on the same key.
 */
export class CounterReconciler {
    private readonly states = new Map<string, ReconciliationState>();
    // Tail of the fetch-then-reconcile chain per key
    private readonly pending = new Map<string, Promise<number>>();
    private resetCount = 0;

    /**
     * Turn a raw reading into a corrected, never-decreasing value.
     */
    reconcile(key: string, rawValue: number): number {
        let state = this.states.get(key);
        if (!state) {
            state = { lastCorrected: 0, offset: 0, resets: 0 };
            this.states.set(key, state);
        }

        let candidate = rawValue + state.offset;
        if (candidate < state.lastCorrected) {
            logger.info(
                {
                    key,
                    rawValue,
                    previousOffset: state.offset,
                    offset: state.lastCorrected,
                },
                "Counter reset detected, re-anchoring"
            );
            state.offset = state.lastCorrected;
            candidate = state.lastCorrected + rawValue;
            state.resets += 1;
            this.resetCount += 1;
        }

        state.lastCorrected = candidate;
        return candidate;
    }

    /**
     * Fetch a raw reading, then reconcile it.
     *
     * Calls on the same key are chained: a fetch starts only after the
     * previous call's fetch and reconcile have finished, so readings are
     * applied in the order they were taken. A rejected fetch rejects only
     * its own caller.
     */
    reconcileFrom(key: string, fetchRaw: () => Promise<number>): Promise<number> {
        const previous = this.pending.get(key) ?? Promise.resolve(0);
        const run = async () => this.reconcile(key, await fetchRaw());
        const next = previous.then(run, run);

        this.pending.set(key, next);
        const release = () => {
            if (this.pending.get(key) === next) {
                this.pending.delete(key);
            }
        };
        next.then(release, release);

        return next;
    }

    /**
     * Copy of a key's state, or undefined if the key was never reconciled.
     */
    snapshot(key: string): ReconciliationState | undefined {
        const state = this.states.get(key);
        return state ? { ...state } : undefined;
    }

    get size(): number {
        return this.states.size;
    }

    get totalResets(): number {
        return this.resetCount;
    }
}
