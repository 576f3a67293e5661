import { KeyedLock, type ConversationExchange } from '@recall/shared';
import type { InquiryDialogState, ReminderDialogState } from '../dialog/types.js';

export type CallSession =
    | { flow: 'reminder'; reminderId: string; state: ReminderDialogState }
    | { flow: 'inquiry'; state: InquiryDialogState; history: ConversationExchange[] };

interface SessionEntry {
    session: CallSession;
    touchedAt: number;
}

export interface CallSessionConfigs {
    ttlMs: number;
    sweepIntervalMs?: number;
}

/**
 * Per-call dialog state, held in process memory for the lifetime of a call.
 * All reads and writes for one call go through `withCall`, which runs them
 * one at a time.
 */
export class CallSessionManager {
    private sessions = new Map<string, SessionEntry>();
    private lock = new KeyedLock();
    private sweepTimer: NodeJS.Timeout | null = null;
    private configs: CallSessionConfigs;
    private clock: () => number;

    constructor(configs: CallSessionConfigs, clock: () => number = Date.now) {
        this.configs = configs;
        this.clock = clock;
    }

    start(): void {
        if (this.sweepTimer) return;
        this.sweepTimer = setInterval(() => {
            const removed = this.sweepExpired();
            if (removed > 0) {
                console.log(`[CallSessionManager] Expired ${removed} idle call session(s)`);
            }
        }, this.configs.sweepIntervalMs ?? 60_000);
        this.sweepTimer.unref();
    }

    stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }

    async withCall<T>(callRef: string, task: (session: CallSession | null) => Promise<{ session: CallSession; result: T }>): Promise<T> {
        return await this.lock.run(callRef, async () => {
            const { session, result } = await task(this.get(callRef));
            this.sessions.set(callRef, { session, touchedAt: this.clock() });
            return result;
        });
    }

    async endCall(callRef: string): Promise<void> {
        await this.lock.run(callRef, async () => {
            if (this.sessions.delete(callRef)) {
                console.log('[CallSessionManager] Ended session:', callRef);
            }
        });
    }

    sweepExpired(): number {
        const cutoff = this.clock() - this.configs.ttlMs;
        let removed = 0;
        for (const [callRef, entry] of this.sessions) {
            if (entry.touchedAt < cutoff) {
                this.sessions.delete(callRef);
                removed++;
            }
        }
        return removed;
    }

    get activeCount(): number {
        return this.sessions.size;
    }

    private get(callRef: string): CallSession | null {
        const entry = this.sessions.get(callRef);
        if (!entry) return null;
        if (entry.touchedAt < this.clock() - this.configs.ttlMs) {
            this.sessions.delete(callRef);
            return null;
        }
        return entry.session;
    }
}
