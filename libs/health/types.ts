import type { RecoveryEpisode } from '../recovery/RecoveryLadder.js';

export type HealthState = 'HEALTHY' | 'SUSPECT' | 'RECOVERING' | 'ALERT';

export interface HealthSample {
    /** ISO-8601 */
    timestamp: string;
    connected: boolean;
    /** Seconds since the last observed gateway activity, null if none yet */
    lastDataAgeSeconds: number | null;
    marketOpen: boolean;
}

export interface AlertStatus {
    since: string;
    lastEpisodeId: string;
    lastError: string | null;
    nextRetryAt: string;
}

/**
 * What the monitor needs from the owner of the session. The monitor never
 * touches the session itself.
 */
export interface HealthTarget {
    sample(now: Date, marketOpen: boolean): HealthSample;
    recover(trigger: 'HEALTH_MONITOR' | 'ALERT_RETRY'): Promise<RecoveryEpisode>;
    markDegraded(): void;
    markHealthy(): void;
}
