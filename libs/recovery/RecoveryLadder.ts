import { setTimeout as delay } from 'node:timers/promises';
import { getComponentLogger } from '../logging/logger.js';
import { RecoveryCancelledError, describeError } from '../errors/gatewayErrors.js';

const logger = getComponentLogger('RecoveryLadder');

export type RecoveryTrigger = 'STARTUP' | 'ON_DEMAND' | 'HEALTH_MONITOR' | 'MANUAL' | 'ALERT_RETRY';
export type RecoveryAttemptKind = 'RECONNECT' | 'CONTAINER_RESTART';
export type RecoveryOutcome = 'PENDING' | 'SUCCEEDED' | 'FAILED';

export interface RecoveryAttempt {
    kind: RecoveryAttemptKind;
    /** 1-based, counted per kind across the episode */
    attempt: number;
    startedAt: string;
    endedAt: string | null;
    outcome: RecoveryOutcome;
    error: string | null;
    /** Delay waited before this attempt */
    backoffMs: number;
}

export interface RecoveryEpisode {
    id: string;
    trigger: RecoveryTrigger;
    /** Whether the ladder may go past the reconnect stage */
    escalate: boolean;
    startedAt: string;
    endedAt: string | null;
    outcome: RecoveryOutcome;
    attempts: RecoveryAttempt[];
    error: string | null;
}

export interface RecoveryPolicy {
    backoffBaseMs: number;
    backoffCapMs: number;
    maxReconnectAttempts: number;
    maxRestartAttempts: number;
    /** Pause after a container restart before reconnecting */
    restartSettleMs: number;
}

export interface RecoverySteps {
    reconnect(): Promise<void>;
    restartContainer(): Promise<void>;
}

export interface LadderResult {
    episode: RecoveryEpisode;
    /** Error of the last failed attempt, undefined on success */
    failure: unknown;
}

/** Must resolve or reject early once `signal` aborts */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
    await delay(ms, undefined, { signal });
};

/**
 * Delay before retry number `retryNo`: base * 2^(retryNo - 1), capped.
 */
export function calculateBackoffMs(retryNo: number, baseMs: number, capMs: number): number {
    const backoff = baseMs * Math.pow(2, Math.max(0, retryNo - 1));
    return Math.min(backoff, capMs);
}

/**
 * Escalating recovery: reconnect with backoff, then restart the container and
 * reconnect again. Every step is recorded on the episode; nothing is retried
 * outside the counts in the policy.
 *
 * Aborting the signal ends the episode FAILED at the next pause or step
 * boundary. A step already running is not interrupted.
 */
export class RecoveryLadder {
    private readonly sleep: Sleep;
    private readonly now: () => Date;

    constructor(
        private readonly policy: RecoveryPolicy,
        private readonly steps: RecoverySteps,
        options: { sleep?: Sleep; now?: () => Date } = {}
    ) {
        this.sleep = options.sleep ?? defaultSleep;
        this.now = options.now ?? (() => new Date());
    }

    public async run(episode: RecoveryEpisode, signal?: AbortSignal): Promise<LadderResult> {
        let failure = await this.reconnectStage(episode, signal);
        if (failure === undefined) {
            return this.finish(episode, undefined);
        }

        // Read after the stage: a joining trigger may have allowed escalation meanwhile
        if (!episode.escalate || failure instanceof RecoveryCancelledError) {
            return this.finish(episode, failure);
        }

        for (let restart = 1; restart <= this.policy.maxRestartAttempts; restart++) {
            if (signal?.aborted) {
                return this.finish(episode, new RecoveryCancelledError(episode.id));
            }

            logger.warn({ episodeId: episode.id, restart }, 'Reconnects exhausted, restarting gateway container');
            const restartFailure = await this.attempt(episode, 'CONTAINER_RESTART', 0, () => this.steps.restartContainer());
            if (restartFailure !== undefined) {
                failure = restartFailure;
                continue;
            }

            if (!await this.pause(this.policy.restartSettleMs, signal)) {
                return this.finish(episode, new RecoveryCancelledError(episode.id));
            }

            failure = await this.reconnectStage(episode, signal);
            if (failure === undefined) {
                return this.finish(episode, undefined);
            }
            if (failure instanceof RecoveryCancelledError) {
                return this.finish(episode, failure);
            }
        }

        return this.finish(episode, failure);
    }

    /** undefined when a reconnect succeeded, otherwise the last error */
    private async reconnectStage(episode: RecoveryEpisode, signal?: AbortSignal): Promise<unknown> {
        let failure: unknown;
        for (let retry = 0; retry < this.policy.maxReconnectAttempts; retry++) {
            const backoffMs = retry === 0
                ? 0
                : calculateBackoffMs(retry, this.policy.backoffBaseMs, this.policy.backoffCapMs);
            if (!await this.pause(backoffMs, signal)) {
                return new RecoveryCancelledError(episode.id);
            }

            failure = await this.attempt(episode, 'RECONNECT', backoffMs, () => this.steps.reconnect());
            if (failure === undefined) {
                return undefined;
            }
        }
        return failure ?? new Error('No reconnect attempts allowed');
    }

    /** false once the signal has aborted, before or during the wait */
    private async pause(ms: number, signal?: AbortSignal): Promise<boolean> {
        if (signal?.aborted) return false;
        if (ms <= 0) return true;

        try {
            await this.sleep(ms, signal);
        } catch (error) {
            if (!signal?.aborted) throw error;
        }
        return !signal?.aborted;
    }

    private async attempt(
        episode: RecoveryEpisode,
        kind: RecoveryAttemptKind,
        backoffMs: number,
        step: () => Promise<void>
    ): Promise<unknown> {
        const record: RecoveryAttempt = {
            kind,
            attempt: episode.attempts.filter(existing => existing.kind === kind).length + 1,
            startedAt: this.now().toISOString(),
            endedAt: null,
            outcome: 'PENDING',
            error: null,
            backoffMs
        };
        episode.attempts.push(record);

        try {
            await step();
            record.outcome = 'SUCCEEDED';
            record.endedAt = this.now().toISOString();
            logger.info({ episodeId: episode.id, kind, attempt: record.attempt }, 'Recovery step succeeded');
            return undefined;
        } catch (error) {
            record.outcome = 'FAILED';
            record.error = describeError(error);
            record.endedAt = this.now().toISOString();
            logger.warn({ episodeId: episode.id, kind, attempt: record.attempt, error: record.error }, 'Recovery step failed');
            return error ?? new Error('Recovery step failed');
        }
    }

    private finish(episode: RecoveryEpisode, failure: unknown): LadderResult {
        episode.endedAt = this.now().toISOString();
        if (failure === undefined) {
            episode.outcome = 'SUCCEEDED';
            episode.error = null;
        } else {
            episode.outcome = 'FAILED';
            episode.error = describeError(failure);
        }
        return { episode, failure };
    }
}
