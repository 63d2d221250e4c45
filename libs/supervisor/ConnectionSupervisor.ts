import crypto from 'crypto';
import { setTimeout as delay } from 'node:timers/promises';
import { getComponentLogger } from '../logging/logger.js';
import { NotReadyError, RecoveryCancelledError, describeError } from '../errors/gatewayErrors.js';
import { RecoveryLadder } from '../recovery/RecoveryLadder.js';
import type { LadderResult, RecoveryEpisode, RecoveryPolicy, RecoveryTrigger, Sleep } from '../recovery/RecoveryLadder.js';
import { resolveClientId } from '../session/GatewaySession.js';
import type { GatewaySession } from '../session/GatewaySession.js';
import type { GatewayEndpoint, SessionDescription } from '../session/types.js';
import type { ContainerLifecycleManager } from '../container/ContainerLifecycleManager.js';
import type { HealthSample, HealthTarget } from '../health/types.js';

const logger = getComponentLogger('ConnectionSupervisor');

export enum SessionState {
    DISCONNECTED = 'DISCONNECTED',
    CONNECTING = 'CONNECTING',
    CONNECTED = 'CONNECTED',
    DEGRADED = 'DEGRADED',
    RECONNECTING = 'RECONNECTING'
}

/** Triggers allowed to go past reconnects to a container restart */
const ESCALATING_TRIGGERS: ReadonlySet<RecoveryTrigger> = new Set<RecoveryTrigger>(['HEALTH_MONITOR', 'MANUAL', 'ALERT_RETRY']);

export interface ConnectionSupervisorOptions {
    endpoint: GatewayEndpoint;
    /** Fixed client id, or null to derive one per connect */
    clientId: number | null;
    connectTimeoutMs: number;
    /** How long a caller waits on an in-flight episode before NotReadyError */
    waitTimeoutMs: number;
    recovery: RecoveryPolicy;
    now?: () => Date;
    sleep?: Sleep;
}

export interface SupervisorStatus {
    state: SessionState;
    connected: boolean;
    session: SessionDescription;
    lastSample: HealthSample | null;
    currentEpisode: RecoveryEpisode | null;
    lastEpisode: RecoveryEpisode | null;
}

/**
 * Sole owner of the gateway session.
 *
 * Every connect and disconnect runs inside one recovery episode at a time.
 * Operations borrow the session through withSession; the health monitor and
 * manual reconnects share the same episode slot, so a second trigger joins
 * the episode already running instead of starting another. An escalating
 * trigger that joins lifts the episode's restart ban.
 */
export class ConnectionSupervisor implements HealthTarget {
    private state: SessionState = SessionState.DISCONNECTED;
    private episodeInFlight: Promise<LadderResult> | null = null;
    private episodeAbort: AbortController | null = null;
    private currentEpisode: RecoveryEpisode | null = null;
    private lastEpisode: RecoveryEpisode | null = null;
    private lastSample: HealthSample | null = null;
    private shuttingDown = false;

    private readonly ladder: RecoveryLadder;
    private readonly now: () => Date;

    constructor(
        private readonly session: GatewaySession,
        private readonly container: ContainerLifecycleManager,
        private readonly options: ConnectionSupervisorOptions
    ) {
        this.now = options.now ?? (() => new Date());
        this.ladder = new RecoveryLadder(
            options.recovery,
            {
                reconnect: () => this.connectOnce(),
                restartContainer: async () => {
                    await this.container.restart();
                }
            },
            { sleep: options.sleep, now: this.now }
        );
    }

    /** Initial connect. Failure leaves the session DISCONNECTED for the monitor to pick up. */
    public async start(): Promise<RecoveryEpisode> {
        const { episode } = await this.runEpisode('STARTUP');
        return episode;
    }

    /**
     * Runs `operation` against a ready session. Waits a bounded time for an
     * in-flight episode; errors from the operation itself pass through untouched.
     */
    public async withSession<T>(operation: (session: GatewaySession) => Promise<T>): Promise<T> {
        if (!this.isReady()) {
            await this.waitUntilReady();
        }
        return operation(this.session);
    }

    /**
     * Manual reconnect through the full ladder. Joins an episode already in flight.
     */
    public async reconnect(): Promise<RecoveryEpisode> {
        const { episode } = await this.runEpisode('MANUAL');
        return episode;
    }

    public async recover(trigger: 'HEALTH_MONITOR' | 'ALERT_RETRY'): Promise<RecoveryEpisode> {
        const { episode } = await this.runEpisode(trigger);
        return episode;
    }

    public markDegraded(): void {
        if (this.state === SessionState.CONNECTED) {
            this.setState(SessionState.DEGRADED);
        }
    }

    public markHealthy(): void {
        if (this.state === SessionState.DEGRADED && this.episodeInFlight === null && this.session.isConnected()) {
            this.setState(SessionState.CONNECTED);
        }
    }

    public sample(now: Date, marketOpen: boolean): HealthSample {
        const sample: HealthSample = {
            timestamp: now.toISOString(),
            connected: this.session.isConnected(),
            lastDataAgeSeconds: this.session.activityAgeSeconds(now),
            marketOpen
        };
        this.lastSample = sample;
        return sample;
    }

    public getState(): SessionState {
        return this.state;
    }

    public status(): SupervisorStatus {
        return {
            state: this.state,
            connected: this.session.isConnected(),
            session: this.session.describe(),
            lastSample: this.lastSample,
            currentEpisode: this.currentEpisode,
            lastEpisode: this.lastEpisode
        };
    }

    /**
     * Cancels a running episode without waiting for it, then closes the session.
     * No new episode starts afterwards.
     */
    public async shutdown(): Promise<void> {
        this.shuttingDown = true;
        if (this.episodeAbort) {
            logger.info({ episodeId: this.currentEpisode?.id }, 'Cancelling recovery episode for shutdown');
            this.episodeAbort.abort();
        }
        await this.session.disconnect();
        this.setState(SessionState.DISCONNECTED);
    }

    private isReady(): boolean {
        return (this.state === SessionState.CONNECTED || this.state === SessionState.DEGRADED)
            && this.session.isConnected();
    }

    private async waitUntilReady(): Promise<void> {
        if (this.shuttingDown) {
            throw new NotReadyError(this.state, 0);
        }

        const inFlight = this.episodeInFlight ?? this.runEpisode('ON_DEMAND');
        const waitMs = this.options.waitTimeoutMs;
        const timer = new AbortController();

        try {
            const settled = await Promise.race([
                inFlight,
                delay(waitMs, null, { signal: timer.signal })
            ]);

            if (settled === null) {
                logger.warn({ state: this.state, waitedMs: waitMs }, 'Session not ready within wait timeout');
                throw new NotReadyError(this.state, waitMs);
            }

            if (settled.episode.outcome === 'FAILED' && settled.failure instanceof Error) {
                throw settled.failure;
            }
            if (!this.isReady()) {
                throw new NotReadyError(this.state, waitMs);
            }
        } finally {
            timer.abort();
        }
    }

    private runEpisode(trigger: RecoveryTrigger): Promise<LadderResult> {
        if (this.episodeInFlight) {
            const joined = this.currentEpisode;
            if (joined && !joined.escalate && ESCALATING_TRIGGERS.has(trigger)) {
                joined.escalate = true;
                logger.info({ trigger, episodeId: joined.id, episodeTrigger: joined.trigger }, 'Escalating recovery episode in flight');
            } else {
                logger.info({ trigger, episodeId: joined?.id }, 'Joining recovery episode in flight');
            }
            return this.episodeInFlight;
        }

        const episode: RecoveryEpisode = {
            id: crypto.randomUUID(),
            trigger,
            escalate: ESCALATING_TRIGGERS.has(trigger),
            startedAt: this.now().toISOString(),
            endedAt: null,
            outcome: 'PENDING',
            attempts: [],
            error: null
        };

        const abort = new AbortController();
        this.currentEpisode = episode;
        this.episodeAbort = abort;
        this.setState(trigger === 'STARTUP' || trigger === 'ON_DEMAND' ? SessionState.CONNECTING : SessionState.RECONNECTING);
        logger.info({ episodeId: episode.id, trigger, escalate: episode.escalate }, 'Recovery episode started');

        this.episodeInFlight = this.ladder.run(episode, abort.signal).then(
            result => this.settleEpisode(result),
            (error: unknown) => {
                episode.outcome = 'FAILED';
                episode.endedAt = this.now().toISOString();
                episode.error = describeError(error);
                return this.settleEpisode({ episode, failure: error });
            }
        );
        return this.episodeInFlight;
    }

    private settleEpisode(result: LadderResult): LadderResult {
        const { episode } = result;
        const connected = episode.outcome === 'SUCCEEDED' && this.session.isConnected();

        // State and slot change together so CONNECTED is never seen with an episode in flight
        this.episodeInFlight = null;
        this.episodeAbort = null;
        this.currentEpisode = null;
        this.lastEpisode = episode;
        this.setState(connected ? SessionState.CONNECTED : SessionState.DISCONNECTED);

        if (connected) {
            logger.info({ episodeId: episode.id, trigger: episode.trigger, attempts: episode.attempts.length }, 'Recovery episode succeeded');
        } else {
            logger.error({ episodeId: episode.id, trigger: episode.trigger, error: episode.error }, 'Recovery episode failed');
        }
        return result;
    }

    private async connectOnce(): Promise<void> {
        const clientId = resolveClientId(this.options.clientId, this.now());
        await this.session.connect(this.options.endpoint, clientId, this.options.connectTimeoutMs);

        // A connect that lands after shutdown must not leave a socket behind
        if (this.shuttingDown) {
            await this.session.disconnect();
            throw new RecoveryCancelledError(this.currentEpisode?.id ?? 'unknown');
        }
    }

    private setState(next: SessionState): void {
        if (next === this.state) return;
        logger.info({ from: this.state, to: next }, 'Session state changed');
        this.state = next;
    }
}
