import { setTimeout as delay } from 'node:timers/promises';
import { getComponentLogger } from '../logging/logger.js';
import { describeError } from '../errors/gatewayErrors.js';
import { SampleRing } from './sampleRing.js';
import { AlwaysOpenCalendar } from './tradingCalendar.js';
import type { TradingCalendar } from './tradingCalendar.js';
import type { AlertStatus, HealthSample, HealthState, HealthTarget } from './types.js';
import type { RecoveryEpisode } from '../recovery/RecoveryLadder.js';

const logger = getComponentLogger('HealthMonitor');

export interface HealthMonitorOptions {
    intervalMs: number;
    stalenessThresholdMs: number;
    /** Consecutive unhealthy samples before recovery starts */
    debounceSamples: number;
    sampleHistory: number;
    /** Minimum gap between recovery attempts while in ALERT */
    alertRetryMs: number;
    calendar?: TradingCalendar;
    now?: () => Date;
    /** Waits between ticks; must reject or resolve early once the signal aborts */
    sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface HealthMonitorSnapshot {
    state: HealthState;
    consecutiveUnhealthy: number;
    lastSample: HealthSample | null;
    samples: HealthSample[];
    alert: AlertStatus | null;
    running: boolean;
}

/**
 * Disconnected is always unhealthy. Connected but silent is unhealthy only
 * while the market is open.
 */
export function isUnhealthy(sample: HealthSample, stalenessThresholdMs: number): boolean {
    if (!sample.connected) return true;
    if (!sample.marketOpen) return false;
    if (sample.lastDataAgeSeconds === null) return true;
    return sample.lastDataAgeSeconds * 1000 > stalenessThresholdMs;
}

const abortableDelay = async (ms: number, signal: AbortSignal): Promise<void> => {
    await delay(ms, undefined, { signal });
};

/**
 * Periodic health check of the gateway session.
 *
 * HEALTHY -> SUSPECT on the first unhealthy sample, -> RECOVERING after
 * `debounceSamples` in a row. A failed recovery parks the monitor in ALERT,
 * from where the ladder is retried every `alertRetryMs`. The first connected
 * and fresh sample returns to HEALTHY from any state.
 */
export class HealthMonitor {
    private state: HealthState = 'HEALTHY';
    private consecutiveUnhealthy = 0;
    private readonly samples: SampleRing<HealthSample>;
    private readonly calendar: TradingCalendar;
    private readonly now: () => Date;
    private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

    private tickInFlight: Promise<HealthState> | null = null;
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;

    private alertSince: Date | null = null;
    private lastRecoveryEndedAt: Date | null = null;
    private lastEpisode: RecoveryEpisode | null = null;

    constructor(
        private readonly target: HealthTarget,
        private readonly options: HealthMonitorOptions
    ) {
        this.samples = new SampleRing(options.sampleHistory);
        this.calendar = options.calendar ?? new AlwaysOpenCalendar();
        this.now = options.now ?? (() => new Date());
        this.sleep = options.sleep ?? abortableDelay;
    }

    public start(): void {
        if (this.loop) {
            logger.warn('HealthMonitor already running');
            return;
        }

        const controller = new AbortController();
        this.controller = controller;
        this.loop = this.runLoop(controller.signal);
        logger.info({ intervalMs: this.options.intervalMs }, 'HealthMonitor started');
    }

    /**
     * Cancels the loop and waits for it to finish. A tick waiting on recovery
     * returns at once; the episode itself belongs to the target.
     */
    public async stop(): Promise<void> {
        const loop = this.loop;
        if (!loop) return;

        this.controller?.abort();
        await loop;
        this.loop = null;
        this.controller = null;
        logger.info('HealthMonitor stopped');
    }

    /**
     * Takes one sample and applies the state machine. Calls made while a tick
     * runs share its result instead of sampling again.
     */
    public tick(): Promise<HealthState> {
        if (this.tickInFlight) {
            return this.tickInFlight;
        }

        this.tickInFlight = this.runTick().finally(() => {
            this.tickInFlight = null;
        });
        return this.tickInFlight;
    }

    public getState(): HealthState {
        return this.state;
    }

    public snapshot(): HealthMonitorSnapshot {
        return {
            state: this.state,
            consecutiveUnhealthy: this.consecutiveUnhealthy,
            lastSample: this.samples.latest(),
            samples: this.samples.toArray(),
            alert: this.alertStatus(),
            running: this.loop !== null
        };
    }

    private async runLoop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            try {
                await this.tick();
            } catch (error) {
                logger.error({ error: describeError(error) }, 'Health tick failed');
            }

            if (signal.aborted) break;
            try {
                await this.sleep(this.options.intervalMs, signal);
            } catch (error) {
                if (!signal.aborted) {
                    logger.error({ error: describeError(error) }, 'Health loop wait failed, stopping loop');
                }
                break;
            }
        }
    }

    private async runTick(): Promise<HealthState> {
        const now = this.now();
        const sample = this.target.sample(now, this.calendar.isMarketOpen(now));
        this.samples.push(sample);

        if (!isUnhealthy(sample, this.options.stalenessThresholdMs)) {
            this.consecutiveUnhealthy = 0;
            if (this.state !== 'HEALTHY') {
                this.transition('HEALTHY', sample);
                this.alertSince = null;
                this.target.markHealthy();
            }
            return this.state;
        }

        this.consecutiveUnhealthy += 1;

        if (this.state === 'ALERT') {
            if (this.alertRetryDue(now)) {
                await this.runRecovery('ALERT_RETRY');
            } else {
                logger.debug({ consecutiveUnhealthy: this.consecutiveUnhealthy }, 'Unhealthy sample while in ALERT');
            }
            return this.state;
        }

        if (this.consecutiveUnhealthy >= this.options.debounceSamples) {
            await this.runRecovery('HEALTH_MONITOR');
            return this.state;
        }

        if (this.state === 'HEALTHY') {
            this.transition('SUSPECT', sample);
            this.target.markDegraded();
        }
        return this.state;
    }

    private async runRecovery(trigger: 'HEALTH_MONITOR' | 'ALERT_RETRY'): Promise<void> {
        this.consecutiveUnhealthy = 0;
        if (this.state !== 'ALERT') {
            this.transition('RECOVERING', this.samples.latest());
        }

        const recovery = this.target.recover(trigger).then(
            episode => ({ episode }),
            (error: unknown) => ({ error })
        );
        const settled = await this.unlessStopped(recovery);
        if (settled === null) {
            logger.info({ trigger }, 'Monitor stopped while recovery in flight');
            return;
        }

        let succeeded = false;
        if ('episode' in settled) {
            this.lastEpisode = settled.episode;
            succeeded = settled.episode.outcome === 'SUCCEEDED';
        } else {
            logger.error({ trigger, error: describeError(settled.error) }, 'Recovery raised unexpectedly');
        }
        this.lastRecoveryEndedAt = this.now();

        if (succeeded) {
            // Stays RECOVERING until a fresh sample confirms the session
            if (this.state === 'ALERT') {
                this.transition('RECOVERING', this.samples.latest());
            }
            return;
        }

        if (this.state !== 'ALERT') {
            this.alertSince = this.lastRecoveryEndedAt;
            this.transition('ALERT', this.samples.latest());
        }
        logger.error({
            trigger,
            episodeId: this.lastEpisode?.id,
            error: this.lastEpisode?.error,
            nextRetryInMs: this.options.alertRetryMs
        }, 'Gateway recovery failed, operator attention required');
    }

    /** null when the loop is stopped before `work` settles */
    private async unlessStopped<T>(work: Promise<T>): Promise<T | null> {
        const signal = this.controller?.signal;
        if (!signal) return work;
        if (signal.aborted) return null;

        let onAbort: () => void = () => undefined;
        const aborted = new Promise<null>(resolve => {
            onAbort = () => resolve(null);
            signal.addEventListener('abort', onAbort, { once: true });
        });
        try {
            return await Promise.race([work, aborted]);
        } finally {
            signal.removeEventListener('abort', onAbort);
        }
    }

    private alertRetryDue(now: Date): boolean {
        if (this.lastRecoveryEndedAt === null) return true;
        return now.getTime() - this.lastRecoveryEndedAt.getTime() >= this.options.alertRetryMs;
    }

    private alertStatus(): AlertStatus | null {
        if (this.state !== 'ALERT' || this.alertSince === null) return null;
        const lastEnded = this.lastRecoveryEndedAt ?? this.alertSince;
        return {
            since: this.alertSince.toISOString(),
            lastEpisodeId: this.lastEpisode?.id ?? '',
            lastError: this.lastEpisode?.error ?? null,
            nextRetryAt: new Date(lastEnded.getTime() + this.options.alertRetryMs).toISOString()
        };
    }

    private transition(next: HealthState, sample: HealthSample | null): void {
        const previous = this.state;
        this.state = next;
        logger.info({
            from: previous,
            to: next,
            connected: sample?.connected,
            lastDataAgeSeconds: sample?.lastDataAgeSeconds
        }, 'Health state changed');
    }
}
