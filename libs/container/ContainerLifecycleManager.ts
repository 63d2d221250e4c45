import { getComponentLogger } from '../logging/logger.js';
import { ContainerError, describeError } from '../errors/gatewayErrors.js';
import type { ContainerInspection, ContainerRecord, ContainerRuntime, ContainerSpec } from './types.js';

const logger = getComponentLogger('ContainerLifecycleManager');

const DEFAULT_LOG_TAIL = 100;

export interface ContainerLifecycleOptions {
    /** Grace period handed to the runtime before the stop turns into a kill */
    stopGraceSeconds: number;
    now?: () => Date;
}

/**
 * Owns the desired state of the single gateway container.
 *
 * The record lives for the lifetime of this process only. Shutdown discards it
 * and leaves the container running so a restarted supervisor picks it up again.
 */
export class ContainerLifecycleManager {
    private record: ContainerRecord | null = null;
    private spec: ContainerSpec | null = null;
    private restartInFlight: Promise<ContainerRecord> | null = null;
    private readonly now: () => Date;

    constructor(
        private readonly runtime: ContainerRuntime,
        private readonly containerName: string,
        private readonly options: ContainerLifecycleOptions
    ) {
        this.now = options.now ?? (() => new Date());
    }

    public get name(): string {
        return this.containerName;
    }

    /**
     * Creates, starts or leaves alone the gateway container so that it ends up running.
     * Already running is a no-op against the runtime apart from the state refresh.
     */
    public async ensureRunning(spec: ContainerSpec): Promise<ContainerRecord> {
        if (spec.name !== this.containerName) {
            throw new ContainerError(
                'RUNTIME',
                `Container spec targets ${spec.name}, manager owns ${this.containerName}`,
                { containerName: this.containerName }
            );
        }

        this.spec = spec;
        const record = this.currentRecord(spec.image);
        record.desiredState = 'RUNNING';

        try {
            const inspection = await this.runtime.inspect(spec.name);

            if (inspection === null) {
                logger.info({ name: spec.name, image: spec.image }, 'Gateway container not found, creating');
                await this.runtime.pullImage(spec.image);
                record.containerId = await this.runtime.create(spec);
                await this.runtime.start(spec.name);
                return await this.refresh();
            }

            if (inspection.state !== 'RUNNING') {
                logger.info({ name: spec.name, observedState: inspection.state }, 'Starting existing gateway container');
                await this.runtime.start(spec.name);
                return await this.refresh();
            }

            logger.debug({ name: spec.name }, 'Gateway container already running');
            return this.apply(inspection);
        } catch (error) {
            throw this.fail(error);
        }
    }

    /**
     * Observed state straight from the runtime. Never throws: a missing container
     * reads NOT_FOUND and an unreachable daemon reads UNKNOWN with lastError set.
     */
    public async status(): Promise<ContainerRecord> {
        try {
            return await this.refresh();
        } catch (error) {
            const record = this.currentRecord();
            record.observedState = 'UNKNOWN';
            record.lastObservedAt = this.now().toISOString();
            record.lastError = describeError(error);
            logger.warn({ name: this.containerName, error: record.lastError }, 'Container status unavailable');
            return { ...record };
        }
    }

    public async logs(tailLines: number = DEFAULT_LOG_TAIL): Promise<string[]> {
        const inspection = await this.runtime.inspect(this.containerName);
        if (inspection === null) {
            throw new ContainerError('NOT_FOUND', `Container ${this.containerName} not found`, {
                containerName: this.containerName
            });
        }
        return this.runtime.logs(this.containerName, tailLines);
    }

    /**
     * Stop (graceful, then forced) and start again.
     * Callers arriving while a restart runs share its result.
     */
    public restart(): Promise<ContainerRecord> {
        if (this.restartInFlight) {
            logger.info({ name: this.containerName }, 'Restart already in progress, joining');
            return this.restartInFlight;
        }

        this.restartInFlight = this.performRestart().finally(() => {
            this.restartInFlight = null;
        });
        return this.restartInFlight;
    }

    /**
     * Shutdown hook. Drops the record; the container keeps running unless removal is requested.
     */
    public async release(options: { removeContainer?: boolean } = {}): Promise<void> {
        if (options.removeContainer) {
            logger.info({ name: this.containerName }, 'Stopping and removing gateway container');
            try {
                await this.runtime.stop(this.containerName, this.options.stopGraceSeconds);
                await this.runtime.remove(this.containerName);
            } catch (error) {
                if (!(error instanceof ContainerError && error.kind === 'NOT_FOUND')) {
                    throw this.fail(error);
                }
            }
        } else {
            logger.info({ name: this.containerName }, 'Leaving gateway container running');
        }

        this.record = null;
    }

    public snapshot(): ContainerRecord {
        return { ...this.currentRecord() };
    }

    private async performRestart(): Promise<ContainerRecord> {
        const started = Date.now();
        logger.warn({ name: this.containerName }, 'Restarting gateway container');

        try {
            const inspection = await this.runtime.inspect(this.containerName);

            if (inspection === null) {
                if (!this.spec) {
                    throw new ContainerError('NOT_FOUND', `Container ${this.containerName} not found`, {
                        containerName: this.containerName
                    });
                }
                logger.warn({ name: this.containerName }, 'Container vanished, recreating from last spec');
                return await this.ensureRunning(this.spec);
            }

            if (inspection.state === 'RUNNING') {
                await this.runtime.stop(this.containerName, this.options.stopGraceSeconds);
                const afterStop = await this.runtime.inspect(this.containerName);
                if (afterStop?.state === 'RUNNING') {
                    logger.warn({ name: this.containerName }, 'Container survived graceful stop, killing');
                    await this.runtime.kill(this.containerName);
                }
            }

            await this.runtime.start(this.containerName);
            this.currentRecord().desiredState = 'RUNNING';
            const record = await this.refresh();
            logger.info({ name: this.containerName, durationMs: Date.now() - started }, 'Gateway container restarted');
            return record;
        } catch (error) {
            throw this.fail(error);
        }
    }

    private async refresh(): Promise<ContainerRecord> {
        const inspection = await this.runtime.inspect(this.containerName);
        if (inspection === null) {
            const record = this.currentRecord();
            record.observedState = 'NOT_FOUND';
            record.containerId = null;
            record.startedAt = null;
            record.lastObservedAt = this.now().toISOString();
            return { ...record };
        }
        return this.apply(inspection);
    }

    private apply(inspection: ContainerInspection): ContainerRecord {
        const record = this.currentRecord(inspection.image);
        record.containerId = inspection.id;
        record.image = inspection.image;
        record.observedState = inspection.state;
        record.startedAt = inspection.startedAt;
        record.lastObservedAt = this.now().toISOString();
        record.lastError = null;
        return { ...record };
    }

    private currentRecord(image?: string): ContainerRecord {
        if (!this.record) {
            this.record = {
                name: this.containerName,
                image: image ?? this.spec?.image ?? '',
                containerId: null,
                desiredState: 'ABSENT',
                observedState: 'UNKNOWN',
                startedAt: null,
                lastObservedAt: null,
                lastError: null
            };
        }
        return this.record;
    }

    private fail(error: unknown): ContainerError {
        const classified = error instanceof ContainerError
            ? error
            : new ContainerError('RUNTIME', describeError(error), { cause: error, containerName: this.containerName });
        this.currentRecord().lastError = describeError(classified);
        logger.error({ name: this.containerName, code: classified.code, error: classified.message }, 'Container operation failed');
        return classified;
    }
}
