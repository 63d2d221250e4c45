import type { ContainerLifecycleManager } from '../container/ContainerLifecycleManager.js';
import type { ContainerRecord } from '../container/types.js';
import type { HealthMonitor } from '../health/HealthMonitor.js';
import type { AlertStatus, HealthSample, HealthState } from '../health/types.js';
import type { RecoveryEpisode } from '../recovery/RecoveryLadder.js';
import type { ConnectionSupervisor, SessionState } from './ConnectionSupervisor.js';
import type { SessionDescription } from '../session/types.js';

export interface GatewayStatusSnapshot {
    generatedAt: string;
    container: ContainerRecord;
    session: {
        state: SessionState;
        connected: boolean;
        details: SessionDescription;
    };
    health: {
        state: HealthState;
        consecutiveUnhealthy: number;
        lastSample: HealthSample | null;
        monitorRunning: boolean;
    };
    recovery: {
        current: RecoveryEpisode | null;
        last: RecoveryEpisode | null;
    };
    alert: AlertStatus | null;
}

/**
 * Read-only view over the supervisor stack for the HTTP layer.
 */
export class GatewayStatusReporter {
    constructor(
        private readonly container: ContainerLifecycleManager,
        private readonly supervisor: ConnectionSupervisor,
        private readonly monitor: HealthMonitor,
        private readonly now: () => Date = () => new Date()
    ) { }

    public async snapshot(): Promise<GatewayStatusSnapshot> {
        const container = await this.container.status();
        const session = this.supervisor.status();
        const health = this.monitor.snapshot();

        return {
            generatedAt: this.now().toISOString(),
            container,
            session: {
                state: session.state,
                connected: session.connected,
                details: session.session
            },
            health: {
                state: health.state,
                consecutiveUnhealthy: health.consecutiveUnhealthy,
                lastSample: session.lastSample ?? health.lastSample,
                monitorRunning: health.running
            },
            recovery: {
                current: session.currentEpisode,
                last: session.lastEpisode
            },
            alert: health.alert
        };
    }

    public logs(tailLines?: number): Promise<string[]> {
        return this.container.logs(tailLines);
    }
}
