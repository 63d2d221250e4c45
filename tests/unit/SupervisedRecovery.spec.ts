/**
 * Unit Tests: health monitor driving the connection supervisor
 *
 * Tests cover:
 * - Monitor recovery joining an on-demand connect in flight
 * - ALERT retries while callers keep asking for the session
 * - Stop and shutdown while a ladder is backing off
 *
 * @see libs/health/HealthMonitor.ts
 * @see libs/supervisor/ConnectionSupervisor.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { HealthMonitor } from '../../libs/health/HealthMonitor.js';
import type { HealthMonitorOptions } from '../../libs/health/HealthMonitor.js';
import { ConnectionSupervisor, SessionState } from '../../libs/supervisor/ConnectionSupervisor.js';
import type { ConnectionSupervisorOptions } from '../../libs/supervisor/ConnectionSupervisor.js';
import { ContainerLifecycleManager } from '../../libs/container/ContainerLifecycleManager.js';
import { GatewaySession } from '../../libs/session/GatewaySession.js';
import { ConnectionError } from '../../libs/errors/gatewayErrors.js';
import { FakeGatewayClient, InMemoryContainerRuntime, ManualClock, createDeferred, flushMicrotasks, waitForAbort } from '../support/fakes.js';

const NAME = 'gateway-test';

describe('HealthMonitor with ConnectionSupervisor', () => {
    let clock: ManualClock;
    let runtime: InMemoryContainerRuntime;
    let client: FakeGatewayClient;
    let supervisor: ConnectionSupervisor;

    const createSupervisor = (overrides: Partial<ConnectionSupervisorOptions> = {}): ConnectionSupervisor =>
        new ConnectionSupervisor(
            new GatewaySession(client, clock.now),
            new ContainerLifecycleManager(runtime, NAME, { stopGraceSeconds: 30, now: clock.now }),
            {
                endpoint: { host: '127.0.0.1', port: 8888 },
                clientId: 7,
                connectTimeoutMs: 1_000,
                waitTimeoutMs: 1_000,
                recovery: {
                    backoffBaseMs: 1_000,
                    backoffCapMs: 30_000,
                    maxReconnectAttempts: 2,
                    maxRestartAttempts: 1,
                    restartSettleMs: 0
                },
                now: clock.now,
                sleep: async () => undefined,
                ...overrides
            }
        );

    const createMonitor = (overrides: Partial<HealthMonitorOptions> = {}): HealthMonitor =>
        new HealthMonitor(supervisor, {
            intervalMs: 30_000,
            stalenessThresholdMs: 60_000,
            debounceSamples: 2,
            sampleHistory: 3,
            alertRetryMs: 300_000,
            now: clock.now,
            ...overrides
        });

    const refused = (): ConnectionError => new ConnectionError('REFUSED', 'connect ECONNREFUSED 127.0.0.1:8888');

    beforeEach(() => {
        clock = new ManualClock();
        runtime = new InMemoryContainerRuntime(clock.now);
        runtime.seed(NAME, 'RUNNING');
        client = new FakeGatewayClient();
        supervisor = createSupervisor();
    });

    it('should restart the container when the monitor joins an on-demand connect', async () => {
        const monitor = createMonitor();
        const gate = createDeferred();
        client.connectGate = gate.promise;
        client.connectOutcomes = [refused(), refused()];

        const operation = supervisor.withSession(async () => 'done');

        assert.strictEqual(await monitor.tick(), 'SUSPECT');
        const breach = monitor.tick();
        gate.resolve();

        assert.strictEqual(await breach, 'RECOVERING');
        assert.strictEqual(await operation, 'done');
        assert.strictEqual(runtime.count('stop'), 1);
        assert.strictEqual(runtime.count('start'), 1);

        const episode = supervisor.status().lastEpisode;
        assert.ok(episode);
        assert.strictEqual(episode.trigger, 'ON_DEMAND');
        assert.strictEqual(episode.escalate, true);
        assert.strictEqual(episode.outcome, 'SUCCEEDED');
        assert.strictEqual(supervisor.getState(), SessionState.CONNECTED);

        clock.advanceSeconds(30);
        client.lastMessage = clock.now();
        assert.strictEqual(await monitor.tick(), 'HEALTHY');
    });

    it('should keep escalating from ALERT while callers keep asking for the session', async () => {
        const monitor = createMonitor({ debounceSamples: 1 });
        client.connectOutcomes = [refused(), refused(), refused(), refused()];

        assert.strictEqual(await monitor.tick(), 'ALERT');
        assert.strictEqual(runtime.count('stop'), 1);
        assert.strictEqual(supervisor.getState(), SessionState.DISCONNECTED);

        // A caller in ALERT gets the connect error and never restarts the container itself
        client.connectOutcomes = [refused(), refused()];
        await assert.rejects(
            () => supervisor.withSession(async () => 'done'),
            (err: unknown) => err instanceof ConnectionError && err.kind === 'REFUSED'
        );
        assert.strictEqual(runtime.count('stop'), 1);

        // Not yet due: the caller's connect runs alone
        clock.advanceSeconds(60);
        client.connectOutcomes = [refused(), refused()];
        await assert.rejects(() => supervisor.withSession(async () => 'done'));
        assert.strictEqual(await monitor.tick(), 'ALERT');
        assert.strictEqual(runtime.count('stop'), 1);

        // Due: the alert retry joins the caller's connect and escalates it
        clock.advanceSeconds(240);
        const gate = createDeferred();
        client.connectGate = gate.promise;
        client.connectOutcomes = [refused(), refused()];
        const operation = supervisor.withSession(async () => 'done');
        const retry = monitor.tick();
        gate.resolve();

        assert.strictEqual(await retry, 'RECOVERING');
        assert.strictEqual(await operation, 'done');
        assert.strictEqual(runtime.count('stop'), 2);
        assert.strictEqual(monitor.snapshot().alert, null);
        assert.strictEqual(supervisor.status().lastEpisode?.escalate, true);
    });

    it('should stop and shut down promptly while the ladder backs off', { timeout: 5_000 }, async () => {
        supervisor = createSupervisor({
            recovery: {
                backoffBaseMs: 60_000,
                backoffCapMs: 60_000,
                maxReconnectAttempts: 3,
                maxRestartAttempts: 1,
                restartSettleMs: 10_000
            },
            sleep: undefined
        });
        const monitor = createMonitor({ debounceSamples: 1, sleep: waitForAbort });
        client.connectOutcomes = [refused(), refused(), refused()];

        monitor.start();
        const episodeInFlight = supervisor.reconnect();
        await flushMicrotasks(50);

        await monitor.stop();
        assert.strictEqual(monitor.snapshot().running, false);
        await supervisor.shutdown();

        const episode = await episodeInFlight;
        assert.strictEqual(episode.trigger, 'HEALTH_MONITOR');
        assert.strictEqual(episode.outcome, 'FAILED');
        assert.strictEqual(episode.error, `RECOVERY_CANCELLED: Recovery episode ${episode.id} cancelled`);
        assert.strictEqual(runtime.count('stop'), 0);
        assert.strictEqual(supervisor.getState(), SessionState.DISCONNECTED);
    });
});
