import { logger } from "../logging/logger.js";
import { ConfigGuard, GATEWAY_CONFIG_REQUIREMENTS } from "./config-guard.js";
import { loadGatewayConfig } from "./config/gateway-config.js";
import type { GatewayConfig } from "./config/gateway-config.js";
import { DockerContainerRuntime } from "../container/dockerRuntime.js";
import { ContainerLifecycleManager } from "../container/ContainerLifecycleManager.js";
import { buildGatewayContainerSpec } from "../container/gatewayContainerSpec.js";
import type { ContainerRuntime } from "../container/types.js";
import { GatewaySession } from "../session/GatewaySession.js";
import { IbGatewayClient } from "../session/IbGatewayClient.js";
import type { GatewayClient } from "../session/types.js";
import { HealthMonitor } from "../health/HealthMonitor.js";
import { createTradingCalendar } from "../health/tradingCalendar.js";
import { ConnectionSupervisor } from "../supervisor/ConnectionSupervisor.js";
import { GatewayStatusReporter } from "../supervisor/statusReporter.js";
import { GatewayReadService } from "../operations/gatewayReads.js";
import type { Sleep } from "../recovery/RecoveryLadder.js";

export interface GatewayStackDependencies {
    runtime?: ContainerRuntime;
    client?: GatewayClient;
    now?: () => Date;
    sleep?: Sleep;
    monitorSleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface GatewayStack {
    config: GatewayConfig;
    container: ContainerLifecycleManager;
    session: GatewaySession;
    supervisor: ConnectionSupervisor;
    monitor: HealthMonitor;
    reporter: GatewayStatusReporter;
    reads: GatewayReadService;
    /** Container up, session opened, monitor running */
    start(): Promise<void>;
    /** Monitor stopped, session closed, container record released */
    shutdown(): Promise<void>;
}

/**
 * Wires the supervisor stack. Nothing is started until `start()`.
 */
export function createGatewayStack(config: GatewayConfig, deps: GatewayStackDependencies = {}): GatewayStack {
    const now = deps.now ?? (() => new Date());
    const runtime = deps.runtime ?? DockerContainerRuntime.fromSocket(config.container.dockerSocketPath);
    const client = deps.client ?? new IbGatewayClient(undefined, now);

    const container = new ContainerLifecycleManager(runtime, config.container.name, {
        stopGraceSeconds: config.container.stopGraceSeconds,
        now
    });
    const session = new GatewaySession(client, now);
    const supervisor = new ConnectionSupervisor(session, container, {
        endpoint: { host: config.session.host, port: config.session.port },
        clientId: config.session.clientId,
        connectTimeoutMs: config.session.connectTimeoutMs,
        waitTimeoutMs: config.session.waitTimeoutMs,
        recovery: {
            backoffBaseMs: config.recovery.backoffBaseMs,
            backoffCapMs: config.recovery.backoffCapMs,
            maxReconnectAttempts: config.recovery.maxReconnectAttempts,
            maxRestartAttempts: config.recovery.maxRestartAttempts,
            restartSettleMs: config.container.restartSettleMs
        },
        now,
        sleep: deps.sleep
    });
    const monitor = new HealthMonitor(supervisor, {
        intervalMs: config.health.intervalMs,
        stalenessThresholdMs: config.health.stalenessThresholdMs,
        debounceSamples: config.health.debounceSamples,
        sampleHistory: config.health.sampleHistory,
        alertRetryMs: config.recovery.alertRetryMs,
        calendar: createTradingCalendar(config.market),
        now,
        sleep: deps.monitorSleep
    });
    const reporter = new GatewayStatusReporter(container, supervisor, monitor, now);
    const reads = new GatewayReadService(supervisor, config.session.requestTimeoutMs, now);

    return {
        config,
        container,
        session,
        supervisor,
        monitor,
        reporter,
        reads,

        async start() {
            await container.ensureRunning(buildGatewayContainerSpec(config));

            const episode = await supervisor.start();
            if (episode.outcome !== 'SUCCEEDED') {
                logger.warn({ episodeId: episode.id, error: episode.error }, "Gateway not reachable at startup, health monitor will recover");
            }

            monitor.start();
        },

        async shutdown() {
            await monitor.stop();
            await supervisor.shutdown();
            await container.release({ removeContainer: config.container.removeOnShutdown });
        }
    };
}

/**
 * Fail-closed boot: guard the environment, parse it, start the stack.
 */
export async function bootstrap(serviceName: string, env: NodeJS.ProcessEnv = process.env, deps: GatewayStackDependencies = {}): Promise<GatewayStack> {
    logger.info({ serviceName }, "Bootstrapping service");

    ConfigGuard.enforce(GATEWAY_CONFIG_REQUIREMENTS, env);
    const config = loadGatewayConfig(env);

    const stack = createGatewayStack(config, deps);
    await stack.start();

    logger.info({ serviceName, tradingMode: config.tradingMode, container: config.container.name }, "Startup checks passed");
    return stack;
}
