import type { GatewayConfig } from '../bootstrap/config/gateway-config.js';
import type { ContainerSpec } from './types.js';

/** Ports the gateway image listens on inside the container */
export const GATEWAY_CONTAINER_PORTS = {
    api: 8888,
    vnc: 6080
} as const;

/**
 * Builds the container recipe for the IB gateway image.
 *
 * IBC settings keep the gateway logged in across second-factor timeouts.
 * The IBC command server stays disabled: restarts go through the container runtime.
 */
export function buildGatewayContainerSpec(config: GatewayConfig): ContainerSpec {
    const { container, credentials, tradingMode } = config;

    return {
        name: container.name,
        image: container.image,
        ports: [
            { containerPort: GATEWAY_CONTAINER_PORTS.api, hostPort: container.apiPort, hostIp: '127.0.0.1' },
            { containerPort: GATEWAY_CONTAINER_PORTS.vnc, hostPort: container.vncPort, hostIp: '127.0.0.1' }
        ],
        environment: {
            USERNAME: credentials.username,
            PASSWORD: credentials.password,
            GATEWAY_OR_TWS: 'gateway',
            TWOFA_TIMEOUT_ACTION: 'restart',
            IBC_TradingMode: tradingMode,
            IBC_ReadOnlyApi: 'no',
            IBC_ReloginAfterSecondFactorAuthenticationTimeout: 'yes',
            IBC_AutoRestartTime: container.autoRestartTime,
            IBC_AcceptIncomingConnectionAction: 'accept',
            IBC_AcceptNonBrokerageAccountWarning: 'yes'
        },
        restartPolicy: 'unless-stopped'
    };
}
