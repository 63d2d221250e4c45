import { getComponentLogger } from '../logging/logger.js';
import { ConnectionError, describeError } from '../errors/gatewayErrors.js';
import type { GatewayClient, GatewayEndpoint, SessionDescription } from './types.js';

const logger = getComponentLogger('GatewaySession');

/**
 * Client id for a connect: the configured one, otherwise the UTC wall clock as HHMMSS.
 */
export function resolveClientId(configured: number | null, now: Date): number {
    if (configured !== null) return configured;
    return now.getUTCHours() * 10_000 + now.getUTCMinutes() * 100 + now.getUTCSeconds();
}

/**
 * The single logical connection to the gateway.
 *
 * Connectivity and activity are tracked separately: a socket can stay open
 * while the gateway stops delivering data.
 */
export class GatewaySession {
    private endpoint: GatewayEndpoint | null = null;
    private clientId: number | null = null;
    private connectedAt: Date | null = null;
    private touchedAt: Date | null = null;

    constructor(
        private readonly client: GatewayClient,
        private readonly now: () => Date = () => new Date()
    ) { }

    public async connect(endpoint: GatewayEndpoint, clientId: number, timeoutMs: number): Promise<void> {
        if (this.client.isConnected()) {
            await this.disconnect();
        }

        logger.info({ host: endpoint.host, port: endpoint.port, clientId }, 'Connecting to gateway');
        try {
            await this.client.connect(endpoint, clientId, timeoutMs);
        } catch (error) {
            const failure = error instanceof ConnectionError
                ? error
                : new ConnectionError('REFUSED', describeError(error), { cause: error });
            logger.warn({ host: endpoint.host, port: endpoint.port, code: failure.code, error: failure.message }, 'Gateway connect failed');
            throw failure;
        }

        const connectedAt = this.now();
        this.endpoint = endpoint;
        this.clientId = clientId;
        this.connectedAt = connectedAt;
        this.touchedAt = connectedAt;
        logger.info({ host: endpoint.host, port: endpoint.port, clientId }, 'Connected to gateway');
    }

    public async disconnect(): Promise<void> {
        const wasConnected = this.connectedAt !== null;
        await this.client.disconnect();
        this.connectedAt = null;
        if (wasConnected) {
            logger.info({ clientId: this.clientId }, 'Disconnected from gateway');
        }
    }

    public isConnected(): boolean {
        return this.client.isConnected();
    }

    public touchActivity(): void {
        this.touchedAt = this.now();
    }

    /** Newer of the last touch and the client's last inbound message */
    public lastActivityAt(): Date | null {
        const received = this.client.lastMessageAt();
        if (this.touchedAt === null) return received;
        if (received === null) return this.touchedAt;
        return received.getTime() > this.touchedAt.getTime() ? received : this.touchedAt;
    }

    public activityAgeSeconds(at: Date = this.now()): number | null {
        const last = this.lastActivityAt();
        if (last === null) return null;
        return Math.max(0, (at.getTime() - last.getTime()) / 1000);
    }

    /**
     * Runs a data-bearing request against the client. Success counts as activity.
     */
    public async exchange<T>(request: (client: GatewayClient) => Promise<T>): Promise<T> {
        if (!this.client.isConnected()) {
            throw new ConnectionError('CLOSED', 'Gateway session is not connected');
        }
        const result = await request(this.client);
        this.touchActivity();
        return result;
    }

    public describe(): SessionDescription {
        const lastActivity = this.lastActivityAt();
        return {
            endpoint: this.endpoint,
            clientId: this.clientId,
            connected: this.isConnected(),
            connectedAt: this.connectedAt?.toISOString() ?? null,
            lastActivityAt: lastActivity?.toISOString() ?? null
        };
    }
}
