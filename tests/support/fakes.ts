/**
 * In-process stand-ins for the Docker daemon and the gateway client.
 */

import { ContainerError } from '../../libs/errors/gatewayErrors.js';
import type { ContainerInspection, ContainerRuntime, ContainerSpec, ObservedContainerState } from '../../libs/container/types.js';
import type { AccountSummaryItem, GatewayClient, GatewayEndpoint, PositionItem } from '../../libs/session/types.js';
import type { GatewayConfig } from '../../libs/bootstrap/config/gateway-config.js';
import { loadGatewayConfig } from '../../libs/bootstrap/config/gateway-config.js';

export class ManualClock {
    constructor(private ms: number = Date.UTC(2024, 0, 3, 15, 0, 0)) { }

    public readonly now = (): Date => new Date(this.ms);

    public advance(ms: number): void {
        this.ms += ms;
    }

    public advanceSeconds(seconds: number): void {
        this.ms += seconds * 1000;
    }
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve(value: T): void;
    reject(error: unknown): void;
}

export function createDeferred<T = void>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/** Lets pending promise callbacks run */
export async function flushMicrotasks(rounds: number = 10): Promise<void> {
    for (let i = 0; i < rounds; i++) {
        await Promise.resolve();
    }
}

export type RuntimeOperation = 'inspect' | 'pullImage' | 'create' | 'start' | 'stop' | 'kill' | 'remove' | 'logs';

interface FakeContainer {
    id: string;
    name: string;
    image: string;
    state: ObservedContainerState;
    startedAt: string | null;
}

export class InMemoryContainerRuntime implements ContainerRuntime {
    public readonly containers = new Map<string, FakeContainer>();
    public readonly calls: Array<{ op: RuntimeOperation; target: string; graceSeconds?: number }> = [];
    public readonly failing = new Map<RuntimeOperation, Error>();
    public readonly logLines = new Map<string, string[]>();
    public createdSpecs: ContainerSpec[] = [];
    /** Simulates a container that ignores the graceful stop */
    public stopLeavesRunning = false;
    private sequence = 0;

    constructor(private readonly now: () => Date = () => new Date()) { }

    public seed(name: string, state: ObservedContainerState, image: string = 'ghcr.io/example/gateway:test'): void {
        this.sequence += 1;
        this.containers.set(name, {
            id: `ctr-${this.sequence}`,
            name,
            image,
            state,
            startedAt: state === 'RUNNING' ? this.now().toISOString() : null
        });
    }

    public count(op: RuntimeOperation): number {
        return this.calls.filter(call => call.op === op).length;
    }

    public async inspect(name: string): Promise<ContainerInspection | null> {
        this.enter('inspect', name);
        const container = this.containers.get(name);
        if (!container) return null;
        return {
            id: container.id,
            name: container.name,
            image: container.image,
            state: container.state,
            startedAt: container.startedAt,
            finishedAt: null,
            createdAt: null
        };
    }

    public async pullImage(image: string): Promise<void> {
        this.enter('pullImage', image);
    }

    public async create(spec: ContainerSpec): Promise<string> {
        this.enter('create', spec.name);
        if (this.containers.has(spec.name)) {
            throw new ContainerError('RUNTIME', `Conflict: ${spec.name} already exists`, { containerName: spec.name });
        }
        this.sequence += 1;
        const id = `ctr-${this.sequence}`;
        this.containers.set(spec.name, { id, name: spec.name, image: spec.image, state: 'CREATED', startedAt: null });
        this.createdSpecs.push(spec);
        return id;
    }

    public async start(name: string): Promise<void> {
        this.enter('start', name);
        const container = this.require(name);
        container.state = 'RUNNING';
        container.startedAt = this.now().toISOString();
    }

    public async stop(name: string, graceSeconds: number): Promise<void> {
        this.enter('stop', name, graceSeconds);
        const container = this.require(name);
        if (!this.stopLeavesRunning) {
            container.state = 'EXITED';
        }
    }

    public async kill(name: string): Promise<void> {
        this.enter('kill', name);
        this.require(name).state = 'EXITED';
    }

    public async remove(name: string): Promise<void> {
        this.enter('remove', name);
        this.require(name);
        this.containers.delete(name);
    }

    public async logs(name: string, tailLines: number): Promise<string[]> {
        this.enter('logs', name);
        this.require(name);
        return (this.logLines.get(name) ?? []).slice(-tailLines);
    }

    private enter(op: RuntimeOperation, target: string, graceSeconds?: number): void {
        this.calls.push(graceSeconds === undefined ? { op, target } : { op, target, graceSeconds });
        const failure = this.failing.get(op);
        if (failure) throw failure;
    }

    private require(name: string): FakeContainer {
        const container = this.containers.get(name);
        if (!container) {
            throw new ContainerError('NOT_FOUND', `Container ${name} not found`, { containerName: name });
        }
        return container;
    }
}

export class FakeGatewayClient implements GatewayClient {
    public connected = false;
    public lastMessage: Date | null = null;
    public readonly connectCalls: Array<{ endpoint: GatewayEndpoint; clientId: number; timeoutMs: number }> = [];
    public disconnectCalls = 0;
    /** Outcomes for upcoming connects, consumed in order; empty means success */
    public connectOutcomes: Array<Error | 'ok'> = [];
    /** When set, connects wait on it before settling */
    public connectGate: Promise<void> | null = null;
    public serverTime = new Date(Date.UTC(2024, 0, 3, 15, 0, 2));
    public accounts = ['DU0000001', 'DU0000002'];
    public summaryTagsRequested: string[] = [];
    public summary: AccountSummaryItem[] = [
        { account: 'DU0000001', tag: 'NetLiquidation', value: '100000.00', currency: 'USD' },
        { account: 'DU0000001', tag: 'TotalCashValue', value: '50000.00', currency: 'USD' }
    ];
    public heldPositions: PositionItem[] = [{
        account: 'DU0000001',
        symbol: 'TEST',
        secType: 'STK',
        exchange: 'SMART',
        currency: 'USD',
        contractId: 1001,
        position: 100,
        avgCost: 150.25
    }];

    public async connect(endpoint: GatewayEndpoint, clientId: number, timeoutMs: number): Promise<void> {
        this.connectCalls.push({ endpoint, clientId, timeoutMs });
        if (this.connectGate) {
            await this.connectGate;
        }
        const outcome = this.connectOutcomes.shift() ?? 'ok';
        if (outcome !== 'ok') {
            throw outcome;
        }
        this.connected = true;
    }

    public async disconnect(): Promise<void> {
        this.disconnectCalls += 1;
        this.connected = false;
    }

    public isConnected(): boolean {
        return this.connected;
    }

    public lastMessageAt(): Date | null {
        return this.lastMessage;
    }

    public async currentTime(): Promise<Date> {
        return this.serverTime;
    }

    public async managedAccounts(): Promise<string[]> {
        return [...this.accounts];
    }

    public async accountSummary(tags: string): Promise<AccountSummaryItem[]> {
        this.summaryTagsRequested.push(tags);
        return [...this.summary];
    }

    public async positions(): Promise<PositionItem[]> {
        return [...this.heldPositions];
    }
}

export const TEST_ENV = {
    IB_GATEWAY_USERNAME: 'test-user',
    IB_GATEWAY_PASSWORD: 'test-secret',
    IB_GATEWAY_CONTAINER_NAME: 'gateway-test'
};

export function testConfig(overrides: Record<string, string> = {}): GatewayConfig {
    return loadGatewayConfig({ ...TEST_ENV, ...overrides });
}

/** Monitor sleep that only returns once the loop is cancelled */
export function waitForAbort(_ms: number, signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal.aborted) {
            resolve();
            return;
        }
        signal.addEventListener('abort', () => resolve(), { once: true });
    });
}

/** Minimal express response double recording status, headers and body */
export class MockResponse {
    public statusCode = 200;
    public body: unknown = undefined;
    public readonly headers = new Map<string, string>();

    public status(code: number): this {
        this.statusCode = code;
        return this;
    }

    public json(body: unknown): this {
        this.body = body;
        return this;
    }

    public setHeader(name: string, value: string): this {
        this.headers.set(name, value);
        return this;
    }
}
