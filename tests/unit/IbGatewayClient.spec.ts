/**
 * Unit Tests: IB gateway client adapter
 *
 * IBApi is replaced by an EventEmitter that plays back the handshake events.
 *
 * @see libs/session/IbGatewayClient.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { EventEmitter } from 'node:events';
import { EventName } from '@stoqey/ib';
import type { IBApi } from '@stoqey/ib';
import { ALL_ACCOUNT_SUMMARY_TAGS, IbGatewayClient } from '../../libs/session/IbGatewayClient.js';
import { ConnectionError } from '../../libs/errors/gatewayErrors.js';
import { ManualClock } from '../support/fakes.js';

const ENDPOINT = { host: '127.0.0.1', port: 8888 };

class FakeIbApi extends EventEmitter {
    public isConnected = false;
    public readonly connectCalls: number[] = [];
    public disconnectCalls = 0;
    /** When set, data requests get no answer */
    public silent = false;
    public readonly summaryRequests: Array<{ reqId: number; group: string; tags: string }> = [];
    public readonly cancelledSummaries: number[] = [];
    public cancelPositionsCalls = 0;

    constructor(
        public readonly options: { host: string; port: number; clientId: number },
        private readonly onConnect: (api: FakeIbApi) => void
    ) {
        super();
    }

    connect(clientId: number): this {
        this.connectCalls.push(clientId);
        this.onConnect(this);
        return this;
    }

    disconnect(): this {
        this.disconnectCalls += 1;
        this.isConnected = false;
        return this;
    }

    reqCurrentTime(): void {
        this.emit(EventName.currentTime, 1_700_000_000);
    }

    reqManagedAccts(): void {
        this.emit(EventName.managedAccounts, 'DU111, DU222,');
    }

    reqAccountSummary(reqId: number, group: string, tags: string): this {
        this.summaryRequests.push({ reqId, group, tags });
        if (this.silent) return this;
        this.emit(EventName.accountSummary, reqId + 100, 'DU999', 'NetLiquidation', '1.00', 'USD');
        this.emit(EventName.accountSummary, reqId, 'DU111', 'NetLiquidation', '100000.00', 'USD');
        this.emit(EventName.accountSummaryEnd, reqId);
        return this;
    }

    cancelAccountSummary(reqId: number): this {
        this.cancelledSummaries.push(reqId);
        return this;
    }

    reqPositions(): this {
        if (this.silent) return this;
        this.emit(EventName.position, 'DU111', { conId: 1001, symbol: 'TEST', secType: 'STK', exchange: 'SMART', currency: 'USD' }, 100, 150.25);
        this.emit(EventName.position, 'DU111', { symbol: 'OTHER', primaryExch: 'NYSE' }, -5);
        this.emit(EventName.positionEnd);
        return this;
    }

    cancelPositions(): this {
        this.cancelPositionsCalls += 1;
        return this;
    }
}

const acceptConnect = (api: FakeIbApi): void => {
    api.isConnected = true;
    api.emit(EventName.connected);
};

describe('IbGatewayClient', () => {
    let clock: ManualClock;
    let created: FakeIbApi[];
    let onConnect: (api: FakeIbApi) => void;
    let client: IbGatewayClient;

    beforeEach(() => {
        clock = new ManualClock();
        created = [];
        onConnect = acceptConnect;
        client = new IbGatewayClient(options => {
            const api = new FakeIbApi(options, instance => onConnect(instance));
            created.push(api);
            return api as unknown as IBApi;
        }, clock.now);
    });

    describe('connect()', () => {
        it('should resolve once the gateway reports connected', async () => {
            await client.connect(ENDPOINT, 42, 1_000);

            assert.strictEqual(client.isConnected(), true);
            assert.deepStrictEqual(created[0]?.options, { host: '127.0.0.1', port: 8888, clientId: 42 });
            assert.deepStrictEqual(created[0]?.connectCalls, [42]);
        });

        it('should ignore informational errors during the handshake', async () => {
            onConnect = api => {
                api.emit(EventName.error, new Error('Market data farm connection is OK'), 2104, -1);
                acceptConnect(api);
            };

            await client.connect(ENDPOINT, 42, 1_000);
            assert.strictEqual(client.isConnected(), true);
        });

        it('should reject with REFUSED when the socket cannot connect', async () => {
            onConnect = api => {
                api.emit(EventName.error, new Error("Couldn't connect to TWS"), 502, -1);
            };

            await assert.rejects(
                () => client.connect(ENDPOINT, 42, 1_000),
                (err: unknown) => err instanceof ConnectionError && err.kind === 'REFUSED'
            );
            assert.strictEqual(client.isConnected(), false);
        });

        it('should reject with REJECTED when the client id is taken', async () => {
            onConnect = api => {
                api.isConnected = true;
                api.emit(EventName.error, new Error('client id is already in use'), 326, -1);
            };

            await assert.rejects(
                () => client.connect(ENDPOINT, 42, 1_000),
                (err: unknown) => err instanceof ConnectionError && err.kind === 'REJECTED'
            );
            assert.strictEqual(created[0]?.disconnectCalls, 1);
        });

        it('should reject with TIMEOUT when no handshake arrives', async () => {
            onConnect = () => undefined;

            await assert.rejects(
                () => client.connect(ENDPOINT, 42, 10),
                (err: unknown) => err instanceof ConnectionError && err.kind === 'TIMEOUT'
            );
        });

        it('should reject a pending connect with CLOSED on disconnect', async () => {
            onConnect = () => undefined;

            const outcome = assert.rejects(
                client.connect(ENDPOINT, 42, 1_000),
                (err: unknown) => err instanceof ConnectionError && err.kind === 'CLOSED'
            );
            await client.disconnect();
            await outcome;

            assert.strictEqual(created[0]?.listenerCount(EventName.connected), 0);
        });

        it('should drop the previous API instance on reconnect', async () => {
            await client.connect(ENDPOINT, 42, 1_000);
            await client.connect(ENDPOINT, 43, 1_000);

            assert.strictEqual(created.length, 2);
            assert.strictEqual(created[0]?.disconnectCalls, 1);
            assert.strictEqual(created[0]?.listenerCount(EventName.received), 0);
        });
    });

    it('should record the time of inbound messages', async () => {
        await client.connect(ENDPOINT, 42, 1_000);
        assert.strictEqual(client.lastMessageAt(), null);

        clock.advanceSeconds(5);
        created[0]?.emit(EventName.received, ['4', '2'], '');

        assert.strictEqual(client.lastMessageAt()?.toISOString(), clock.now().toISOString());
    });

    it('should disconnect idempotently', async () => {
        await client.connect(ENDPOINT, 42, 1_000);

        await client.disconnect();
        await client.disconnect();

        assert.strictEqual(created[0]?.disconnectCalls, 1);
        assert.strictEqual(client.isConnected(), false);
    });

    describe('requests', () => {
        it('should return the server time', async () => {
            await client.connect(ENDPOINT, 42, 1_000);

            const time = await client.currentTime(1_000);
            assert.strictEqual(time.getTime(), 1_700_000_000_000);
        });

        it('should split the managed accounts list', async () => {
            await client.connect(ENDPOINT, 42, 1_000);

            assert.deepStrictEqual(await client.managedAccounts(1_000), ['DU111', 'DU222']);
        });

        it('should expand "All" and collect the summary rows of its own request', async () => {
            await client.connect(ENDPOINT, 42, 1_000);

            const items = await client.accountSummary('All', 1_000);

            assert.deepStrictEqual(items, [
                { account: 'DU111', tag: 'NetLiquidation', value: '100000.00', currency: 'USD' }
            ]);
            assert.deepStrictEqual(created[0]?.summaryRequests, [{ reqId: 1, group: 'All', tags: ALL_ACCOUNT_SUMMARY_TAGS }]);
            assert.deepStrictEqual(created[0]?.cancelledSummaries, [1]);
        });

        it('should pass explicit tags and use a new request id per summary', async () => {
            await client.connect(ENDPOINT, 42, 1_000);

            await client.accountSummary('NetLiquidation', 1_000);
            await client.accountSummary('BuyingPower', 1_000);

            assert.deepStrictEqual(created[0]?.summaryRequests.map(r => [r.reqId, r.tags]), [
                [1, 'NetLiquidation'],
                [2, 'BuyingPower']
            ]);
        });

        it('should time out and cancel an unanswered summary', async () => {
            await client.connect(ENDPOINT, 42, 1_000);
            const api = created[0];
            assert.ok(api);
            api.silent = true;

            await assert.rejects(
                () => client.accountSummary('All', 10),
                (err: unknown) => err instanceof ConnectionError && err.kind === 'TIMEOUT'
            );
            assert.deepStrictEqual(api.cancelledSummaries, [1]);
            assert.strictEqual(api.listenerCount(EventName.accountSummary), 0);
        });

        it('should map positions and their contracts', async () => {
            await client.connect(ENDPOINT, 42, 1_000);

            const positions = await client.positions(1_000);

            assert.deepStrictEqual(positions, [
                {
                    account: 'DU111',
                    symbol: 'TEST',
                    secType: 'STK',
                    exchange: 'SMART',
                    currency: 'USD',
                    contractId: 1001,
                    position: 100,
                    avgCost: 150.25
                },
                {
                    account: 'DU111',
                    symbol: 'OTHER',
                    secType: null,
                    exchange: 'NYSE',
                    currency: null,
                    contractId: null,
                    position: -5,
                    avgCost: null
                }
            ]);
            assert.strictEqual(created[0]?.cancelPositionsCalls, 1);
            assert.strictEqual(created[0]?.listenerCount(EventName.position), 0);
        });

        it('should reject requests while disconnected', async () => {
            await assert.rejects(
                () => client.currentTime(1_000),
                (err: unknown) => err instanceof ConnectionError && err.kind === 'CLOSED'
            );
        });
    });
});
