import { EventName, IBApi } from '@stoqey/ib';
import type { Contract } from '@stoqey/ib';
import { getComponentLogger } from '../logging/logger.js';
import { ConnectionError } from '../errors/gatewayErrors.js';
import type { AccountSummaryItem, GatewayClient, GatewayEndpoint, PositionItem } from './types.js';

const logger = getComponentLogger('IbGatewayClient');

// TWS API error codes relevant to the handshake
const CONNECT_FAIL = 502;
const CLIENT_ID_IN_USE = 326;

const ACCOUNT_SUMMARY_GROUP = 'All';

/** Every account summary tag the API knows; sent when "All" is asked for */
export const ALL_ACCOUNT_SUMMARY_TAGS = [
    'AccountType', 'NetLiquidation', 'TotalCashValue', 'SettledCash', 'AccruedCash', 'BuyingPower',
    'EquityWithLoanValue', 'PreviousEquityWithLoanValue', 'GrossPositionValue', 'RegTEquity', 'RegTMargin',
    'SMA', 'InitMarginReq', 'MaintMarginReq', 'AvailableFunds', 'ExcessLiquidity', 'Cushion',
    'FullInitMarginReq', 'FullMaintMarginReq', 'FullAvailableFunds', 'FullExcessLiquidity',
    'LookAheadNextChange', 'LookAheadInitMarginReq', 'LookAheadMaintMarginReq', 'LookAheadAvailableFunds',
    'LookAheadExcessLiquidity', 'HighestSeverity', 'DayTradesRemaining', 'Leverage'
].join(',');

export type IbApiFactory = (options: { host: string; port: number; clientId: number }) => IBApi;

/**
 * GatewayClient over @stoqey/ib.
 *
 * A fresh IBApi instance is created per connect so listeners from a dead
 * socket never leak into the next session.
 */
export class IbGatewayClient implements GatewayClient {
    private api: IBApi | null = null;
    private lastMessage: Date | null = null;
    private cancelConnect: (() => void) | null = null;
    private nextRequestId = 1;

    constructor(
        private readonly createApi: IbApiFactory = options => new IBApi(options),
        private readonly now: () => Date = () => new Date()
    ) { }

    public connect(endpoint: GatewayEndpoint, clientId: number, timeoutMs: number): Promise<void> {
        this.detach();

        const api = this.createApi({ host: endpoint.host, port: endpoint.port, clientId });
        this.api = api;

        api.on(EventName.received, () => {
            this.lastMessage = this.now();
        });
        api.on(EventName.disconnected, () => {
            logger.warn({ host: endpoint.host, port: endpoint.port }, 'Gateway socket closed');
        });

        return new Promise<void>((resolve, reject) => {
            const settle = (error?: ConnectionError): void => {
                clearTimeout(timer);
                this.cancelConnect = null;
                api.removeListener(EventName.connected, onConnected);
                api.removeListener(EventName.error, onError);
                if (error) {
                    if (this.api === api) {
                        this.detach();
                    }
                    reject(error);
                } else {
                    resolve();
                }
            };

            const onConnected = (): void => settle();

            const onError = (error: Error, code: number): void => {
                if (code === CONNECT_FAIL) {
                    settle(new ConnectionError('REFUSED', `Gateway refused connection at ${endpoint.host}:${endpoint.port}: ${error.message}`, { cause: error }));
                } else if (code === CLIENT_ID_IN_USE) {
                    settle(new ConnectionError('REJECTED', `Gateway rejected client id ${clientId}: ${error.message}`, { cause: error }));
                }
            };

            const timer = setTimeout(() => {
                settle(new ConnectionError('TIMEOUT', `Gateway did not accept connection within ${timeoutMs}ms`));
            }, timeoutMs);

            this.cancelConnect = () => settle(new ConnectionError('CLOSED', 'Connect cancelled by disconnect'));
            api.on(EventName.connected, onConnected);
            api.on(EventName.error, onError);
            api.connect(clientId);
        });
    }

    public async disconnect(): Promise<void> {
        this.detach();
    }

    public isConnected(): boolean {
        return this.api?.isConnected ?? false;
    }

    public lastMessageAt(): Date | null {
        return this.lastMessage;
    }

    public async currentTime(timeoutMs: number): Promise<Date> {
        const api = this.requireApi();
        return new Promise<Date>((resolve, reject) => {
            const onTime = (time: number): void => {
                clearTimeout(timer);
                api.removeListener(EventName.currentTime, onTime);
                resolve(new Date(time * 1000));
            };
            const timer = setTimeout(() => {
                api.removeListener(EventName.currentTime, onTime);
                reject(new ConnectionError('TIMEOUT', `No server time within ${timeoutMs}ms`));
            }, timeoutMs);

            api.on(EventName.currentTime, onTime);
            api.reqCurrentTime();
        });
    }

    public async managedAccounts(timeoutMs: number): Promise<string[]> {
        const api = this.requireApi();
        return new Promise<string[]>((resolve, reject) => {
            const onAccounts = (accountsList: string): void => {
                clearTimeout(timer);
                api.removeListener(EventName.managedAccounts, onAccounts);
                resolve(accountsList.split(',').map(account => account.trim()).filter(account => account.length > 0));
            };
            const timer = setTimeout(() => {
                api.removeListener(EventName.managedAccounts, onAccounts);
                reject(new ConnectionError('TIMEOUT', `No managed accounts within ${timeoutMs}ms`));
            }, timeoutMs);

            api.on(EventName.managedAccounts, onAccounts);
            api.reqManagedAccts();
        });
    }

    public async accountSummary(tags: string, timeoutMs: number): Promise<AccountSummaryItem[]> {
        const api = this.requireApi();
        const reqId = this.nextRequestId++;
        const requestedTags = tags === 'All' ? ALL_ACCOUNT_SUMMARY_TAGS : tags;

        return new Promise<AccountSummaryItem[]>((resolve, reject) => {
            const items: AccountSummaryItem[] = [];

            const onItem = (id: number, account: string, tag: string, value: string, currency: string): void => {
                if (id === reqId) {
                    items.push({ account, tag, value, currency });
                }
            };
            const onEnd = (id: number): void => {
                if (id !== reqId) return;
                finish();
                resolve(items);
            };
            const finish = (): void => {
                clearTimeout(timer);
                api.removeListener(EventName.accountSummary, onItem);
                api.removeListener(EventName.accountSummaryEnd, onEnd);
                api.cancelAccountSummary(reqId);
            };
            const timer = setTimeout(() => {
                finish();
                reject(new ConnectionError('TIMEOUT', `No account summary within ${timeoutMs}ms`));
            }, timeoutMs);

            api.on(EventName.accountSummary, onItem);
            api.on(EventName.accountSummaryEnd, onEnd);
            api.reqAccountSummary(reqId, ACCOUNT_SUMMARY_GROUP, requestedTags);
        });
    }

    public async positions(timeoutMs: number): Promise<PositionItem[]> {
        const api = this.requireApi();

        return new Promise<PositionItem[]>((resolve, reject) => {
            const items: PositionItem[] = [];

            const onPosition = (account: string, contract: Contract, position: number, avgCost?: number): void => {
                items.push({
                    account,
                    symbol: contract.symbol ?? null,
                    secType: contract.secType ?? null,
                    exchange: contract.exchange ?? contract.primaryExch ?? null,
                    currency: contract.currency ?? null,
                    contractId: contract.conId ?? null,
                    position,
                    avgCost: avgCost ?? null
                });
            };
            const onEnd = (): void => {
                finish();
                resolve(items);
            };
            const finish = (): void => {
                clearTimeout(timer);
                api.removeListener(EventName.position, onPosition);
                api.removeListener(EventName.positionEnd, onEnd);
                api.cancelPositions();
            };
            const timer = setTimeout(() => {
                finish();
                reject(new ConnectionError('TIMEOUT', `No positions within ${timeoutMs}ms`));
            }, timeoutMs);

            api.on(EventName.position, onPosition);
            api.on(EventName.positionEnd, onEnd);
            api.reqPositions();
        });
    }

    private requireApi(): IBApi {
        if (!this.api || !this.api.isConnected) {
            throw new ConnectionError('CLOSED', 'Gateway client is not connected');
        }
        return this.api;
    }

    private detach(): void {
        const api = this.api;
        const cancel = this.cancelConnect;
        this.api = null;
        this.cancelConnect = null;
        cancel?.();
        if (!api) return;
        api.removeAllListeners();
        if (api.isConnected) {
            api.disconnect();
        }
    }
}
