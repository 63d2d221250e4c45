export interface GatewayEndpoint {
    host: string;
    port: number;
}

/**
 * The primitives the supervisor needs from the trading API client library.
 * Wire-level protocol details stay inside the implementation.
 */
export interface GatewayClient {
    /** Rejects with ConnectionError (TIMEOUT, REFUSED or REJECTED) */
    connect(endpoint: GatewayEndpoint, clientId: number, timeoutMs: number): Promise<void>;
    /** Safe to call when already disconnected */
    disconnect(): Promise<void>;
    isConnected(): boolean;
    /** Receive time of the most recent inbound message, null before the first one */
    lastMessageAt(): Date | null;

    currentTime(timeoutMs: number): Promise<Date>;
    managedAccounts(timeoutMs: number): Promise<string[]>;
    /** `tags` is a comma-separated tag list, or "All" */
    accountSummary(tags: string, timeoutMs: number): Promise<AccountSummaryItem[]>;
    positions(timeoutMs: number): Promise<PositionItem[]>;
}

export interface AccountSummaryItem {
    account: string;
    tag: string;
    value: string;
    currency: string;
}

export interface PositionItem {
    account: string;
    symbol: string | null;
    secType: string | null;
    exchange: string | null;
    currency: string | null;
    contractId: number | null;
    position: number;
    avgCost: number | null;
}

export interface SessionDescription {
    endpoint: GatewayEndpoint | null;
    clientId: number | null;
    connected: boolean;
    connectedAt: string | null;
    lastActivityAt: string | null;
}
