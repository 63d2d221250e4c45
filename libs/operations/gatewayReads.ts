import type { ConnectionSupervisor } from '../supervisor/ConnectionSupervisor.js';
import type { AccountSummaryItem, PositionItem } from '../session/types.js';

export interface ServerTimeResult {
    serverTime: string;
    /** Gateway clock minus local clock */
    skewMs: number;
}

export interface ManagedAccountsResult {
    accounts: string[];
}

export interface AccountSummaryResult {
    tags: string;
    items: AccountSummaryItem[];
}

export interface PositionsResult {
    positions: PositionItem[];
}

/**
 * Pass-through reads. Each one borrows the session from the supervisor and
 * never holds on to the client.
 */
export class GatewayReadService {
    constructor(
        private readonly supervisor: ConnectionSupervisor,
        private readonly requestTimeoutMs: number,
        private readonly now: () => Date = () => new Date()
    ) { }

    public serverTime(): Promise<ServerTimeResult> {
        return this.supervisor.withSession(async session => {
            const serverTime = await session.exchange(client => client.currentTime(this.requestTimeoutMs));
            return {
                serverTime: serverTime.toISOString(),
                skewMs: serverTime.getTime() - this.now().getTime()
            };
        });
    }

    public managedAccounts(): Promise<ManagedAccountsResult> {
        return this.supervisor.withSession(async session => ({
            accounts: await session.exchange(client => client.managedAccounts(this.requestTimeoutMs))
        }));
    }

    public accountSummary(tags: string = 'All'): Promise<AccountSummaryResult> {
        return this.supervisor.withSession(async session => ({
            tags,
            items: await session.exchange(client => client.accountSummary(tags, this.requestTimeoutMs))
        }));
    }

    public positions(): Promise<PositionsResult> {
        return this.supervisor.withSession(async session => ({
            positions: await session.exchange(client => client.positions(this.requestTimeoutMs))
        }));
    }
}
