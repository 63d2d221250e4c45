import { WEEKDAYS } from '../bootstrap/config/gateway-config.js';
import type { MarketSessionConfig, Weekday } from '../bootstrap/config/gateway-config.js';

/**
 * Decides whether silence from the gateway counts as staleness.
 * Outside trading hours no data is expected.
 */
export interface TradingCalendar {
    isMarketOpen(at: Date): boolean;
}

export class AlwaysOpenCalendar implements TradingCalendar {
    public isMarketOpen(_at: Date): boolean {
        return true;
    }
}

interface LocalTime {
    day: Weekday;
    minute: number;
}

/**
 * One session per listed weekday in a fixed timezone.
 * A close earlier than the open means the session runs past midnight.
 */
export class WeeklySessionCalendar implements TradingCalendar {
    private readonly formatter: Intl.DateTimeFormat;
    private readonly days: ReadonlySet<Weekday>;

    constructor(private readonly session: MarketSessionConfig) {
        this.formatter = new Intl.DateTimeFormat('en-US', {
            timeZone: session.timezone,
            weekday: 'short',
            hour: '2-digit',
            minute: '2-digit',
            hourCycle: 'h23'
        });
        this.days = new Set(session.days);
    }

    public isMarketOpen(at: Date): boolean {
        const { day, minute } = this.localTime(at);
        const { openMinute, closeMinute } = this.session;

        if (openMinute <= closeMinute) {
            return this.days.has(day) && minute >= openMinute && minute < closeMinute;
        }

        // Overnight: evening part belongs to today, morning part to yesterday's session
        if (minute >= openMinute) return this.days.has(day);
        if (minute < closeMinute) return this.days.has(previousDay(day));
        return false;
    }

    private localTime(at: Date): LocalTime {
        let day: Weekday = 'SUN';
        let hour = 0;
        let minute = 0;
        for (const part of this.formatter.formatToParts(at)) {
            if (part.type === 'weekday') {
                const token = part.value.toUpperCase();
                day = WEEKDAYS.find(candidate => candidate === token) ?? day;
            } else if (part.type === 'hour') {
                hour = Number.parseInt(part.value, 10);
            } else if (part.type === 'minute') {
                minute = Number.parseInt(part.value, 10);
            }
        }
        return { day, minute: hour * 60 + minute };
    }
}

function previousDay(day: Weekday): Weekday {
    const index = WEEKDAYS.indexOf(day);
    return WEEKDAYS[(index + WEEKDAYS.length - 1) % WEEKDAYS.length] ?? day;
}

export function createTradingCalendar(market: MarketSessionConfig | null): TradingCalendar {
    return market ? new WeeklySessionCalendar(market) : new AlwaysOpenCalendar();
}
