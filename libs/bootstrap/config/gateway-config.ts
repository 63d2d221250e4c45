import { z } from 'zod';
import { validate } from '../../validation/zod-middleware.js';

/**
 * Gateway supervisor configuration, read from the environment.
 * Port defaults follow the gateway image's layout (API 8888, VNC 6080).
 */

const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);
const positiveMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const count = (fallback: number) => z.coerce.number().int().min(1).default(fallback);
const flag = (fallback: boolean) =>
    z.enum(['true', 'false', '1', '0', 'yes', 'no'])
        .transform(value => value === 'true' || value === '1' || value === 'yes')
        .default(fallback ? 'true' : 'false');

export const WEEKDAYS = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] as const;
export type Weekday = (typeof WEEKDAYS)[number];

const MARKET_HOURS_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)-([01]\d|2[0-3]):([0-5]\d)$/;

export const GatewayEnvSchema = z.object({
    IB_GATEWAY_USERNAME: z.string().min(1),
    IB_GATEWAY_PASSWORD: z.string().min(1),
    IB_GATEWAY_TRADING_MODE: z.enum(['paper', 'live']).default('paper'),
    IB_GATEWAY_IMAGE: z.string().min(1).default('ghcr.io/extrange/ibkr:stable'),
    IB_GATEWAY_CONTAINER_NAME: z.string().regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]+$/).default('ibkr-gateway'),
    IB_GATEWAY_HOST: z.string().min(1).default('127.0.0.1'),
    IB_GATEWAY_PORT: port(8888),
    IB_GATEWAY_VNC_PORT: port(6080),
    IB_GATEWAY_CLIENT_ID: z.coerce.number().int().nonnegative().optional(),
    IB_GATEWAY_AUTO_RESTART_TIME: z.string().min(1).default('08:35 AM'),
    IB_GATEWAY_CONNECT_TIMEOUT_MS: positiveMs(20_000),
    IB_GATEWAY_REQUEST_TIMEOUT_MS: positiveMs(10_000),

    DOCKER_SOCKET_PATH: z.string().min(1).optional(),
    CONTAINER_STOP_GRACE_SECONDS: z.coerce.number().int().nonnegative().default(30),
    CONTAINER_RESTART_SETTLE_MS: z.coerce.number().int().nonnegative().default(10_000),
    GATEWAY_REMOVE_ON_SHUTDOWN: flag(false),
    GATEWAY_ALLOW_LIVE: flag(false),

    APPLICATION_HOST: z.string().min(1).default('127.0.0.1'),
    APPLICATION_PORT: port(8000),

    HEALTH_INTERVAL_MS: positiveMs(30_000),
    HEALTH_STALENESS_THRESHOLD_MS: positiveMs(60_000),
    HEALTH_DEBOUNCE_SAMPLES: count(2),
    HEALTH_SAMPLE_HISTORY: z.coerce.number().int().min(1).optional(),

    RECOVERY_BACKOFF_BASE_MS: positiveMs(1_000),
    RECOVERY_BACKOFF_CAP_MS: positiveMs(30_000),
    RECOVERY_MAX_RECONNECT_ATTEMPTS: count(3),
    RECOVERY_MAX_RESTART_ATTEMPTS: count(1),
    RECOVERY_ALERT_RETRY_MS: positiveMs(5 * 60_000),

    SESSION_WAIT_TIMEOUT_MS: positiveMs(5_000),

    GATEWAY_MARKET_TIMEZONE: z.string().min(1).optional(),
    GATEWAY_MARKET_HOURS: z.string().regex(MARKET_HOURS_PATTERN, 'Expected HH:MM-HH:MM').optional(),
    GATEWAY_MARKET_DAYS: z.string().default('MON,TUE,WED,THU,FRI')
}).superRefine((env, ctx) => {
    if (env.RECOVERY_BACKOFF_CAP_MS < env.RECOVERY_BACKOFF_BASE_MS) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['RECOVERY_BACKOFF_CAP_MS'],
            message: 'Backoff cap must not be lower than the base delay'
        });
    }
    if (env.GATEWAY_MARKET_HOURS !== undefined && env.GATEWAY_MARKET_TIMEZONE === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['GATEWAY_MARKET_TIMEZONE'],
            message: 'Market hours need a timezone'
        });
    }
    if (env.GATEWAY_MARKET_TIMEZONE !== undefined && !isKnownTimezone(env.GATEWAY_MARKET_TIMEZONE)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['GATEWAY_MARKET_TIMEZONE'],
            message: 'Unknown IANA timezone'
        });
    }
    if (env.GATEWAY_MARKET_HOURS !== undefined) {
        const [open, close] = env.GATEWAY_MARKET_HOURS.split('-');
        if (open === close) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['GATEWAY_MARKET_HOURS'],
                message: 'Market open and close must differ'
            });
        }
    }
    const unknownDays = parseDayList(env.GATEWAY_MARKET_DAYS).unknown;
    if (unknownDays.length > 0) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['GATEWAY_MARKET_DAYS'],
            message: `Unknown weekday(s): ${unknownDays.join(', ')}`
        });
    }
});

export type GatewayEnv = z.infer<typeof GatewayEnvSchema>;

export type TradingMode = GatewayEnv['IB_GATEWAY_TRADING_MODE'];

export interface MarketSessionConfig {
    timezone: string;
    /** Minutes after local midnight */
    openMinute: number;
    closeMinute: number;
    days: Weekday[];
}

export interface GatewayConfig {
    credentials: { username: string; password: string };
    tradingMode: TradingMode;
    allowLive: boolean;
    container: {
        name: string;
        image: string;
        apiPort: number;
        vncPort: number;
        autoRestartTime: string;
        stopGraceSeconds: number;
        restartSettleMs: number;
        removeOnShutdown: boolean;
        dockerSocketPath?: string;
    };
    session: {
        host: string;
        port: number;
        clientId: number | null;
        connectTimeoutMs: number;
        requestTimeoutMs: number;
        waitTimeoutMs: number;
    };
    health: {
        intervalMs: number;
        stalenessThresholdMs: number;
        debounceSamples: number;
        sampleHistory: number;
    };
    recovery: {
        backoffBaseMs: number;
        backoffCapMs: number;
        maxReconnectAttempts: number;
        maxRestartAttempts: number;
        alertRetryMs: number;
    };
    market: MarketSessionConfig | null;
    server: { host: string; port: number };
}

function parseDayList(raw: string): { days: Weekday[]; unknown: string[] } {
    const days: Weekday[] = [];
    const unknown: string[] = [];
    for (const token of raw.split(',').map(part => part.trim().toUpperCase()).filter(part => part.length > 0)) {
        const day = WEEKDAYS.find(candidate => candidate === token);
        if (day) {
            days.push(day);
        } else {
            unknown.push(token);
        }
    }
    return { days, unknown };
}

function isKnownTimezone(timezone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: timezone });
        return true;
    } catch {
        return false;
    }
}

function toMinutes(hhmm: string): number {
    const [hours, minutes] = hhmm.split(':').map(part => Number.parseInt(part, 10));
    return (hours ?? 0) * 60 + (minutes ?? 0);
}

/**
 * Ring size that always spans the debounce window and the staleness window.
 */
export function defaultSampleHistory(intervalMs: number, stalenessThresholdMs: number, debounceSamples: number): number {
    return Math.max(debounceSamples, Math.ceil(stalenessThresholdMs / intervalMs)) + 1;
}

export function toGatewayConfig(env: GatewayEnv): GatewayConfig {
    let market: MarketSessionConfig | null = null;
    if (env.GATEWAY_MARKET_HOURS !== undefined && env.GATEWAY_MARKET_TIMEZONE !== undefined) {
        const [open = '00:00', close = '00:00'] = env.GATEWAY_MARKET_HOURS.split('-');
        market = {
            timezone: env.GATEWAY_MARKET_TIMEZONE,
            openMinute: toMinutes(open),
            closeMinute: toMinutes(close),
            days: parseDayList(env.GATEWAY_MARKET_DAYS).days
        };
    }

    return {
        credentials: { username: env.IB_GATEWAY_USERNAME, password: env.IB_GATEWAY_PASSWORD },
        tradingMode: env.IB_GATEWAY_TRADING_MODE,
        allowLive: env.GATEWAY_ALLOW_LIVE,
        container: {
            name: env.IB_GATEWAY_CONTAINER_NAME,
            image: env.IB_GATEWAY_IMAGE,
            apiPort: env.IB_GATEWAY_PORT,
            vncPort: env.IB_GATEWAY_VNC_PORT,
            autoRestartTime: env.IB_GATEWAY_AUTO_RESTART_TIME,
            stopGraceSeconds: env.CONTAINER_STOP_GRACE_SECONDS,
            restartSettleMs: env.CONTAINER_RESTART_SETTLE_MS,
            removeOnShutdown: env.GATEWAY_REMOVE_ON_SHUTDOWN,
            dockerSocketPath: env.DOCKER_SOCKET_PATH
        },
        session: {
            host: env.IB_GATEWAY_HOST,
            port: env.IB_GATEWAY_PORT,
            clientId: env.IB_GATEWAY_CLIENT_ID ?? null,
            connectTimeoutMs: env.IB_GATEWAY_CONNECT_TIMEOUT_MS,
            requestTimeoutMs: env.IB_GATEWAY_REQUEST_TIMEOUT_MS,
            waitTimeoutMs: env.SESSION_WAIT_TIMEOUT_MS
        },
        health: {
            intervalMs: env.HEALTH_INTERVAL_MS,
            stalenessThresholdMs: env.HEALTH_STALENESS_THRESHOLD_MS,
            debounceSamples: env.HEALTH_DEBOUNCE_SAMPLES,
            sampleHistory: env.HEALTH_SAMPLE_HISTORY ?? defaultSampleHistory(
                env.HEALTH_INTERVAL_MS,
                env.HEALTH_STALENESS_THRESHOLD_MS,
                env.HEALTH_DEBOUNCE_SAMPLES
            )
        },
        recovery: {
            backoffBaseMs: env.RECOVERY_BACKOFF_BASE_MS,
            backoffCapMs: env.RECOVERY_BACKOFF_CAP_MS,
            maxReconnectAttempts: env.RECOVERY_MAX_RECONNECT_ATTEMPTS,
            maxRestartAttempts: env.RECOVERY_MAX_RESTART_ATTEMPTS,
            alertRetryMs: env.RECOVERY_ALERT_RETRY_MS
        },
        market,
        server: { host: env.APPLICATION_HOST, port: env.APPLICATION_PORT }
    };
}

export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
    return toGatewayConfig(validate(GatewayEnvSchema, env, 'GatewayConfig'));
}
