import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { getComponentLogger } from '../../../libs/logging/logger.js';
import { ConnectionError, ContainerError, NotReadyError } from '../../../libs/errors/gatewayErrors.js';
import { ErrorSanitizer } from '../../../libs/errors/sanitizer.js';
import type { ErrorCategory } from '../../../libs/errors/sanitizer.js';
import { ValidationError, validate } from '../../../libs/validation/zod-middleware.js';
import type { ValidationIssue } from '../../../libs/validation/zod-middleware.js';
import { AccountSummaryQuerySchema, LogsQuerySchema } from '../../../libs/validation/schema.js';
import { RateLimiter, rateLimit } from '../../../libs/middleware/rate-limiter.js';
import type { GatewayStatusSnapshot } from '../../../libs/supervisor/statusReporter.js';
import type { SupervisorStatus } from '../../../libs/supervisor/ConnectionSupervisor.js';
import type { RecoveryEpisode } from '../../../libs/recovery/RecoveryLadder.js';
import type {
    AccountSummaryResult,
    ManagedAccountsResult,
    PositionsResult,
    ServerTimeResult
} from '../../../libs/operations/gatewayReads.js';

const logger = getComponentLogger('GatewayApi');

export interface GatewayApiDependencies {
    reporter: {
        snapshot(): Promise<GatewayStatusSnapshot>;
        logs(tailLines?: number): Promise<string[]>;
    };
    supervisor: {
        status(): SupervisorStatus;
        reconnect(): Promise<RecoveryEpisode>;
    };
    reads: {
        serverTime(): Promise<ServerTimeResult>;
        managedAccounts(): Promise<ManagedAccountsResult>;
        accountSummary(tags?: string): Promise<AccountSummaryResult>;
        positions(): Promise<PositionsResult>;
    };
    /** Guards manual reconnects; 5 burst, one per 10 s sustained by default */
    reconnectLimiter?: RateLimiter;
}

export interface ErrorBody {
    error: string;
    message: string;
    retryable?: boolean;
    incidentId?: string;
    issues?: ValidationIssue[];
}

export interface HttpErrorResponse {
    status: number;
    body: ErrorBody;
    retryAfterSeconds?: number;
}

/** Which part of the service a route exercises, for incident logs */
export function routeCategory(path: string): ErrorCategory {
    if (path === '/gateway/status' || path === '/gateway/logs') return 'CONTAINER';
    if (path === '/gateway/time' || path.startsWith('/connection/') || path.startsWith('/account/')) return 'GATEWAY';
    return 'OPS';
}

/**
 * Typed gateway errors are reported as they are; anything else is sanitized
 * and only the incident id leaves the process.
 */
export function toHttpError(err: unknown, contextLabel: string, category: ErrorCategory = 'OPS'): HttpErrorResponse {
    if (err instanceof NotReadyError) {
        return {
            status: 503,
            body: { error: err.code, message: err.message, retryable: true },
            retryAfterSeconds: Math.max(1, Math.ceil(err.waitedMs / 1000))
        };
    }
    if (err instanceof ConnectionError) {
        return { status: 502, body: { error: err.code, message: err.message, retryable: err.retryable } };
    }
    if (err instanceof ContainerError) {
        return {
            status: err.kind === 'NOT_FOUND' ? 404 : 502,
            body: { error: err.code, message: err.message, retryable: err.retryable }
        };
    }
    if (err instanceof ValidationError) {
        return { status: 400, body: { error: 'VALIDATION_FAILED', message: 'Invalid request', issues: err.issues } };
    }

    const sanitized = ErrorSanitizer.sanitize(err, contextLabel, category);
    return {
        status: 500,
        body: { error: 'INTERNAL_ERROR', message: sanitized.publicMessage, incidentId: sanitized.incidentId }
    };
}

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export interface GatewayHandlers {
    healthz: Handler;
    gatewayStatus: Handler;
    gatewayLogs: Handler;
    connectionStatus: Handler;
    reconnect: Handler;
    serverTime: Handler;
    managedAccounts: Handler;
    accountSummary: Handler;
    positions: Handler;
}

export function createGatewayHandlers(deps: GatewayApiDependencies): GatewayHandlers {
    const { reporter, supervisor, reads } = deps;

    return {
        healthz: async (_req, res) => {
            res.json({ status: 'ok' });
        },

        gatewayStatus: async (_req, res, next) => {
            try {
                res.json(await reporter.snapshot());
            } catch (err) {
                next(err);
            }
        },

        gatewayLogs: async (req, res, next) => {
            try {
                const { tail } = validate(LogsQuerySchema, req.query, 'GatewayApi:LogsQuery');
                const logs = await reporter.logs(tail);
                res.json({ tail, logs });
            } catch (err) {
                next(err);
            }
        },

        connectionStatus: async (_req, res, next) => {
            try {
                const status = supervisor.status();
                res.json({
                    state: status.state,
                    connected: status.connected,
                    endpoint: status.session.endpoint,
                    clientId: status.session.clientId,
                    connectedAt: status.session.connectedAt,
                    lastActivityAt: status.session.lastActivityAt,
                    lastSample: status.lastSample,
                    currentEpisodeId: status.currentEpisode?.id ?? null
                });
            } catch (err) {
                next(err);
            }
        },

        reconnect: async (_req, res, next) => {
            try {
                const episode = await supervisor.reconnect();
                const success = episode.outcome === 'SUCCEEDED';
                res.status(success ? 200 : 502).json({
                    success,
                    message: success
                        ? 'Reconnected to gateway'
                        : `Reconnect failed: ${episode.error ?? 'unknown error'}`,
                    connected: supervisor.status().connected,
                    episodeId: episode.id
                });
            } catch (err) {
                next(err);
            }
        },

        serverTime: async (_req, res, next) => {
            try {
                res.json(await reads.serverTime());
            } catch (err) {
                next(err);
            }
        },

        managedAccounts: async (_req, res, next) => {
            try {
                res.json(await reads.managedAccounts());
            } catch (err) {
                next(err);
            }
        },

        accountSummary: async (req, res, next) => {
            try {
                const { tags } = validate(AccountSummaryQuerySchema, req.query, 'GatewayApi:AccountSummaryQuery');
                res.json(await reads.accountSummary(tags));
            } catch (err) {
                next(err);
            }
        },

        positions: async (_req, res, next) => {
            try {
                res.json(await reads.positions());
            } catch (err) {
                next(err);
            }
        }
    };
}

/**
 * Final express error handler.
 */
export function gatewayErrorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    const mapped = toHttpError(err, `GatewayApi:${req.method} ${req.path}`, routeCategory(req.path));
    if (mapped.status > 500) {
        logger.warn({ path: req.path, status: mapped.status, error: mapped.body.error }, 'Gateway request failed');
    }
    if (mapped.retryAfterSeconds !== undefined) {
        res.setHeader('Retry-After', String(mapped.retryAfterSeconds));
    }
    res.status(mapped.status).json(mapped.body);
}

export function createGatewayApp(deps: GatewayApiDependencies): Express {
    const handlers = createGatewayHandlers(deps);
    const limiter = deps.reconnectLimiter ?? new RateLimiter(5, 0.1);

    const app = express();
    app.disable('x-powered-by');
    app.use(express.json());

    app.get('/healthz', handlers.healthz);
    app.get('/gateway/status', handlers.gatewayStatus);
    app.get('/gateway/logs', handlers.gatewayLogs);
    app.get('/connection/status', handlers.connectionStatus);
    app.post('/connection/reconnect', rateLimit(limiter), handlers.reconnect);
    app.get('/gateway/time', handlers.serverTime);
    app.get('/account/managed-accounts', handlers.managedAccounts);
    app.get('/account/summary', handlers.accountSummary);
    app.get('/account/positions', handlers.positions);

    app.use(gatewayErrorHandler);
    return app;
}
