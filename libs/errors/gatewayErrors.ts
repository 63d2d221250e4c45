/**
 * Typed failures of the gateway supervisor.
 *
 * These carry a stable `code` so the HTTP layer and the status surface can
 * report them verbatim; anything untyped goes through ErrorSanitizer instead.
 */

export type ContainerErrorKind = 'DAEMON_UNREACHABLE' | 'NOT_FOUND' | 'IMAGE_UNAVAILABLE' | 'RUNTIME';

export type ConnectionErrorKind = 'TIMEOUT' | 'REFUSED' | 'REJECTED' | 'CLOSED';

export abstract class GatewayError extends Error {
    abstract readonly code: string;
    /** Whether the caller may retry without operator action */
    abstract readonly retryable: boolean;

    protected constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ContainerError extends GatewayError {
    public readonly code: string;
    public readonly retryable: boolean;
    public readonly containerName?: string;

    constructor(
        public readonly kind: ContainerErrorKind,
        message: string,
        options?: { cause?: unknown; containerName?: string }
    ) {
        super(message, options);
        this.code = `CONTAINER_${kind}`;
        this.retryable = kind === 'DAEMON_UNREACHABLE';
        this.containerName = options?.containerName;
    }
}

export class ConnectionError extends GatewayError {
    public readonly code: string;
    public readonly retryable = true;

    constructor(
        public readonly kind: ConnectionErrorKind,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.code = `CONNECTION_${kind}`;
    }
}

export class NotReadyError extends GatewayError {
    public readonly code = 'SESSION_NOT_READY';
    public readonly retryable = true;

    constructor(
        public readonly state: string,
        public readonly waitedMs: number
    ) {
        super(`Gateway session not ready (state=${state}) after waiting ${waitedMs}ms`);
    }
}

export class RecoveryCancelledError extends GatewayError {
    public readonly code = 'RECOVERY_CANCELLED';
    public readonly retryable = false;

    constructor(episodeId: string) {
        super(`Recovery episode ${episodeId} cancelled`);
    }
}

export function isGatewayError(error: unknown): error is GatewayError {
    return error instanceof GatewayError;
}

/**
 * Renders any thrown value as a single line for status reporting.
 */
export function describeError(error: unknown): string {
    if (error instanceof GatewayError) {
        return `${error.code}: ${error.message}`;
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
