import Docker from 'dockerode';
import { getComponentLogger } from '../logging/logger.js';
import { ContainerError } from '../errors/gatewayErrors.js';
import type { ContainerErrorKind } from '../errors/gatewayErrors.js';
import type { ContainerInspection, ContainerRuntime, ContainerSpec, ObservedContainerState } from './types.js';

const logger = getComponentLogger('DockerRuntime');

const DAEMON_UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOENT', 'EACCES', 'ECONNRESET', 'EPIPE', 'ETIMEDOUT']);

/** Docker reports this timestamp for containers that never started or finished */
const ZERO_TIMESTAMP_PREFIX = '0001-01-01';

/** HTTP 304 from start/stop: the container is already in the requested state */
const NOT_MODIFIED = 304;
const NOT_FOUND = 404;

function statusCodeOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
        return error.statusCode;
    }
    return undefined;
}

function errnoOf(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Maps dockerode/docker-modem failures onto the container error taxonomy.
 */
export function classifyDockerError(
    error: unknown,
    containerName: string,
    fallback: ContainerErrorKind = 'RUNTIME'
): ContainerError {
    if (error instanceof ContainerError) return error;

    const message = error instanceof Error ? error.message : String(error);
    const errno = errnoOf(error);
    if (errno !== undefined && DAEMON_UNREACHABLE_CODES.has(errno)) {
        return new ContainerError('DAEMON_UNREACHABLE', `Docker daemon unreachable: ${message}`, { cause: error, containerName });
    }
    if (statusCodeOf(error) === NOT_FOUND && fallback !== 'IMAGE_UNAVAILABLE') {
        return new ContainerError('NOT_FOUND', `Container ${containerName} not found`, { cause: error, containerName });
    }
    return new ContainerError(fallback, message, { cause: error, containerName });
}

export function toObservedState(status: string | undefined): ObservedContainerState {
    switch (status) {
        case 'created':
            return 'CREATED';
        case 'running':
        case 'restarting':
            return 'RUNNING';
        case 'exited':
        case 'dead':
            return 'EXITED';
        default:
            return 'UNKNOWN';
    }
}

function timestampOrNull(value: string | undefined): string | null {
    if (!value || value.startsWith(ZERO_TIMESTAMP_PREFIX)) return null;
    return value;
}

/**
 * Splits a non-TTY log payload into text.
 *
 * Without a TTY the daemon multiplexes stdout/stderr into frames of
 * [stream, 0, 0, 0, size(4 bytes, big endian)] followed by `size` bytes.
 * Payloads that do not start with a valid header are returned as plain text.
 */
export function demuxLogPayload(payload: Buffer): string {
    const chunks: string[] = [];
    let offset = 0;

    while (offset < payload.length) {
        const headerValid = payload.length - offset >= 8
            && (payload[offset] ?? 3) <= 2
            && payload[offset + 1] === 0
            && payload[offset + 2] === 0
            && payload[offset + 3] === 0;

        if (!headerValid) {
            chunks.push(payload.subarray(offset).toString('utf8'));
            break;
        }

        const size = payload.readUInt32BE(offset + 4);
        const start = offset + 8;
        chunks.push(payload.subarray(start, start + size).toString('utf8'));
        offset = start + size;
    }

    return chunks.join('');
}

export function splitLogLines(text: string): string[] {
    const lines = text.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

export class DockerContainerRuntime implements ContainerRuntime {
    constructor(private readonly docker: Docker = new Docker()) { }

    static fromSocket(socketPath?: string): DockerContainerRuntime {
        return new DockerContainerRuntime(socketPath ? new Docker({ socketPath }) : new Docker());
    }

    public async inspect(name: string): Promise<ContainerInspection | null> {
        try {
            const info = await this.docker.getContainer(name).inspect();
            return {
                id: info.Id,
                name: info.Name.replace(/^\//, ''),
                image: info.Config.Image,
                state: toObservedState(info.State.Status),
                startedAt: timestampOrNull(info.State.StartedAt),
                finishedAt: timestampOrNull(info.State.FinishedAt),
                createdAt: timestampOrNull(info.Created)
            };
        } catch (error) {
            if (statusCodeOf(error) === NOT_FOUND) {
                return null;
            }
            throw classifyDockerError(error, name);
        }
    }

    public async pullImage(image: string): Promise<void> {
        logger.info({ image }, 'Pulling gateway image');
        try {
            const stream = await this.docker.pull(image);
            await new Promise<void>((resolve, reject) => {
                this.docker.modem.followProgress(stream, (error: Error | null) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            });
        } catch (error) {
            throw classifyDockerError(error, image, 'IMAGE_UNAVAILABLE');
        }
        logger.info({ image }, 'Gateway image pulled');
    }

    public async create(spec: ContainerSpec): Promise<string> {
        const exposedPorts: Record<string, object> = {};
        const portBindings: Record<string, Array<{ HostPort: string; HostIp?: string }>> = {};

        for (const binding of spec.ports) {
            const key = `${binding.containerPort}/${binding.protocol ?? 'tcp'}`;
            exposedPorts[key] = {};
            portBindings[key] = [{
                HostPort: String(binding.hostPort),
                ...(binding.hostIp !== undefined ? { HostIp: binding.hostIp } : {})
            }];
        }

        try {
            const container = await this.docker.createContainer({
                name: spec.name,
                Image: spec.image,
                Env: Object.entries(spec.environment).map(([key, value]) => `${key}=${value}`),
                ExposedPorts: exposedPorts,
                HostConfig: {
                    PortBindings: portBindings,
                    RestartPolicy: { Name: spec.restartPolicy }
                }
            });
            logger.info({ name: spec.name, id: container.id }, 'Gateway container created');
            return container.id;
        } catch (error) {
            // A missing image surfaces as 404 on create
            throw classifyDockerError(error, spec.name, statusCodeOf(error) === NOT_FOUND ? 'IMAGE_UNAVAILABLE' : 'RUNTIME');
        }
    }

    public async start(name: string): Promise<void> {
        try {
            await this.docker.getContainer(name).start();
        } catch (error) {
            if (statusCodeOf(error) === NOT_MODIFIED) return;
            throw classifyDockerError(error, name);
        }
    }

    public async stop(name: string, graceSeconds: number): Promise<void> {
        try {
            await this.docker.getContainer(name).stop({ t: graceSeconds });
        } catch (error) {
            if (statusCodeOf(error) === NOT_MODIFIED) return;
            throw classifyDockerError(error, name);
        }
    }

    public async kill(name: string): Promise<void> {
        try {
            await this.docker.getContainer(name).kill();
        } catch (error) {
            throw classifyDockerError(error, name);
        }
    }

    public async remove(name: string): Promise<void> {
        try {
            await this.docker.getContainer(name).remove({ force: true });
        } catch (error) {
            throw classifyDockerError(error, name);
        }
    }

    public async logs(name: string, tailLines: number): Promise<string[]> {
        try {
            const payload = await this.docker.getContainer(name).logs({
                stdout: true,
                stderr: true,
                follow: false,
                tail: tailLines
            });
            return splitLogLines(demuxLogPayload(payload));
        } catch (error) {
            throw classifyDockerError(error, name);
        }
    }
}
