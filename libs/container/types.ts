/**
 * Container runtime contract and lifecycle records.
 *
 * The production runtime talks to the Docker daemon; tests use an in-memory
 * runtime with the same surface.
 */

export type DesiredContainerState = 'ABSENT' | 'RUNNING' | 'STOPPED';

export type ObservedContainerState = 'NOT_FOUND' | 'CREATED' | 'RUNNING' | 'EXITED' | 'UNKNOWN';

export interface PortBinding {
    containerPort: number;
    hostPort: number;
    protocol?: 'tcp' | 'udp';
    /** Host interface to bind; all interfaces when omitted */
    hostIp?: string;
}

export type RestartPolicy = 'no' | 'always' | 'unless-stopped' | 'on-failure';

/** Everything needed to create the gateway container from scratch. */
export interface ContainerSpec {
    name: string;
    image: string;
    ports: PortBinding[];
    environment: Record<string, string>;
    restartPolicy: RestartPolicy;
}

/** Point-in-time view of a container as reported by the runtime. */
export interface ContainerInspection {
    id: string;
    name: string;
    image: string;
    state: ObservedContainerState;
    /** ISO-8601, null when the container never started */
    startedAt: string | null;
    finishedAt: string | null;
    createdAt: string | null;
}

export interface ContainerRecord {
    name: string;
    image: string;
    containerId: string | null;
    desiredState: DesiredContainerState;
    observedState: ObservedContainerState;
    startedAt: string | null;
    lastObservedAt: string | null;
    lastError: string | null;
}

/**
 * Thin adapter over the container engine, scoped to named containers.
 *
 * Implementations must throw ContainerError with kind
 * DAEMON_UNREACHABLE, NOT_FOUND or IMAGE_UNAVAILABLE where those apply.
 */
export interface ContainerRuntime {
    /** null when no container carries the name */
    inspect(name: string): Promise<ContainerInspection | null>;
    pullImage(image: string): Promise<void>;
    /** Returns the new container id */
    create(spec: ContainerSpec): Promise<string>;
    start(name: string): Promise<void>;
    /** Graceful stop; the engine force-kills once the grace period ends */
    stop(name: string, graceSeconds: number): Promise<void>;
    kill(name: string): Promise<void>;
    remove(name: string): Promise<void>;
    logs(name: string, tailLines: number): Promise<string[]>;
}
