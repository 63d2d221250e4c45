import pino from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE_PATH = process.env.LOG_FILE_PATH;

const STREAM_LEVELS: readonly pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function streamLevel(level: string): pino.Level {
    return STREAM_LEVELS.find(candidate => candidate === level) ?? "info";
}

function createDestination(): pino.DestinationStream | undefined {
    if (!LOG_FILE_PATH) {
        return undefined;
    }

    // Console plus file, both at the configured level
    const level = streamLevel(LOG_LEVEL);
    return pino.multistream([
        { level, stream: process.stdout },
        { level, stream: pino.destination({ dest: LOG_FILE_PATH, mkdir: true, sync: false }) }
    ]);
}

const options: pino.LoggerOptions = {
    level: LOG_LEVEL,
    base: {
        system: "gateway-supervisor"
    },
    redact: {
        paths: REDACT_KEYS,
        censor: REDACT_CENSOR
    }
};

const destination = createDestination();

export const logger = destination ? pino(options, destination) : pino(options);

/**
 * Returns a child logger tagged with the owning component.
 */
export function getComponentLogger(component: string) {
    return logger.child({ component });
}
