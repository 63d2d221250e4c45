import type { Server } from "node:http";
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { createGatewayApp } from "./app.js";

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
    });
}

async function main() {
    const stack = await bootstrap("gateway-api");
    const { host, port } = stack.config.server;

    const app = createGatewayApp({
        reporter: stack.reporter,
        supervisor: stack.supervisor,
        reads: stack.reads
    });

    const server = app.listen(port, host, () => {
        logger.info({ host, port }, "Gateway API listening");
    });

    let stopping = false;
    const shutdown = async (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        logger.info({ signal }, "Shutting down gateway API");

        await closeServer(server);
        await stack.shutdown();

        logger.info("Shutdown complete");
        process.exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            shutdown(signal).catch(err => {
                logger.fatal(err, "Shutdown failed");
                process.exit(1);
            });
        });
    }
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
