#!/usr/bin/env node
/**
 * mdserve: serve a directory of markdown and HTML over HTTP.
 *
 * Usage: mdserve [--http addr] [--log file] [--index name] directory
 */

import { createApp } from "./app.js";
import { ConfigError, EXIT_STARTUP_FAILURE, USAGE, UsageError, loadServerConfig, parseArgs } from "./config.js";
import { createLogger, openLogSink } from "./logger.js";
import { closeServer, startServer } from "./server.js";
import { BANNER, PRODUCT } from "./version.js";

async function main(): Promise<void> {
    console.log(BANNER);

    const args = parseArgs(process.argv.slice(2));
    if (args.help) {
        console.log(USAGE);
        return;
    }

    const config = await loadServerConfig(args);
    console.log(`serving filesystem: ${config.rootPath}`);

    const sink = await openLogSink(config.logFile);
    const logger = createLogger(sink, PRODUCT);
    console.log(`log output: ${config.logFile ?? "stderr"}`);

    const app = createApp({ config, logger });
    const server = await startServer(app, config);
    console.log(`listening: ${config.listen.host}:${config.listen.port}`);

    const shutdown = (signal: string) => {
        logger.info(`received ${signal}, shutting down`);
        void closeServer(server).then(
            () => process.exit(0),
            (err: unknown) => {
                logger.error(`shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
                process.exit(1);
            },
        );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
    if (err instanceof UsageError) {
        console.error(USAGE);
        console.error(`\n${err.message}`);
    } else if (err instanceof ConfigError) {
        console.error(`${PRODUCT}: ${err.message}`);
    } else {
        console.error(`${PRODUCT}: startup failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(EXIT_STARTUP_FAILURE);
});
