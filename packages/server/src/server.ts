import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import type { Server } from "net";
import type { ServerConfig } from "./config.js";
import type { AppEnv } from "./middleware/request-context.js";

/**
 * Listen on the configured address; resolves once the socket is bound and
 * rejects on bind errors such as EADDRINUSE.
 */
export function startServer(app: Hono<AppEnv>, config: ServerConfig): Promise<Server> {
    const { host, port } = config.listen;

    return new Promise((resolve, reject) => {
        // every adaptor server type is a net.Server underneath
        const server: Server = serve({ fetch: app.fetch, port, hostname: host || undefined }, () => {
            server.off("error", reject);
            resolve(server);
        });
        server.once("error", reject);
    });
}

export function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}
