import { Hono } from "hono";
import type { ServerConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { renderMarkdown, type MarkdownRenderer } from "./lib/markdown.js";
import { requestContextMiddleware, type AppEnv } from "./middleware/request-context.js";
import { createSiteRoute, notFound } from "./routes/site.js";

export interface AppOptions {
    config: ServerConfig;
    logger: Logger;
    /** Markdown collaborator; defaults to marked. */
    render?: MarkdownRenderer;
}

export function createApp({ config, logger, render = renderMarkdown }: AppOptions): Hono<AppEnv> {
    const app = new Hono<AppEnv>();

    app.use("*", requestContextMiddleware(logger));
    app.route("/", createSiteRoute({ config, logger, render }));

    app.notFound((c) => notFound(c));

    // Nothing escapes to the client: log it, answer like any other miss.
    app.onError((err, c) => {
        const id = c.get("requestContext")?.requestId ?? "-";
        logger.error(`${id} unhandled error: ${err.stack ?? err.message}`);
        return notFound(c);
    });

    return app;
}
