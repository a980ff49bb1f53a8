/**
 * Per-request context and the headers every response carries.
 *
 * The context is created fresh for each request and stored in Hono's
 * request-scoped variables; nothing here is shared between requests.
 */

import { randomUUID } from "crypto";
import type { HttpBindings } from "@hono/node-server";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "../logger.js";
import { SERVER_HEADER } from "../version.js";

export interface RequestContext {
    /** Log correlation only. Not a secret and not a security token. */
    requestId: string;
    /** Raw request path, still percent-encoded and attacker-controlled. */
    urlPath: string;
    /** Raw query string, without the leading "?". */
    query: string;
    /** Set once the path has passed every check. */
    resolvedPath: string | null;
    startTime: number;
}

export type AppEnv = {
    // absent when the app is driven through app.request()
    Bindings: Partial<Pick<HttpBindings, "incoming">>;
    Variables: {
        requestContext: RequestContext;
    };
};

export const STANDARD_HEADERS: Readonly<Record<string, string>> = {
    Server: SERVER_HEADER,
    "X-Frame-Options": "DENY",
    // keep-alive off: one request per connection
    Connection: "close",
};

export interface RequestTarget {
    path: string;
    query: string;
}

/**
 * Split a request target as it arrived on the wire. The WHATWG URL parser
 * folds "a/../b" into "b", so the path is taken from the Node request line
 * whenever there is one, and from the parsed URL only as a fallback.
 */
export function splitRequestTarget(rawTarget: string | undefined, parsedUrl: string): RequestTarget {
    if (rawTarget === undefined) {
        const url = new URL(parsedUrl);
        return { path: url.pathname, query: url.search.slice(1) };
    }

    // absolute-form targets ("http://host/path") keep only the path
    const target = rawTarget.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i, "");
    const hash = target.indexOf("#");
    const withoutHash = hash === -1 ? target : target.slice(0, hash);
    const question = withoutHash.indexOf("?");

    if (question === -1) return { path: withoutHash, query: "" };
    return { path: withoutHash.slice(0, question), query: withoutHash.slice(question + 1) };
}

export function requestContextMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
    return async (c, next) => {
        const target = splitRequestTarget(c.env?.incoming?.url, c.req.url);
        const context: RequestContext = {
            requestId: randomUUID(),
            urlPath: target.path,
            query: target.query,
            resolvedPath: null,
            startTime: Date.now(),
        };
        c.set("requestContext", context);

        try {
            await next();
        } finally {
            for (const [name, value] of Object.entries(STANDARD_HEADERS)) {
                c.header(name, value);
            }
            logger.info(`${context.requestId} closed after ${Date.now() - context.startTime}ms`);
        }
    };
}
