/**
 * Site route: the catch-all GET handler that turns a URL into a file.
 *
 * Order matters: resolve, swap .html for a .md sibling, stat, symlink
 * check, root-prefix re-check, and only then read. Every rejection answers
 * with the same 404 so a client cannot tell "forbidden" from "missing".
 */

import { readFile, stat } from "fs/promises";
import { Hono, type Context } from "hono";
import type { ServerConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { AppEnv } from "../middleware/request-context.js";
import { classifyFile } from "../lib/content-classifier.js";
import type { MarkdownRenderer } from "../lib/markdown.js";
import { hasRootPrefix, resolveRequestPath } from "../lib/path-resolver.js";
import { dispatchRender, substituteMarkdownSibling } from "../lib/render-dispatcher.js";
import { serveStaticFile } from "../lib/static-file.js";
import { isSafePath } from "../lib/symlink-guard.js";

export const NOT_FOUND_BODY = "404 page not found\n";

export function notFound(c: Context): Response {
    return c.text(NOT_FOUND_BODY, 404);
}

function describeError(err: unknown): string {
    if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
    return err instanceof Error ? err.message : String(err);
}

export interface SiteRouteOptions {
    config: ServerConfig;
    logger: Logger;
    render: MarkdownRenderer;
}

export function createSiteRoute({ config, logger, render }: SiteRouteOptions): Hono<AppEnv> {
    const app = new Hono<AppEnv>();

    app.all("*", async (c) => {
        const ctx = c.get("requestContext");
        const id = ctx.requestId;

        const reject = (reason: string, subject: string): Response => {
            logger.warn(`${id} ${reason}: ${subject}`);
            return notFound(c);
        };

        if (c.req.method !== "GET") {
            return reject("bad method", `${c.req.method} ${ctx.urlPath} ${c.req.header("user-agent") ?? "-"}`);
        }

        let urlPath: string;
        try {
            urlPath = decodeURIComponent(ctx.urlPath);
        } catch {
            return reject("bad path encoding", ctx.urlPath);
        }

        const resolved = resolveRequestPath(config.rootPath, urlPath, config.indexName);
        if (!resolved.ok) return reject(`bad path (${resolved.reason})`, urlPath);

        logger.info(`${id} GET ${urlPath} -> ${resolved.path}`);

        const { path, substituted } = await substituteMarkdownSibling(resolved.path);
        if (substituted) logger.info(`${id} ${resolved.path} -> ${path}`);

        let mtime: Date;
        try {
            const info = await stat(path);
            if (!info.isFile()) return reject("not a regular file", path);
            mtime = info.mtime;
        } catch (err) {
            // missing and unreadable look the same from outside
            const code = describeError(err);
            return reject(code === "ENOENT" ? "404" : `error opening file (${code})`, path);
        }

        if (!(await isSafePath(path))) return reject("symlink or unresolvable path", path);
        if (!hasRootPrefix(config.rootPath, path)) return reject(`outside root ${config.rootPath}`, path);

        ctx.resolvedPath = path;

        let bytes: Buffer;
        try {
            bytes = await readFile(path);
        } catch (err) {
            return reject(`error reading file (${describeError(err)})`, path);
        }

        const { category } = classifyFile(path, bytes);
        const decision = dispatchRender({ path, bytes, category, query: ctx.query }, render);

        switch (decision.branch) {
            case "raw-html":
                logger.info(`${id} serving raw html: ${path}`);
                return c.body(new Uint8Array(decision.body), 200, { "Content-Type": decision.contentType });
            case "raw-markdown":
                logger.info(`${id} raw markdown request: ${path}`);
                return c.body(new Uint8Array(decision.body), 200);
            case "markdown":
                logger.info(`${id} serving markdown: ${path}`);
                return c.body(decision.body, 200, { "Content-Type": decision.contentType });
            case "static":
                logger.info(`${id} serving ${category}: ${path}`);
                return serveStaticFile(c, { path, bytes, category, mtime });
        }
    });

    return app;
}
