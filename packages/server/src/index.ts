/**
 * @mdserve/server
 *
 * Library entry: build the app in-process, or start it on a socket.
 * The command line lives in cli.ts.
 */

export { createApp, type AppOptions } from "./app.js";
export {
    ConfigError,
    UsageError,
    loadServerConfig,
    parseArgs,
    prepareDirectory,
    type CliArgs,
    type ListenAddress,
    type ServerConfig,
} from "./config.js";
export { createLogger, createMemoryLogger, openLogSink, type Logger } from "./logger.js";
export { classifyContent, classifyFile, type ClassificationResult, type ContentCategory } from "./lib/content-classifier.js";
export { renderMarkdown, type MarkdownRenderer } from "./lib/markdown.js";
export { resolveRequestPath, type ResolveResult } from "./lib/path-resolver.js";
export { dispatchRender, substituteMarkdownSibling, type RenderDecision } from "./lib/render-dispatcher.js";
export { isSafePath } from "./lib/symlink-guard.js";
export type { RequestContext } from "./middleware/request-context.js";
export { closeServer, startServer } from "./server.js";
export { SERVER_HEADER, VERSION } from "./version.js";
