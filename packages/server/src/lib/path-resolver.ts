/**
 * Map a raw request path onto a file beneath the served root.
 *
 * Two independent guards: a literal "../" check before anything else, and
 * a string-prefix check on the canonical result. Neither touches the disk.
 */

import { posix } from "path";

/** Appended to every directory-style path; `indexName` only covers the root. */
export const DIRECTORY_INDEX = "index.md";

export type ResolveFailure = "traversal" | "invalid" | "outside-root";

export type ResolveResult =
    | { ok: true; path: string }
    | { ok: false; reason: ResolveFailure };

export function resolveRequestPath(rootPath: string, urlPath: string, indexName: string): ResolveResult {
    if (urlPath.includes("../")) return { ok: false, reason: "traversal" };
    if (urlPath.includes("\0")) return { ok: false, reason: "invalid" };

    let relative = urlPath.startsWith("/") ? urlPath.slice(1) : urlPath;
    if (relative === "") relative = indexName;
    if (relative.endsWith("/")) relative += DIRECTORY_INDEX;

    // posix.resolve folds "." and ".." without following links
    const canonical = posix.resolve(rootPath + relative);

    if (!hasRootPrefix(rootPath, canonical)) return { ok: false, reason: "outside-root" };
    return { ok: true, path: canonical };
}

export function hasRootPrefix(rootPath: string, path: string): boolean {
    return path.startsWith(rootPath);
}
