/**
 * Generic static serving for files that are neither HTML nor markdown.
 *
 * Works from the bytes the pipeline already read and verified, so the path
 * is never reopened here. Handles the conditional and range requests a
 * browser or download tool will send; everything else is a plain 200.
 */

import type { Context } from "hono";
import { getMimeType } from "hono/utils/mime";
import type { ContentCategory } from "./content-classifier.js";

export interface StaticFile {
    path: string;
    bytes: Uint8Array;
    category: ContentCategory;
    mtime: Date;
}

export interface ByteRange {
    start: number;
    /** Inclusive. */
    end: number;
}

export type RangeResult = { kind: "none" } | { kind: "range"; range: ByteRange } | { kind: "unsatisfiable" };

/**
 * Single-range `bytes=` parsing. Multi-range and malformed headers are
 * ignored rather than rejected.
 */
export function parseRange(header: string | undefined, size: number): RangeResult {
    if (!header || !header.startsWith("bytes=")) return { kind: "none" };

    const value = header.slice("bytes=".length).trim();
    if (value.includes(",")) return { kind: "none" };

    const match = /^(\d*)-(\d*)$/.exec(value);
    if (!match) return { kind: "none" };

    const [, first = "", last = ""] = match;
    if (first === "" && last === "") return { kind: "none" };

    if (first === "") {
        const suffix = Number(last);
        if (suffix === 0 || size === 0) return { kind: "unsatisfiable" };
        return { kind: "range", range: { start: Math.max(0, size - suffix), end: size - 1 } };
    }

    const start = Number(first);
    if (start >= size) return { kind: "unsatisfiable" };

    const end = last === "" ? size - 1 : Math.min(Number(last), size - 1);
    if (end < start) return { kind: "none" };

    return { kind: "range", range: { start, end } };
}

function notModifiedSince(header: string | undefined, mtime: Date): boolean {
    if (!header) return false;
    const since = Date.parse(header);
    if (Number.isNaN(since)) return false;
    // HTTP dates carry whole seconds
    return Math.floor(mtime.getTime() / 1000) * 1000 <= since;
}

export function serveStaticFile(c: Context, file: StaticFile): Response {
    const size = file.bytes.length;
    const lastModified = file.mtime.toUTCString();
    const contentType = getMimeType(file.path) ?? file.category;

    if (notModifiedSince(c.req.header("if-modified-since"), file.mtime)) {
        return c.body(null, 304, { "Last-Modified": lastModified });
    }

    const headers: Record<string, string> = {
        "Content-Type": contentType,
        "Last-Modified": lastModified,
        "Accept-Ranges": "bytes",
    };

    const range = parseRange(c.req.header("range"), size);

    if (range.kind === "unsatisfiable") {
        return c.body(null, 416, { ...headers, "Content-Range": `bytes */${size}` });
    }

    if (range.kind === "range") {
        const { start, end } = range.range;
        const slice = new Uint8Array(file.bytes.subarray(start, end + 1));
        return c.body(slice, 206, {
            ...headers,
            "Content-Range": `bytes ${start}-${end}/${size}`,
            "Content-Length": String(slice.length),
        });
    }

    return c.body(new Uint8Array(file.bytes), 200, { ...headers, "Content-Length": String(size) });
}
