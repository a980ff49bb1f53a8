/**
 * Pick how a verified file is answered. First match wins:
 *
 *   .html path or HTML content  -> raw HTML
 *   .md path with text content  -> rendered markdown, or the source with ?raw
 *   anything else               -> generic static serve
 *
 * The `.html` -> `.md` sibling swap runs before the file is checked, so every
 * later guard sees the substituted path.
 */

import { stat } from "fs/promises";
import { isHtmlCategory, isPlainTextCategory, type ContentCategory } from "./content-classifier.js";
import type { MarkdownRenderer } from "./markdown.js";

export type RenderBranch = "raw-html" | "markdown" | "raw-markdown" | "static";

export type RenderDecision =
    | { branch: "raw-html"; body: Uint8Array; contentType: "text/html" }
    | { branch: "markdown"; body: string; contentType: "text/html; charset=utf-8" }
    | { branch: "raw-markdown"; body: Uint8Array }
    | { branch: "static" };

export interface RenderInput {
    path: string;
    bytes: Uint8Array;
    category: ContentCategory;
    /** Raw query string, without the leading "?". */
    query: string;
}

export interface Substitution {
    path: string;
    substituted: boolean;
}

/**
 * `page.html` becomes `page.md` when the markdown sibling exists. Existence
 * only; the caller still runs every safety check on the returned path.
 */
export async function substituteMarkdownSibling(path: string): Promise<Substitution> {
    if (!path.endsWith(".html")) return { path, substituted: false };

    const sibling = `${path.slice(0, -".html".length)}.md`;
    try {
        await stat(sibling);
        return { path: sibling, substituted: true };
    } catch {
        return { path, substituted: false };
    }
}

export function dispatchRender(input: RenderInput, render: MarkdownRenderer): RenderDecision {
    const { path, bytes, category, query } = input;

    if (path.endsWith(".html") || isHtmlCategory(category)) {
        return { branch: "raw-html", body: bytes, contentType: "text/html" };
    }

    if (path.endsWith(".md") && isPlainTextCategory(category)) {
        if (query.includes("raw")) return { branch: "raw-markdown", body: bytes };
        return { branch: "markdown", body: render(bytes), contentType: "text/html; charset=utf-8" };
    }

    return { branch: "static" };
}
