/**
 * Render markdown source to an HTML fragment. GitHub-flavoured, synchronous,
 * no surrounding page template: the output is exactly what marked produces.
 */

import { Marked } from "marked";

const markdown = new Marked({ gfm: true });

export type MarkdownRenderer = (source: Uint8Array) => string;

export const renderMarkdown: MarkdownRenderer = (source) =>
    markdown.parse(Buffer.from(source).toString("utf-8"), { async: false });
