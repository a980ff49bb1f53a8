/**
 * Content sniffing over the first 512 bytes, in the order browsers use:
 * byte-order marks, HTML tags, exact binary signatures, then a scan for
 * bytes that never appear in text. The category only picks a rendering
 * branch; it is never a security decision.
 */

export const SNIFF_LENGTH = 512;

export type ContentCategory = string;

export const HTML_CATEGORY = "text/html; charset=utf-8";
export const TEXT_CATEGORY = "text/plain; charset=utf-8";
export const BINARY_CATEGORY = "application/octet-stream";

export interface ClassificationResult {
    bytes: Uint8Array;
    category: ContentCategory;
    /** Lower-cased, with the dot; "" when the name has none. */
    extension: string;
}

// null matches any byte
type Pattern = ReadonlyArray<number | null>;

interface Signature {
    pattern: Pattern;
    mime: string;
}

function bytesOf(text: string): number[] {
    return Array.from(text, (ch) => ch.charCodeAt(0));
}

const ANY4: Pattern = [null, null, null, null];

const BOM_SIGNATURES: Signature[] = [
    { pattern: [0xfe, 0xff], mime: "text/plain; charset=utf-16be" },
    { pattern: [0xff, 0xfe], mime: "text/plain; charset=utf-16le" },
    { pattern: [0xef, 0xbb, 0xbf], mime: TEXT_CATEGORY },
];

const HTML_TAGS = [
    "<!DOCTYPE HTML", "<HTML", "<HEAD", "<SCRIPT", "<IFRAME", "<H1", "<DIV", "<FONT",
    "<TABLE", "<A", "<STYLE", "<TITLE", "<B", "<BODY", "<BR", "<P", "<!--",
];

const EXACT_SIGNATURES: Signature[] = [
    { pattern: bytesOf("<?xml"), mime: "text/xml; charset=utf-8" },
    { pattern: bytesOf("%PDF-"), mime: "application/pdf" },
    { pattern: bytesOf("%!PS-Adobe-"), mime: "application/postscript" },
    { pattern: bytesOf("GIF87a"), mime: "image/gif" },
    { pattern: bytesOf("GIF89a"), mime: "image/gif" },
    { pattern: [0x89, ...bytesOf("PNG\r\n\x1a\n")], mime: "image/png" },
    { pattern: [0xff, 0xd8, 0xff], mime: "image/jpeg" },
    { pattern: bytesOf("BM"), mime: "image/bmp" },
    { pattern: [...bytesOf("RIFF"), ...ANY4, ...bytesOf("WEBPVP")], mime: "image/webp" },
    { pattern: [0x00, 0x00, 0x01, 0x00], mime: "image/x-icon" },
    { pattern: [...bytesOf("RIFF"), ...ANY4, ...bytesOf("WAVE")], mime: "audio/wave" },
    { pattern: bytesOf("ID3"), mime: "audio/mpeg" },
    { pattern: bytesOf("OggS\x00"), mime: "application/ogg" },
    { pattern: [0x1f, 0x8b, 0x08], mime: "application/x-gzip" },
    { pattern: bytesOf("PK\x03\x04"), mime: "application/zip" },
    { pattern: bytesOf("Rar!\x1a\x07\x00"), mime: "application/x-rar-compressed" },
    { pattern: bytesOf("\x00asm"), mime: "application/wasm" },
    { pattern: bytesOf("wOFF"), mime: "font/woff" },
    { pattern: bytesOf("wOF2"), mime: "font/woff2" },
];

function matchesAt(data: Uint8Array, offset: number, pattern: Pattern): boolean {
    if (data.length - offset < pattern.length) return false;
    return pattern.every((expected, i) => expected === null || data[offset + i] === expected);
}

function isWhitespace(byte: number): boolean {
    return byte === 0x09 || byte === 0x0a || byte === 0x0c || byte === 0x0d || byte === 0x20;
}

function upper(byte: number): number {
    return byte >= 0x61 && byte <= 0x7a ? byte - 0x20 : byte;
}

/** Tag match is case-insensitive and must be followed by a space or ">". */
function matchesHtmlTag(data: Uint8Array, offset: number, tag: string): boolean {
    const end = offset + tag.length;
    if (data.length <= end) return false;
    for (let i = 0; i < tag.length; i++) {
        if (upper(data[offset + i] ?? 0) !== tag.charCodeAt(i)) return false;
    }
    const next = data[end];
    return next === 0x20 || next === 0x3e;
}

function isBinaryByte(byte: number): boolean {
    return byte <= 0x08 || byte === 0x0b || (byte >= 0x0e && byte <= 0x1a) || (byte >= 0x1c && byte <= 0x1f);
}

export function classifyContent(bytes: Uint8Array): ContentCategory {
    const data = bytes.subarray(0, SNIFF_LENGTH);

    for (const sig of BOM_SIGNATURES) {
        if (matchesAt(data, 0, sig.pattern)) return sig.mime;
    }

    let start = 0;
    while (start < data.length && isWhitespace(data[start] ?? 0)) start++;

    if (HTML_TAGS.some((tag) => matchesHtmlTag(data, start, tag))) return HTML_CATEGORY;

    const xml = EXACT_SIGNATURES[0];
    if (xml && matchesAt(data, start, xml.pattern)) return xml.mime;

    for (const sig of EXACT_SIGNATURES.slice(1)) {
        if (matchesAt(data, 0, sig.pattern)) return sig.mime;
    }

    return data.some(isBinaryByte) ? BINARY_CATEGORY : TEXT_CATEGORY;
}

export function isHtmlCategory(category: ContentCategory): boolean {
    return category.startsWith("text/html");
}

export function isPlainTextCategory(category: ContentCategory): boolean {
    return category.startsWith("text/plain");
}

export function extensionOf(path: string): string {
    const slash = path.lastIndexOf("/");
    const dot = path.lastIndexOf(".");
    return dot > slash ? path.slice(dot).toLowerCase() : "";
}

export function classifyFile(path: string, bytes: Uint8Array): ClassificationResult {
    return { bytes, category: classifyContent(bytes), extension: extensionOf(path) };
}
