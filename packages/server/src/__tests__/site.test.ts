/**
 * site.test.ts: the request pipeline end to end, in process
 */

import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import { createApp } from "../app.js";
import { createMemoryLogger, type MemoryLogger } from "../logger.js";
import { NOT_FOUND_BODY } from "../routes/site.js";
import { SERVER_HEADER } from "../version.js";
import { createSiteFixture, link, type SiteFixture } from "./helpers.js";

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

const FILES = {
    "index.md": "# Home\n",
    "doc.md": "# Hello\n\nbody text\n",
    "docs/index.md": "# Docs\n\nsee [guide](guide.html)\n",
    "docs/guide.md": "# Guide\n",
    "docs/guide.html": "<p>stale export</p>\n",
    "plain.html": "just words, served as html\n",
    "notes.txt": "<html><body>sniffed</body></html>\n",
    "blob.md": new Uint8Array([0x00, 0x01, 0x02, 0x03]),
    "logo.png": PNG,
    "my doc.md": "# Spaced\n",
};

describe("site pipeline", () => {
    let site: SiteFixture;
    let logger: MemoryLogger;
    let request: (path: string, init?: RequestInit, wire?: { incoming: { url: string } }) => Promise<Response>;

    beforeAll(async () => {
        site = await createSiteFixture(FILES);
        link(join(site.outside, "secret.txt"), join(site.root, "escape.txt"));
        link(join(site.root, "doc.md"), join(site.root, "alias.md"));
        link(site.outside, join(site.root, "linked"));
        logger = createMemoryLogger();
        const app = createApp({ config: site.config, logger });
        request = async (path, init, wire) => app.request(path, init, wire);
    });

    afterAll(() => {
        site.cleanup();
    });

    async function expectNotFound(res: Response): Promise<void> {
        expect(res.status).toBe(404);
        expect(await res.text()).toBe(NOT_FOUND_BODY);
    }

    describe("markdown", () => {
        it("renders .md files to HTML", async () => {
            const res = await request("/doc.md");
            expect(res.status).toBe(200);
            expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
            expect(await res.text()).toBe("<h1>Hello</h1>\n<p>body text</p>\n");
        });

        it("returns the exact source bytes with ?raw and sets no content type", async () => {
            const res = await request("/doc.md?raw=1");
            expect(res.status).toBe(200);
            expect(res.headers.get("content-type")).toBeNull();
            expect(Buffer.from(await res.arrayBuffer())).toEqual(readFileSync(join(site.root, "doc.md")));
        });

        it("decodes percent-encoded names", async () => {
            const res = await request("/my%20doc.md");
            expect(await res.text()).toBe("<h1>Spaced</h1>\n");
        });

        it("serves the index for / and for directory paths", async () => {
            expect(await (await request("/")).text()).toBe("<h1>Home</h1>\n");

            const viaDir = await (await request("/docs/")).text();
            const direct = await (await request("/docs/index.md")).text();
            expect(viaDir).toBe(direct);
            expect(viaDir).toContain("<h1>Docs</h1>");
        });

        it("serves page.md in place of page.html when both exist", async () => {
            const res = await request("/docs/guide.html");
            expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
            expect(await res.text()).toBe("<h1>Guide</h1>\n");
        });

        it("falls back to static serving for binary .md files", async () => {
            const res = await request("/blob.md");
            expect(res.status).toBe(200);
            expect(res.headers.get("accept-ranges")).toBe("bytes");
            expect(new Uint8Array(await res.arrayBuffer())).toEqual(new Uint8Array([0x00, 0x01, 0x02, 0x03]));
        });
    });

    describe("html and static files", () => {
        it("serves .html files raw", async () => {
            const res = await request("/plain.html");
            expect(res.headers.get("content-type")).toBe("text/html");
            expect(await res.text()).toBe("just words, served as html\n");
        });

        it("serves HTML-looking content raw whatever its extension", async () => {
            const res = await request("/notes.txt");
            expect(res.headers.get("content-type")).toBe("text/html");
            expect(await res.text()).toBe("<html><body>sniffed</body></html>\n");
        });

        it("serves other files with an extension-derived type", async () => {
            const res = await request("/logo.png");
            expect(res.status).toBe(200);
            expect(res.headers.get("content-type")).toBe("image/png");
            expect(res.headers.get("content-length")).toBe(String(PNG.length));
        });

        it("honours range requests on static files", async () => {
            const res = await request("/logo.png", { headers: { Range: "bytes=1-3" } });
            expect(res.status).toBe(206);
            expect(res.headers.get("content-range")).toBe(`bytes 1-3/${PNG.length}`);
            expect(await res.text()).toBe("PNG");
        });
    });

    describe("rejections", () => {
        it("answers every non-GET method exactly like a missing file", async () => {
            const missing = await request("/nope.md");
            const missingBody = await missing.text();

            for (const method of ["POST", "PUT", "DELETE", "HEAD", "OPTIONS"]) {
                const res = await request("/doc.md", { method });
                expect(res.status).toBe(missing.status);
                expect(res.headers.get("content-type")).toBe(missing.headers.get("content-type"));
                if (method !== "HEAD") expect(await res.text()).toBe(missingBody);
            }
        });

        it("rejects encoded traversal before touching the disk", async () => {
            await expectNotFound(await request("/..%2foutside/secret.txt"));
            expect(logger.lines().some((line) => line.endsWith(" bad path (traversal): /../outside/secret.txt"))).toBe(true);
        });

        it("rejects plain dot-segment traversal as it arrived on the request line", async () => {
            const before = logger.records.length;
            const wire = { incoming: { url: "/docs/../doc.md" } };
            await expectNotFound(await request("/doc.md", undefined, wire));

            const lines = logger.lines().slice(before);
            expect(lines).toHaveLength(2);
            expect(lines[0]).toMatch(/ bad path \(traversal\): \/docs\/\.\.\/doc\.md$/);
            expect(lines[1]).toMatch(/ closed after \d+ms$/);
        });

        it("takes the query from the request line as well", async () => {
            const res = await request("/doc.md", undefined, { incoming: { url: "/doc.md?raw=1" } });
            expect(await res.text()).toBe("# Hello\n\nbody text\n");
        });

        it("rejects a symlink that escapes the root even though its target is readable", async () => {
            await expectNotFound(await request("/escape.txt"));
            const escaped = `${site.config.rootPath}escape.txt`;
            expect(logger.lines().some((line) => line.endsWith(` symlink or unresolvable path: ${escaped}`))).toBe(true);
        });

        it("rejects symlinks that stay inside the root", async () => {
            await expectNotFound(await request("/alias.md"));
        });

        it("rejects files reached through a linked directory", async () => {
            await expectNotFound(await request("/linked/secret.md"));
        });

        it("rejects missing files and directories without a trailing slash", async () => {
            await expectNotFound(await request("/missing.md"));
            await expectNotFound(await request("/docs"));
        });

        it("rejects malformed percent-encoding", async () => {
            await expectNotFound(await request("/%E0%A4%A"));
        });
    });

    describe("headers and logging", () => {
        it("sets the server and anti-framing headers on success and on errors", async () => {
            for (const path of ["/doc.md", "/missing.md", "/logo.png"]) {
                const res = await request(path);
                expect(res.headers.get("server")).toBe(SERVER_HEADER);
                expect(res.headers.get("x-frame-options")).toBe("DENY");
                expect(res.headers.get("connection")).toBe("close");
            }
        });

        it("logs the branch and the latency under one request id", async () => {
            const before = logger.records.length;
            await request("/doc.md");
            const lines = logger.lines().slice(before);

            const id = lines[0]?.split(" ")[0] ?? "";
            expect(id).toMatch(/^[0-9a-f-]{36}$/);
            expect(lines).toEqual([
                `${id} GET /doc.md -> ${site.config.rootPath}doc.md`,
                `${id} serving markdown: ${site.config.rootPath}doc.md`,
                expect.stringMatching(new RegExp(`^${id} closed after \\d+ms$`)),
            ]);
        });

        it("logs latency for rejected requests too", async () => {
            const before = logger.records.length;
            await request("/doc.md", { method: "POST" });
            const lines = logger.lines().slice(before);
            expect(lines).toHaveLength(2);
            expect(lines[0]).toMatch(/ bad method: POST \/doc\.md -$/);
            expect(lines[1]).toMatch(/ closed after \d+ms$/);
        });
    });

    it("keeps concurrent requests independent", async () => {
        const paths = ["/doc.md", "/docs/guide.html", "/", "/plain.html", "/missing.md", "/docs/"];
        const bodies = await Promise.all(paths.map(async (path) => (await request(path)).text()));
        expect(bodies).toEqual([
            "<h1>Hello</h1>\n<p>body text</p>\n",
            "<h1>Guide</h1>\n",
            "<h1>Home</h1>\n",
            "just words, served as html\n",
            NOT_FOUND_BODY,
            await (await request("/docs/index.md")).text(),
        ]);
    });
});

describe("site pipeline with collaborators swapped", () => {
    let site: SiteFixture;

    beforeAll(async () => {
        site = await createSiteFixture(
            {
                "home.md": "# Home\n",
                "docs/home.md": "# Docs home\n",
                "docs/index.md": "# Docs index\n",
                "boom.md": "# Boom\n",
            },
            "home.md",
        );
    });

    afterAll(() => {
        site.cleanup();
    });

    it("uses the configured index name for / and index.md for directories", async () => {
        const app = createApp({ config: site.config, logger: createMemoryLogger() });
        expect(await (await app.request("/")).text()).toBe("<h1>Home</h1>\n");
        expect(await (await app.request("/docs/")).text()).toBe("<h1>Docs index</h1>\n");
    });

    it("hands the file bytes to the injected renderer", async () => {
        const app = createApp({ config: site.config, logger: createMemoryLogger(), render: () => "<p>stub</p>" });
        expect(await (await app.request("/docs/home.md")).text()).toBe("<p>stub</p>");
    });

    it("turns a failing renderer into the uniform 404 and logs it", async () => {
        const logger = createMemoryLogger();
        const app = createApp({
            config: site.config,
            logger,
            render: () => {
                throw new Error("renderer exploded");
            },
        });

        const res = await app.request("/boom.md");
        expect(res.status).toBe(404);
        expect(await res.text()).toBe(NOT_FOUND_BODY);
        expect(res.headers.get("x-frame-options")).toBe("DENY");
        expect(logger.records.some((r) => r.level === "ERROR" && r.message.includes("renderer exploded"))).toBe(true);
    });
});
