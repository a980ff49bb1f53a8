/**
 * helpers.ts: temp site trees for pipeline tests
 */

import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { loadServerConfig, type ServerConfig } from "../config.js";

export interface SiteFixture {
    /** Served directory, as given to the config (no trailing slash). */
    root: string;
    /** Sibling of root that must never be served. */
    outside: string;
    config: ServerConfig;
    cleanup(): void;
}

export type FixtureFiles = Record<string, string | Uint8Array>;

export function writeTree(base: string, files: FixtureFiles): void {
    for (const [relative, content] of Object.entries(files)) {
        const target = join(base, relative);
        mkdirSync(dirname(target), { recursive: true });
        writeFileSync(target, content);
    }
}

export function link(target: string, at: string): void {
    mkdirSync(dirname(at), { recursive: true });
    symlinkSync(target, at);
}

export async function createSiteFixture(files: FixtureFiles, indexName = "index.md"): Promise<SiteFixture> {
    const base = mkdtempSync(join(tmpdir(), "mdserve-test-"));
    const root = join(base, "site");
    const outside = join(base, "outside");
    mkdirSync(root, { recursive: true });
    writeTree(root, files);
    writeTree(outside, { "secret.txt": "top secret\n", "secret.md": "# Secret\n" });

    const config = await loadServerConfig({ directory: root, listen: ":0", logFile: null, indexName });

    return {
        root,
        outside,
        config,
        cleanup: () => rmSync(base, { recursive: true, force: true }),
    };
}

export function makeTempDir(prefix = "mdserve-test-"): string {
    return mkdtempSync(join(tmpdir(), prefix));
}
