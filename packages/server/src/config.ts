/**
 * config.ts: command line parsing and the immutable ServerConfig
 *
 * Everything here runs once at startup. The resulting config is frozen and
 * passed explicitly into the app; nothing reads flags after this point.
 */

import { realpath, stat } from "fs/promises";
import { z } from "zod";
import { PRODUCT } from "./version.js";

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/** Exit status for every startup-fatal error. */
export const EXIT_STARTUP_FAILURE = 111;

export const USAGE = `
USAGE

${PRODUCT} [flags] [directory]

FLAGS

  --http <addr>    address to listen on (default ":8080")
  --log <file>     append logs to this file (default: stderr)
  --index <name>   page to use for paths ending in '/' (default "index.md")
  --help           show this message

EXAMPLES

Serve current directory on port 8080, log to stderr
  ${PRODUCT} --http 127.0.0.1:8080 .

Serve 'docs' directory on port 8081, log to 'md.log'
  ${PRODUCT} --log md.log --http :8081 docs`;

export interface ListenAddress {
    /** Empty string means every interface. */
    host: string;
    port: number;
}

export interface ServerConfig {
    /** Absolute real path of the served directory, always ending in "/". */
    readonly rootPath: string;
    readonly indexName: string;
    readonly listen: Readonly<ListenAddress>;
    /** null logs to stderr. */
    readonly logFile: string | null;
}

export interface CliArgs {
    listen: string;
    logFile: string | null;
    indexName: string;
    directory: string;
}

export type ParsedArgs = { help: true } | ({ help: false } & CliArgs);

// ─── CLI argument parsing ──────────────────────────────────────────────────

const VALUE_FLAGS = new Set(["http", "log", "index"]);

/** Accepts `--flag value`, `--flag=value` and the single-dash forms. */
export function parseArgs(argv: string[]): ParsedArgs {
    const values: Record<string, string> = {};
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === undefined) continue;

        const flag = /^--?([a-z]+)(?:=(.*))?$/.exec(arg);
        if (!flag) {
            positional.push(arg);
            continue;
        }

        const name = flag[1] ?? "";
        if (name === "help" || name === "h") return { help: true };
        if (!VALUE_FLAGS.has(name)) throw new UsageError(`unknown flag: ${arg}`);

        const value = flag[2] ?? argv[i + 1];
        if (value === undefined) throw new UsageError(`flag needs a value: ${arg}`);
        if (flag[2] === undefined) i++;
        values[name] = value;
    }

    if (positional.length !== 1) {
        throw new UsageError(
            positional.length === 0 ? "missing directory argument" : "expected exactly one directory argument",
        );
    }

    return {
        help: false,
        listen: values.http ?? ":8080",
        logFile: values.log ?? null,
        indexName: values.index ?? "index.md",
        directory: positional[0] ?? "",
    };
}

// ─── Validation ────────────────────────────────────────────────────────────

const ListenSchema = z.string().transform((value, ctx): ListenAddress => {
    const match = /^(?:\[([^\]]+)\]|([^:\s]*)):(\d{1,5})$/.exec(value);
    const port = match ? Number(match[3]) : NaN;
    if (!match || port > 65535) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `invalid listen address "${value}" (expected host:port)`,
        });
        return z.NEVER;
    }
    return { host: match[1] ?? match[2] ?? "", port };
});

const IndexNameSchema = z
    .string()
    .min(1, "index name must not be empty")
    .refine((name) => !name.includes("/") && name !== "." && name !== "..", {
        message: "index name must be a plain file name",
    });

const CliArgsSchema = z.object({
    listen: ListenSchema,
    logFile: z.string().min(1).nullable(),
    indexName: IndexNameSchema,
    directory: z.string().min(1, "directory must not be empty"),
});

/**
 * Validate CLI args and canonicalise the served directory. The root is
 * stored as its real path so that the per-request symlink comparison holds
 * even when the directory was named through a symlink.
 */
export async function loadServerConfig(args: CliArgs): Promise<ServerConfig> {
    const parsed = CliArgsSchema.safeParse(args);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join("; "));
    }

    const { listen, logFile, indexName, directory } = parsed.data;
    const rootPath = await prepareDirectory(directory);

    return Object.freeze({
        rootPath,
        indexName,
        listen: Object.freeze(listen),
        logFile,
    });
}

export async function prepareDirectory(dir: string): Promise<string> {
    let real: string;
    try {
        real = await realpath(dir);
    } catch (err) {
        throw new ConfigError(`cannot resolve directory ${dir}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const info = await stat(real);
    if (!info.isDirectory()) throw new ConfigError(`not a directory: ${dir}`);

    return real.endsWith("/") ? real : `${real}/`;
}
