import { realpath } from "fs/promises";

/**
 * True only when `path` is already its own real path, i.e. no component of
 * it is a symlink. Broken links and permission errors are unsafe too.
 * Re-checked on every request.
 */
export async function isSafePath(path: string): Promise<boolean> {
    if (path === "") return false;
    try {
        return (await realpath(path)) === path;
    } catch {
        return false;
    }
}
