import os from "os";
import path from "path";
import sfs from "fs";

export const HISTORY_FILE = "__brunch.last";

interface HistoryConfig {
    /** Set when `NO_BRUNCH_HISTORY=1`; nothing is loaded or saved. */
    disabled: boolean;
    path: string;
}

/**
 * Resolve where run-to-run history lives.
 *
 * `BRUNCH_HISTORY` overrides the default `<tmpdir>/__brunch.last`; when it
 * names an existing directory the default file name is used inside it.
 */
function readHistoryConfig(env: NodeJS.ProcessEnv = process.env): HistoryConfig {
    const disabled = env.NO_BRUNCH_HISTORY === "1";
    const override = env.BRUNCH_HISTORY?.trim() ?? "";

    if (override === "") {
        return { disabled, path: path.join(os.tmpdir(), HISTORY_FILE) };
    }

    const resolved = path.resolve(override);
    if (sfs.existsSync(resolved) && sfs.statSync(resolved).isDirectory()) {
        return { disabled, path: path.join(resolved, HISTORY_FILE) };
    }

    return { disabled, path: resolved };
}

export { readHistoryConfig };
export type { HistoryConfig };
