import { existsSync } from "node:fs";
import path from "node:path";

type SearchPlan = {
    fileName: string;
    directories: readonly string[];
    join: (...parts: string[]) => string;
};

const SEARCH_PLANS: Partial<Record<NodeJS.Platform, SearchPlan>> = {
    linux: {
        fileName: "libvlc.so.5",
        directories: [
            "/usr/lib/x86_64-linux-gnu",
            "/usr/lib/aarch64-linux-gnu",
            "/usr/lib64",
            "/usr/lib",
            "/usr/local/lib",
            "/snap/vlc/current/usr/lib",
        ],
        join: path.posix.join,
    },
    darwin: {
        fileName: "libvlc.dylib",
        directories: ["/Applications/VLC.app/Contents/MacOS/lib", "/opt/homebrew/lib", "/usr/local/lib"],
        join: path.posix.join,
    },
    win32: {
        fileName: "libvlc.dll",
        directories: ["C:\\Program Files\\VideoLAN\\VLC", "C:\\Program Files (x86)\\VideoLAN\\VLC"],
        join: path.win32.join,
    },
};

const FALLBACK_PLAN: SearchPlan = { fileName: "libvlc.so", directories: [], join: path.posix.join };

export type LocateOptions = {
    platform?: NodeJS.Platform;
    exists?: (candidate: string) => boolean;
};

/** Every path tried for `platform`, most specific first. */
export function candidatePaths(platform: NodeJS.Platform): string[] {
    const plan = SEARCH_PLANS[platform] ?? FALLBACK_PLAN;
    return plan.directories.map((dir) => plan.join(dir, plan.fileName));
}

/**
 * Resolve which native library file to load.
 *
 * An explicit `libraryPath` wins and is returned unchecked. Otherwise the
 * first well-known install location that exists is used; when none does,
 * the bare file name is returned for the system loader to resolve.
 */
export function locateLibrary(libraryPath: string | null, options: LocateOptions = {}): string {
    if (libraryPath !== null) return libraryPath;

    const platform = options.platform ?? process.platform;
    const exists = options.exists ?? existsSync;
    const found = candidatePaths(platform).find((candidate) => exists(candidate));
    return found ?? (SEARCH_PLANS[platform] ?? FALLBACK_PLAN).fileName;
}
