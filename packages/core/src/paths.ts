import * as path from 'node:path';

/** File name of the debug log written by the command-line interface. */
export const DEBUG_LOG_FILE = 'addon-lint.log';

/** File name of the report written by the `log` reporter. */
export const REPORTER_LOG_FILE = 'addon-lint-report.log';

/**
 * Display path of `target` relative to the addon root, with forward slashes
 * on every platform.
 */
export function relativePath(addonPath: string, target: string): string {
    return path.relative(addonPath, target).split(path.sep).join('/');
}

export function getDebugLogPath(): string {
    return path.join(process.cwd(), DEBUG_LOG_FILE);
}

export function getReporterLogPath(): string {
    return path.join(process.cwd(), REPORTER_LOG_FILE);
}
