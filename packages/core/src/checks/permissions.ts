import * as fs from 'node:fs';
import * as path from 'node:path';
import { relativePath } from '../paths.js';
import { createFinding, type Report } from '../report.js';
import type { FileEntry } from '../types.js';

/**
 * Whether this platform has an execute permission bit at all.
 * Resolved once at startup; Windows has none.
 */
export const EXECUTE_BIT_SUPPORTED = process.platform !== 'win32';

/**
 * Report files the current process could execute.
 *
 * Addons must not ship stand-alone executables. On platforms without an
 * execute bit the check does nothing. Permissions are never changed.
 */
export function checkFilePermission(
    report: Report,
    fileIndex: readonly FileEntry[],
    addonPath: string,
    executeBitSupported: boolean = EXECUTE_BIT_SUPPORTED
): void {
    if (!executeBitSupported) {
        return;
    }

    for (const file of fileIndex) {
        const filePath = path.join(file.path, file.name);
        if (isExecutableFile(filePath)) {
            const display = relativePath(addonPath, filePath);
            report.add(createFinding(
                'problem',
                `${display} is marked as stand-alone executable`,
                'executable-file',
                display
            ));
        }
    }
}

function isExecutableFile(filePath: string): boolean {
    try {
        if (!fs.statSync(filePath).isFile()) {
            return false;
        }
        fs.accessSync(filePath, fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}
