/**
 * File extension whitelist.
 *
 * Packages are reviewed by hand; anything outside this list (binaries,
 * archives, unknown scripts) gets a warning so a reviewer looks at it.
 */

import * as path from 'node:path';
import { getDebugLogPath, getReporterLogPath, relativePath } from '../paths.js';
import { createFinding, type Report } from '../report.js';
import type { FileEntry } from '../types.js';

export const WHITELISTED_EXTENSIONS = [
    'py', 'xml', 'gif', 'png', 'jpg', 'jpeg', 'md', 'txt', 'po', 'json',
    'gitignore', 'markdown', 'yml', 'rst', 'ini', 'flv', 'wav', 'mp4', 'html',
    'css', 'lst', 'pkla', 'g', 'template', 'in', 'cfg', 'xsd', 'directory',
    'help', 'list', 'mpeg', 'pls', 'info', 'ttf', 'xsp', 'theme', 'yaml',
    'dict', 'crt', 'ico',
] as const;

// The group is optional: an ending of just "." (name ends in a dot) passes
const WHITELIST_PATTERN = new RegExp(`^\\.?(${WHITELISTED_EXTENSIONS.join('|')})?$`, 'i');

export interface WhitelistOptions {
    /** The debug log is being written and must not be flagged */
    debugLogEnabled?: boolean;

    /** The reporter log is being written and must not be flagged */
    reporterLogEnabled?: boolean;

    /** Defaults to getDebugLogPath() */
    debugLogPath?: string;

    /** Defaults to getReporterLogPath() */
    reporterLogPath?: string;
}

/**
 * Whether a file name passes the whitelist.
 *
 * Only the text after the last dot counts ("a.b.xml" is an xml file).
 * Names without a dot have no extension and always pass.
 */
export function isWhitelisted(fileName: string): boolean {
    const dot = fileName.lastIndexOf('.');
    if (dot === -1) {
        return true;
    }
    return WHITELIST_PATTERN.test(fileName.slice(dot));
}

export function checkFileWhitelist(
    report: Report,
    fileIndex: readonly FileEntry[],
    addonPath: string,
    options: WhitelistOptions = {}
): void {
    if (path.basename(path.resolve(addonPath)).includes('.module.')) {
        report.add(createFinding('information', 'Module skipping whitelist', 'file-whitelist'));
        return;
    }

    const filesToIgnore: string[] = [];
    if (options.debugLogEnabled) {
        filesToIgnore.push(options.debugLogPath ?? getDebugLogPath());
    }
    if (options.reporterLogEnabled) {
        filesToIgnore.push(options.reporterLogPath ?? getReporterLogPath());
    }

    for (const file of fileIndex) {
        const filePath = path.join(file.path, file.name);
        if (filesToIgnore.includes(filePath) || isWhitelisted(file.name)) {
            continue;
        }

        const display = relativePath(addonPath, filePath);
        report.add(createFinding(
            'warning',
            `Found non whitelisted file ending in filename ${display}`,
            'file-whitelist',
            display
        ));
    }
}
