/**
 * File index construction.
 *
 * The index is the list every file-level check walks. It is built once per
 * addon so all checks see the same files in the same order.
 */

import fastGlob from 'fast-glob';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileEntry } from './types.js';

/**
 * List every file under the addon root.
 *
 * Dot files are included (.gitignore is part of what gets reviewed), the
 * .git directory is not. Symbolic links are listed where they stand unless
 * they point at a directory, and are never descended into; the checks
 * follow them when they read or stat the file. Entries are sorted by their
 * path relative to the addon root so the report order does not depend on
 * the file system.
 *
 * @param addonPath - Absolute path to the addon root
 */
export function createFileIndex(addonPath: string): FileEntry[] {
    const entries = fastGlob.sync('**/*', {
        cwd: addonPath,
        dot: true,
        onlyFiles: false,
        objectMode: true,
        followSymbolicLinks: false,
        ignore: ['**/.git/**'],
    });

    const files = entries
        .filter(entry => isFileEntry(addonPath, entry))
        .map(entry => entry.path)
        .sort((a, b) => a.localeCompare(b));

    return files.map(relative => {
        const absolute = path.join(addonPath, relative);
        return {
            name: path.basename(absolute),
            path: path.dirname(absolute),
        };
    });
}

function isFileEntry(addonPath: string, entry: fastGlob.Entry): boolean {
    if (entry.dirent.isDirectory()) {
        return false;
    }
    if (!entry.dirent.isSymbolicLink()) {
        return true;
    }
    try {
        return !fs.statSync(path.join(addonPath, entry.path)).isDirectory();
    } catch {
        // Dangling link: still a file entry
        return true;
    }
}
