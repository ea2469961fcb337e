/**
 * Language directory layout check.
 *
 * Old layout: resources/language/English
 * New layout: resources/language/resource.language.en_gb
 *
 * Which one is right depends on the branch the addon targets.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { relativePath } from '../paths.js';
import { createFinding, type Report } from '../report.js';

const NEW_STRUCTURE_MARKER = 'resource.language.';

export function checkForNewLanguageDirectoryStructure(
    report: Report,
    addonPath: string,
    newStructureSupported = true
): void {
    const languagePath = path.join(addonPath, 'resources', 'language');

    let directories: string[];
    try {
        directories = fs.readdirSync(languagePath, { withFileTypes: true })
            .filter(entry => entry.isDirectory() ||
                (entry.isSymbolicLink() && isDirectory(path.join(languagePath, entry.name))))
            .map(entry => entry.name)
            .sort((a, b) => a.localeCompare(b));
    } catch {
        // No language directory: nothing to check
        return;
    }

    for (const directory of directories) {
        const usesNewStructure = directory.includes(NEW_STRUCTURE_MARKER);
        const display = relativePath(addonPath, path.join(languagePath, directory));

        if (!usesNewStructure && newStructureSupported) {
            report.add(createFinding(
                'problem',
                `Using the old language directory structure in ${display}, please move to the new one.`,
                'language-directory',
                display
            ));
        } else if (usesNewStructure && !newStructureSupported) {
            report.add(createFinding(
                'problem',
                `Using the new language directory structure in ${display} for a target version that ` +
                'does not support it. Please use the old language file structure or move the addon ' +
                'to a newer branch.',
                'language-directory',
                display
            ));
        }
    }
}

function isDirectory(target: string): boolean {
    try {
        return fs.statSync(target).isDirectory();
    } catch {
        return false;
    }
}
