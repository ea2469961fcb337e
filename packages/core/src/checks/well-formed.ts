/**
 * Well-formedness checks for the XML and JSON files shipped in an addon.
 *
 * Both checks only ask whether the file parses; what the content means is
 * left to the checks that care about a specific file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { relativePath } from '../paths.js';
import { createFinding, type Report } from '../report.js';
import type { FileEntry } from '../types.js';
import { readXmlRoot } from '../xml.js';

/**
 * Report every XML file in the index that is not well-formed.
 *
 * Files are selected by a ".xml" substring in the name, so "strings.xml.in"
 * is checked as well. A file that cannot be read counts as invalid.
 */
export function checkForInvalidXmlFiles(
    report: Report,
    fileIndex: readonly FileEntry[],
    addonPath: string
): void {
    for (const file of fileIndex) {
        if (!file.name.includes('.xml')) {
            continue;
        }

        const xmlPath = path.join(file.path, file.name);
        if (!isWellFormedXml(xmlPath)) {
            const display = relativePath(addonPath, xmlPath);
            report.add(createFinding('problem', `Invalid xml found. ${display}`, 'invalid-xml', display));
        }
    }
}

/**
 * Report every JSON file in the index that does not parse.
 * Empty files are invalid JSON, and so is content that is not valid UTF-8.
 */
export function checkForInvalidJsonFiles(
    report: Report,
    fileIndex: readonly FileEntry[],
    addonPath: string
): void {
    for (const file of fileIndex) {
        if (!file.name.includes('.json')) {
            continue;
        }

        const jsonPath = path.join(file.path, file.name);
        try {
            JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(fs.readFileSync(jsonPath)));
        } catch {
            const display = relativePath(addonPath, jsonPath);
            report.add(createFinding('problem', `Invalid json found. ${display}`, 'invalid-json', display));
        }
    }
}

function isWellFormedXml(filePath: string): boolean {
    try {
        readXmlRoot(fs.readFileSync(filePath));
        return true;
    } catch {
        return false;
    }
}
