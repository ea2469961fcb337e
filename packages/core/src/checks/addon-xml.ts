/**
 * addon.xml consistency checks.
 */

import * as path from 'node:path';
import { MetadataError } from '../errors.js';
import { ADDON_XML, addonFileExists, loadAddonMetadata, type AddonMetadata } from '../metadata.js';
import { createFinding, type Report } from '../report.js';

/**
 * Check that addon.xml exists and parses, say who created the addon, and
 * compare the declared id with the folder name.
 *
 * Pass the already parsed metadata, or null to have it loaded here. A missing
 * file, a failed parse or any error while handling the metadata ends in the
 * same single problem, and folder matching is skipped.
 *
 * @returns the metadata that was checked, or null
 */
export function checkAddonXml(
    report: Report,
    addonPath: string,
    metadata: AddonMetadata | null,
    allowFolderIdMismatch: boolean
): AddonMetadata | null {
    try {
        if (!addonFileExists(addonPath, ADDON_XML)) {
            throw new MetadataError(`${ADDON_XML} not found in ${addonPath}`);
        }
        const parsed = metadata ?? loadAddonMetadata(addonPath);

        report.add(createFinding(
            'information',
            `Created by ${parsed.providerName ?? 'unknown'}`,
            'addon-xml',
            ADDON_XML
        ));
        addonXmlMatchesFolder(report, addonPath, parsed, allowFolderIdMismatch);
        return parsed;
    } catch {
        report.add(createFinding(
            'problem',
            `Addon xml not valid, check xml. ${ADDON_XML}`,
            'addon-xml',
            ADDON_XML
        ));
        return null;
    }
}

/**
 * Compare the addon id with the name of the directory holding the addon.
 *
 * A mismatch is a problem unless `allowFolderIdMismatch` is set, in which
 * case it is reported as information with the folder name to use.
 */
export function addonXmlMatchesFolder(
    report: Report,
    addonPath: string,
    metadata: AddonMetadata,
    allowFolderIdMismatch: boolean
): void {
    const addonId = metadata.id;
    // resolve() drops trailing separators, so "plugin.foo/" names plugin.foo
    const folderName = path.basename(path.resolve(addonPath));

    if (folderName === addonId) {
        report.add(createFinding('information', 'Addon id matches folder name', 'folder-id'));
    } else if (allowFolderIdMismatch) {
        report.add(createFinding(
            'information',
            'Addon id and folder name does not match. ' +
            `Ensure folder name is ${addonId ?? '<missing id>'} when submitting a PR ` +
            'to the official repository.',
            'folder-id'
        ));
    } else {
        report.add(createFinding('problem', 'Addon id and folder name does not match.', 'folder-id'));
    }
}
