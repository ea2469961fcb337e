/**
 * Built-in checks, wrapped for the orchestrator.
 *
 * Each wrapper pulls what its check needs out of the shared context; the
 * check functions themselves stay callable on their own.
 */

import { LATEST_BRANCH, parseBranch, supportsNewLanguageStructure } from '../branches.js';
import type { AddonCheck } from '../types.js';
import { checkAddonXml } from './addon-xml.js';
import { checkForNewLanguageDirectoryStructure } from './language-directory.js';
import { checkFilePermission } from './permissions.js';
import { checkForInvalidJsonFiles, checkForInvalidXmlFiles } from './well-formed.js';
import { checkFileWhitelist } from './whitelist.js';

export { checkAddonXml, addonXmlMatchesFolder } from './addon-xml.js';
export { checkForNewLanguageDirectoryStructure } from './language-directory.js';
export { checkFilePermission, EXECUTE_BIT_SUPPORTED } from './permissions.js';
export { checkForInvalidJsonFiles, checkForInvalidXmlFiles } from './well-formed.js';
export {
    checkFileWhitelist,
    isWhitelisted,
    WHITELISTED_EXTENSIONS,
    type WhitelistOptions,
} from './whitelist.js';

/**
 * The built-in checks in execution order.
 */
export function createDefaultChecks(): AddonCheck[] {
    return [
        {
            name: 'addon-xml',
            description: 'addon.xml exists, parses and its id matches the folder name',
            run: ({ report, addonPath, metadata, config }) => {
                checkAddonXml(report, addonPath, metadata, config.allowFolderIdMismatch ?? false);
            },
        },
        {
            name: 'invalid-xml',
            description: 'XML files are well-formed',
            run: ({ report, fileIndex, addonPath }) => {
                checkForInvalidXmlFiles(report, fileIndex, addonPath);
            },
        },
        {
            name: 'invalid-json',
            description: 'JSON files parse',
            run: ({ report, fileIndex, addonPath }) => {
                checkForInvalidJsonFiles(report, fileIndex, addonPath);
            },
        },
        {
            name: 'language-directory',
            description: 'Language directories follow the layout of the target branch',
            run: ({ report, addonPath, config }) => {
                const branch = config.branch === undefined ? LATEST_BRANCH : parseBranch(config.branch);
                checkForNewLanguageDirectoryStructure(report, addonPath, supportsNewLanguageStructure(branch));
            },
        },
        {
            name: 'file-whitelist',
            description: 'File extensions are on the whitelist',
            run: ({ report, fileIndex, addonPath, config }) => {
                checkFileWhitelist(report, fileIndex, addonPath, {
                    debugLogEnabled: config.debugLogEnabled,
                    reporterLogEnabled: config.reporterLogEnabled,
                });
            },
        },
        {
            name: 'executable-file',
            description: 'No file is marked executable',
            run: ({ report, fileIndex, addonPath }) => {
                checkFilePermission(report, fileIndex, addonPath);
            },
        },
    ];
}
