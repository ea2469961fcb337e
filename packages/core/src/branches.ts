/**
 * Target releases an addon can be submitted for, oldest first.
 *
 * The branch decides which conventions apply; for now only the language
 * directory layout depends on it.
 */

import { ConfigError } from './errors.js';

export const BRANCHES = [
    'gotham',
    'helix',
    'isengard',
    'jarvis',
    'krypton',
    'leia',
    'matrix',
    'nexus',
    'omega',
] as const;

export type Branch = (typeof BRANCHES)[number];

export const LATEST_BRANCH: Branch = 'omega';

/** First branch whose language directories are named resource.language.<code>. */
const NEW_LANGUAGE_STRUCTURE_SINCE: Branch = 'isengard';

export function isBranch(value: string): value is Branch {
    return BRANCHES.some(branch => branch === value);
}

/**
 * Parse a branch name, case-insensitively.
 *
 * @throws ConfigError for names that are not in BRANCHES
 */
export function parseBranch(value: string): Branch {
    const normalized = value.trim().toLowerCase();
    if (!isBranch(normalized)) {
        throw new ConfigError(
            `Unknown branch "${value}". Expected one of: ${BRANCHES.join(', ')}`
        );
    }
    return normalized;
}

export function supportsNewLanguageStructure(branch: Branch): boolean {
    return BRANCHES.indexOf(branch) >= BRANCHES.indexOf(NEW_LANGUAGE_STRUCTURE_SINCE);
}
