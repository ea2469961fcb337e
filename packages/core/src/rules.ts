/**
 * Rule table.
 *
 * Every finding carries one of these IDs so reporters can group findings
 * and SARIF consumers can filter or suppress them.
 */

export const RULES = {
    'invalid-xml': { name: 'Invalid XML' },
    'invalid-json': { name: 'Invalid JSON' },
    'addon-xml': { name: 'Addon Metadata' },
    'folder-id': { name: 'Folder Name Matches Id' },
    'language-directory': { name: 'Language Directory Structure' },
    'file-whitelist': { name: 'File Extension Whitelist' },
    'executable-file': { name: 'Executable File' },
    'check-error': { name: 'Check Error' },
} as const satisfies Record<string, { name: string }>;

export type RuleId = keyof typeof RULES;

export function ruleName(ruleId: RuleId): string {
    return RULES[ruleId].name;
}
