/**
 * The report sink shared by the checks of one validation pass.
 */

import type { Finding, Severity } from './types.js';
import type { RuleId } from './rules.js';

/**
 * Build a frozen finding.
 */
export function createFinding(
    severity: Severity,
    message: string,
    ruleId: RuleId,
    path?: string
): Finding {
    const finding: Finding = path === undefined
        ? { severity, message, ruleId }
        : { severity, message, ruleId, path };
    return Object.freeze(finding);
}

/**
 * Ordered, append-only collection of findings for one addon.
 *
 * Order is the order in which checks ran and, within a check, the order of
 * the file index. Nothing is sorted or deduplicated; a new Report is created
 * for every addon so reports are never shared between addons.
 */
export class Report {
    private readonly entries: Finding[] = [];

    add(finding: Finding): void {
        this.entries.push(finding);
    }

    get findings(): readonly Finding[] {
        return this.entries;
    }

    get size(): number {
        return this.entries.length;
    }

    bySeverity(severity: Severity): Finding[] {
        return this.entries.filter(f => f.severity === severity);
    }

    count(severity: Severity): number {
        return this.bySeverity(severity).length;
    }

    hasProblems(): boolean {
        return this.entries.some(f => f.severity === 'problem');
    }
}
