/**
 * Output formats for lint results.
 */

import chalk, { Chalk } from 'chalk';
import type { LintResult, Severity } from '@addon-lint/core';

/** Reporters selectable with --reporter. */
export const REPORTERS = ['console', 'json', 'log'] as const;

export type ReporterName = (typeof REPORTERS)[number];

const SEVERITY_LABELS: Record<Severity, string> = {
    problem: 'PROBLEM',
    warning: 'WARNING',
    information: 'INFO',
};

/**
 * Format findings in human-readable form, grouped by addon.
 *
 * @param useColor - Colour the output with chalk; the log reporter never does
 */
export function formatText(result: LintResult, useColor: boolean): string {
    const c = useColor ? chalk : new Chalk({ level: 0 });
    const severityColor: Record<Severity, (text: string) => string> = {
        problem: c.red,
        warning: c.yellow,
        information: c.blue,
    };

    const lines: string[] = [];
    for (const addon of result.addons) {
        lines.push(c.underline(addon.displayPath));

        if (addon.findings.length === 0) {
            lines.push(`  ${c.green('No findings')}`);
        }

        for (const finding of addon.findings) {
            const label = SEVERITY_LABELS[finding.severity].padEnd(8);
            lines.push(`  ${severityColor[finding.severity](label)} ${finding.message} ${c.dim(`[${finding.ruleId}]`)}`);
        }

        lines.push('');
    }

    return lines.join('\n');
}

/**
 * Format the whole result as pretty-printed JSON.
 */
export function formatJson(result: LintResult): string {
    return JSON.stringify(result, null, 2);
}

/**
 * One-line summary of a run.
 */
export function formatSummary(result: LintResult): string {
    const { problems, warnings, information, addonsChecked } = result.summary;
    return `Found ${problems} problems, ${warnings} warnings, ${information} information in ${addonsChecked} addon(s)`;
}
