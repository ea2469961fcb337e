/**
 * SARIF 2.1.0 output for addon-lint.
 *
 * One run per lint pass. Each finding becomes a result located at the file
 * it names inside the addon (or at the addon folder itself), with URIs
 * relative to the source root so code scanning can place them in the
 * repository. Rules are taken from the rule table for the ids that occur.
 *
 * Format reference: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
 */

import { createHash } from 'node:crypto';
import {
    RULES,
    SEVERITIES,
    ruleName,
    type AddonResult,
    type Finding,
    type LintResult,
    type RuleId,
    type Severity,
} from '@addon-lint/core';

const SARIF_SCHEMA = 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/main/sarif-2.1/schema/sarif-schema-2.1.0.json';

type SarifLevel = 'error' | 'warning' | 'note';

const LEVELS = {
    problem: 'error',
    warning: 'warning',
    information: 'note',
} as const satisfies Record<Severity, SarifLevel>;

// Only the properties written below
interface SarifLog {
    $schema: string;
    version: '2.1.0';
    runs: [SarifRun];
}

interface SarifRun {
    tool: { driver: SarifDriver };
    invocations: { executionSuccessful: boolean; startTimeUtc: string }[];
    results: SarifResult[];
}

interface SarifDriver {
    name: string;
    version: string;
    informationUri?: string;
    rules: SarifRuleDescriptor[];
}

interface SarifRuleDescriptor {
    id: RuleId;
    name: string;
    shortDescription: { text: string };
    defaultConfiguration: { level: SarifLevel };
}

interface SarifResult {
    ruleId: RuleId;
    ruleIndex: number;
    level: SarifLevel;
    message: { text: string };
    locations: {
        physicalLocation: { artifactLocation: { uri: string; uriBaseId: '%SRCROOT%' } };
        logicalLocations: { fullyQualifiedName: string }[];
    }[];
    partialFingerprints: { primaryLocationLineHash: string };
}

export interface SarifOptions {
    /** Homepage written to the tool driver; omitted when not given. */
    informationUri?: string;
}

/**
 * Render a lint result as a SARIF log (pretty-printed JSON).
 */
export function generateSarif(result: LintResult, options: SarifOptions = {}): string {
    const rules = describeRules(result.addons.flatMap(addon => addon.findings));
    const ruleIndex = new Map(rules.map((rule, index) => [rule.id, index]));

    const driver: SarifDriver = {
        name: 'addon-lint',
        version: result.metadata.version,
        rules,
    };
    if (options.informationUri !== undefined) {
        driver.informationUri = options.informationUri;
    }

    const log: SarifLog = {
        $schema: SARIF_SCHEMA,
        version: '2.1.0',
        runs: [{
            tool: { driver },
            invocations: [{ executionSuccessful: true, startTimeUtc: result.metadata.startTime }],
            results: result.addons.flatMap(addon =>
                addon.findings.map(finding => toResult(finding, addon, ruleIndex.get(finding.ruleId) ?? -1))
            ),
        }],
    };

    return JSON.stringify(log, null, 2);
}

/**
 * One descriptor per rule id that occurs, in rule table order. The default
 * level is the most severe one the rule was reported at.
 */
function describeRules(findings: readonly Finding[]): SarifRuleDescriptor[] {
    const worst = new Map<RuleId, Severity>();
    for (const finding of findings) {
        const seen = worst.get(finding.ruleId);
        if (seen === undefined || SEVERITIES.indexOf(finding.severity) > SEVERITIES.indexOf(seen)) {
            worst.set(finding.ruleId, finding.severity);
        }
    }

    const tableOrder: string[] = Object.keys(RULES);
    return [...worst]
        .sort(([a], [b]) => tableOrder.indexOf(a) - tableOrder.indexOf(b))
        .map(([id, severity]) => ({
            id,
            name: ruleName(id),
            shortDescription: { text: ruleName(id) },
            defaultConfiguration: { level: LEVELS[severity] },
        }));
}

function toResult(finding: Finding, addon: AddonResult, ruleIndex: number): SarifResult {
    const uri = finding.path === undefined ? addon.displayPath : `${addon.displayPath}/${finding.path}`;

    return {
        ruleId: finding.ruleId,
        ruleIndex,
        level: LEVELS[finding.severity],
        message: { text: finding.message },
        locations: [{
            physicalLocation: { artifactLocation: { uri, uriBaseId: '%SRCROOT%' } },
            logicalLocations: [{ fullyQualifiedName: addon.addonId ?? addon.displayPath }],
        }],
        partialFingerprints: { primaryLocationLineHash: fingerprint(finding.ruleId, uri, finding.message) },
    };
}

// Findings carry no line numbers, so rule, file and message identify one
function fingerprint(ruleId: RuleId, uri: string, message: string): string {
    return createHash('sha256').update(`${ruleId}\0${uri}\0${message}`).digest('hex').slice(0, 16);
}
