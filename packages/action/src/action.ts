/**
 * GitHub Action for the addon linter.
 *
 * This action:
 * 1. Reads inputs from the workflow
 * 2. Checks the addons
 * 3. Posts annotations for findings
 * 4. Generates and optionally uploads SARIF
 * 5. Sets outputs for downstream steps
 */

import * as core from '@actions/core';
import * as github from '@actions/github';
import * as fs from 'node:fs/promises';
import { gzipSync } from 'node:zlib';
import {
    ConfigError,
    Orchestrator,
    SEVERITIES,
    errorMessage,
    type AddonResult,
    type Finding,
    type LintConfig,
    type LintResult,
    type Severity,
} from '@addon-lint/core';
import { generateSarif } from '@addon-lint/sarif';

export async function run(): Promise<void> {
    try {
        const paths = splitInput(core.getInput('paths'));
        const failOn = parseFailOn(core.getInput('fail-on') || 'problem');
        const sarifPath = core.getInput('sarif') || 'addon-lint.sarif';
        const uploadSarif = core.getInput('upload-sarif') === 'true';

        const config: LintConfig = {
            paths: paths.length > 0 ? paths : ['.'],
            failOn,
            branch: core.getInput('branch') || undefined,
            allowFolderIdMismatch: core.getInput('allow-folder-id-mismatch') === 'true',
            basePath: process.env['GITHUB_WORKSPACE'] ?? process.cwd(),
        };

        core.info('🔍 Checking addons...');

        const orchestrator = new Orchestrator({ log: message => core.debug(message) });
        const result = await orchestrator.lint(config);

        core.info(
            `📊 Checked ${result.summary.addonsChecked} addon(s) in ${result.metadata.durationMs}ms`
        );

        for (const addon of result.addons) {
            for (const finding of addon.findings) {
                const annotation = findingToAnnotation(finding, addon);

                switch (finding.severity) {
                    case 'problem':
                        core.error(annotation.message, annotation);
                        break;
                    case 'warning':
                        core.warning(annotation.message, annotation);
                        break;
                    case 'information':
                        core.notice(annotation.message, annotation);
                        break;
                }
            }
        }

        const sarif = generateSarif(result);
        await fs.writeFile(sarifPath, sarif);
        core.info(`📝 SARIF written to ${sarifPath}`);

        if (uploadSarif) {
            await uploadSarifToGitHub(sarif);
        }

        const findingsCount = result.addons.reduce((sum, addon) => sum + addon.findings.length, 0);
        core.setOutput('sarif-file', sarifPath);
        core.setOutput('findings-count', findingsCount);
        core.setOutput('problems-count', result.summary.problems);
        core.setOutput('warnings-count', result.summary.warnings);

        await postSummary(result);

        const hasFailingFindings = result.addons.some(addon =>
            addon.findings.some(f => failOn.includes(f.severity))
        );
        if (hasFailingFindings) {
            core.setFailed(
                `Found ${result.summary.problems} problems, ${result.summary.warnings} warnings`
            );
        }
    } catch (error) {
        core.setFailed(errorMessage(error));
    }
}

/**
 * Split a list input on newlines and commas.
 */
export function splitInput(value: string): string[] {
    return value.split(/[\n,]/).map(s => s.trim()).filter(Boolean);
}

/**
 * @throws ConfigError on unknown severities
 */
export function parseFailOn(value: string): Severity[] {
    return splitInput(value).map(name => {
        const severity = SEVERITIES.find(s => s === name);
        if (severity === undefined) {
            throw new ConfigError(`Unknown severity "${name}" in fail-on`);
        }
        return severity;
    });
}

/**
 * Convert a finding to GitHub annotation properties.
 *
 * The file is the addon's display path (relative to the workspace) joined
 * with the finding's own path, when it has one.
 */
export function findingToAnnotation(
    finding: Finding,
    addon: AddonResult
): { message: string; title: string; file: string } {
    return {
        message: `[${finding.ruleId}] ${finding.message}`,
        title: addon.addonId ?? addon.displayPath,
        file: finding.path === undefined ? addon.displayPath : `${addon.displayPath}/${finding.path}`,
    };
}

/**
 * Encode a SARIF document the way the code scanning API takes it: gzip
 * compressed, then base64.
 */
export function encodeSarif(sarif: string): string {
    return gzipSync(sarif).toString('base64');
}

/**
 * Upload SARIF to GitHub Code Scanning.
 */
async function uploadSarifToGitHub(sarif: string): Promise<void> {
    const token = process.env['GITHUB_TOKEN'];
    if (!token) {
        core.warning('GITHUB_TOKEN not available, skipping SARIF upload');
        return;
    }

    const octokit = github.getOctokit(token);
    const { owner, repo } = github.context.repo;

    try {
        await octokit.rest.codeScanning.uploadSarif({
            owner,
            repo,
            ref: github.context.ref,
            commit_sha: github.context.sha,
            sarif: encodeSarif(sarif),
        });
        core.info('📤 SARIF uploaded to GitHub Code Scanning');
    } catch (error) {
        // Code scanning might not be enabled
        core.warning(`Failed to upload SARIF: ${errorMessage(error)}`);
    }
}

/**
 * Write the job summary.
 */
async function postSummary(result: LintResult): Promise<void> {
    const summary = core.summary
        .addHeading('Addon Lint Results', 2)
        .addTable([
            [
                { data: 'Addon', header: true },
                { data: 'Problems', header: true },
                { data: 'Warnings', header: true },
                { data: 'Information', header: true },
            ],
            ...result.addons.map(addon => [
                addon.displayPath,
                countOf(addon, 'problem'),
                countOf(addon, 'warning'),
                countOf(addon, 'information'),
            ]),
        ]);

    const problems = result.addons.flatMap(addon =>
        addon.findings
            .filter(f => f.severity === 'problem')
            .map(f => [addon.displayPath, f.ruleId, f.message])
    );

    if (problems.length > 0) {
        summary.addHeading('Problems', 3);
        summary.addTable([
            [
                { data: 'Addon', header: true },
                { data: 'Rule', header: true },
                { data: 'Message', header: true },
            ],
            ...problems.slice(0, 20),
        ]);

        if (problems.length > 20) {
            summary.addRaw(`\n_...and ${problems.length - 20} more problems_\n`);
        }
    }

    await summary.write();
}

function countOf(addon: AddonResult, severity: Severity): string {
    return addon.findings.filter(f => f.severity === severity).length.toString();
}
