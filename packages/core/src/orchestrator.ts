/**
 * Lint orchestrator.
 *
 * This is the main entry point for running checks. It coordinates addon
 * discovery, per-addon check invocation, and result aggregation.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { LATEST_BRANCH, parseBranch } from './branches.js';
import { createDefaultChecks } from './checks/index.js';
import { discoverAddons, type DiscoveredAddon } from './discovery.js';
import { errorMessage } from './errors.js';
import { createFileIndex } from './file-index.js';
import { tryLoadAddonMetadata } from './metadata.js';
import { Report, createFinding } from './report.js';
import type {
    AddonCheck,
    AddonResult,
    LintConfig,
    LintResult,
} from './types.js';

/** Reported in LintResult metadata and the SARIF tool driver. */
export const VERSION = '0.1.0';

export interface OrchestratorOptions {
    /**
     * Checks to run, in order. Defaults to createDefaultChecks().
     */
    checks?: AddonCheck[];

    /**
     * Receives one line per step (discovery, each addon, each check).
     * The command-line interface writes these to the debug log.
     */
    log?: (message: string) => void;
}

/**
 * The orchestrator manages the lint lifecycle.
 *
 * It keeps a registry of checks and runs all of them against every addon it
 * discovers, one addon at a time. Each addon gets a fresh Report, so findings
 * are never mixed between addons.
 */
export class Orchestrator {
    private checks: AddonCheck[];
    private readonly log: (message: string) => void;

    constructor(options: OrchestratorOptions = {}) {
        this.checks = options.checks ?? createDefaultChecks();
        this.log = options.log ?? (() => undefined);
    }

    /**
     * Register an additional check. It runs after the ones already registered.
     */
    registerCheck(check: AddonCheck): void {
        this.checks.push(check);
    }

    get registeredChecks(): readonly AddonCheck[] {
        return this.checks;
    }

    /**
     * Run all enabled checks according to the provided configuration.
     *
     * This is the main entry point. It:
     * 1. Validates the branch
     * 2. Discovers addons (extracting zip archives into a temporary directory)
     * 3. Runs every enabled check on each addon
     * 4. Computes summary statistics
     *
     * @throws ConfigError for an unknown branch
     * @throws DiscoveryError for a path that does not exist
     */
    async lint(config: LintConfig): Promise<LintResult> {
        const startTime = new Date();

        // Fail before touching the file system on a bad branch name
        const branch = config.branch === undefined ? LATEST_BRANCH : parseBranch(config.branch);
        const basePath = config.basePath ?? process.cwd();

        const activeChecks = this.checks.filter(check => config.checks?.[check.name] !== false);

        const extractDir = await fs.mkdtemp(path.join(os.tmpdir(), 'addon-lint-'));
        try {
            this.log(`Discovering addons in ${config.paths.join(', ')} (branch ${branch})`);
            const addons = await discoverAddons(config.paths, { basePath, extractDir });
            this.log(`Found ${addons.length} addon(s)`);

            const results: AddonResult[] = [];
            for (const addon of addons) {
                results.push(this.checkAddon(addon, activeChecks, { ...config, branch }));
            }

            const endTime = new Date();
            return {
                addons: results,
                summary: this.computeSummary(results),
                metadata: {
                    startTime: startTime.toISOString(),
                    durationMs: endTime.getTime() - startTime.getTime(),
                    version: VERSION,
                    config,
                },
            };
        } finally {
            await fs.rm(extractDir, { recursive: true, force: true });
        }
    }

    /**
     * Run the checks against one addon.
     */
    private checkAddon(
        addon: DiscoveredAddon,
        checks: AddonCheck[],
        config: LintConfig
    ): AddonResult {
        const { addonPath, displayPath } = addon;
        this.log(`Checking ${displayPath}`);

        const report = new Report();
        const fileIndex = createFileIndex(addonPath);
        const metadata = tryLoadAddonMetadata(addonPath);

        for (const check of checks) {
            this.log(`Running ${check.name} on ${displayPath}`);
            try {
                check.run({ report, addonPath, fileIndex, metadata, config });
            } catch (error) {
                // A check that throws is a bug in the check; report it and move on
                report.add(createFinding(
                    'problem',
                    `Check "${check.name}" failed: ${errorMessage(error)}`,
                    'check-error'
                ));
            }
        }

        const result: AddonResult = {
            addonPath,
            displayPath,
            findings: [...report.findings],
        };
        if (metadata?.id !== undefined) {
            result.addonId = metadata.id;
        }

        this.log(`${displayPath}: ${report.size} finding(s)`);
        return result;
    }

    /**
     * Compute summary statistics from per-addon results.
     */
    private computeSummary(results: AddonResult[]): LintResult['summary'] {
        const findings = results.flatMap(r => r.findings);

        return {
            problems: findings.filter(f => f.severity === 'problem').length,
            warnings: findings.filter(f => f.severity === 'warning').length,
            information: findings.filter(f => f.severity === 'information').length,
            addonsChecked: results.length,
            addonsWithProblems: results.filter(r => r.findings.some(f => f.severity === 'problem')).length,
        };
    }
}
