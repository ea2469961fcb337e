/**
 * @addon-lint/core
 *
 * Checks and orchestration for the addon linter.
 *
 * This package provides:
 * - Type definitions for findings, checks, configuration and results
 * - The Report sink the checks append to
 * - The individual checks, callable on their own
 * - File index, addon.xml loading and addon discovery (including zip archives)
 * - The Orchestrator that runs every check against every addon
 *
 * @example
 * ```typescript
 * import { Orchestrator, type LintConfig } from '@addon-lint/core';
 *
 * const orchestrator = new Orchestrator();
 *
 * const config: LintConfig = {
 *   paths: ['plugin.video.example'],
 *   branch: 'nexus',
 *   failOn: ['problem'],
 * };
 *
 * const result = await orchestrator.lint(config);
 * console.log(`Found ${result.summary.problems} problems`);
 * ```
 */

export * from './types.js';
export * from './errors.js';
export * from './rules.js';
export * from './paths.js';
export * from './branches.js';
export * from './metadata.js';
export * from './file-index.js';
export * from './discovery.js';
export * from './checks/index.js';
export { Report, createFinding } from './report.js';
export { Orchestrator, VERSION, type OrchestratorOptions } from './orchestrator.js';
