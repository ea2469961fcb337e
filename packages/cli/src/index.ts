/**
 * @addon-lint/cli
 *
 * Command-line interface for the addon linter.
 *
 * This package provides the `addon-lint` command for checking addons
 * from the terminal, and exports its pieces for embedding.
 *
 * @example
 * ```bash
 * # Check the addon in the current directory
 * npx addon-lint
 *
 * # Check every addon of a repository for an older branch
 * npx addon-lint --branch helix repo/
 * ```
 */

export { createProgram, run, parseReporters, parseSeverities, type CliOptions } from './cli.js';
export { REPORTERS, formatJson, formatSummary, formatText, type ReporterName } from './reporters.js';
export { createDebugLog } from './debug-log.js';
