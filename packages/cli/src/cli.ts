/**
 * Addon linter command-line interface.
 *
 * Usage:
 *   addon-lint [options] [paths...]
 *
 * Examples:
 *   addon-lint plugin.video.example
 *   addon-lint --branch matrix --reporter json repo/
 *   addon-lint --sarif results.sarif plugin.video.example-1.0.0.zip
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import {
    ConfigError,
    Orchestrator,
    SEVERITIES,
    errorMessage,
    getDebugLogPath,
    getReporterLogPath,
    type LintConfig,
    type Severity,
} from '@addon-lint/core';
import { generateSarif } from '@addon-lint/sarif';
import { createDebugLog } from './debug-log.js';
import { REPORTERS, formatJson, formatSummary, formatText, type ReporterName } from './reporters.js';

export interface CliOptions {
    branch?: string;
    allowFolderIdMismatch?: boolean;
    enableDebugLog?: boolean;
    reporter: string;
    sarif?: string;
    failOn: string;
    basePath: string;
    color?: boolean;
}

/**
 * Build the commander program. Exits the process when the action finishes.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('addon-lint')
        .description('Check addon packages before they are submitted')
        .version(readPackageVersion())
        .argument('[paths...]', 'Addon directories, repository directories or addon zip archives', ['.'])
        .option('--branch <name>', 'Target branch (default: $ADDON_LINT_BRANCH or the newest branch)')
        .option('--allow-folder-id-mismatch', 'Report a folder name / addon id mismatch as information only')
        .option('--enable-debug-log', `Write a debug log to ${getDebugLogPath()}`)
        .option('--reporter <names>', `Reporters to use (comma-separated: ${REPORTERS.join(', ')})`, 'console')
        .option('--sarif <file>', 'Write SARIF output to file')
        .option('--fail-on <severities>', 'Fail on these severities (comma-separated)', 'problem')
        .option('--base-path <dir>', 'Base directory for resolving paths', process.cwd())
        .option('--no-color', 'Disable colored output')
        .action(async (paths: string[], options: CliOptions) => {
            try {
                const exitCode = await run(paths, options);
                process.exit(exitCode);
            } catch (error) {
                console.error(chalk.red('Error:'), errorMessage(error));
                process.exit(2);
            }
        });

    return program;
}

/**
 * Main execution function.
 * Returns exit code: 0 = success, 1 = findings at fail-on level, 2 = execution error
 */
export async function run(paths: string[], options: CliOptions): Promise<number> {
    const failOn = parseSeverities(options.failOn);
    const reporters = parseReporters(options.reporter);
    const useColor = options.color !== false;

    const config: LintConfig = {
        paths,
        failOn,
        basePath: options.basePath,
        branch: options.branch ?? process.env['ADDON_LINT_BRANCH'],
        allowFolderIdMismatch: options.allowFolderIdMismatch ?? false,
        debugLogEnabled: options.enableDebugLog ?? false,
        reporterLogEnabled: reporters.includes('log'),
    };

    const orchestrator = new Orchestrator({
        log: config.debugLogEnabled ? createDebugLog(getDebugLogPath()) : undefined,
    });

    console.error(chalk.blue('🔍 Checking addons...'));
    const result = await orchestrator.lint(config);

    console.error(
        chalk.blue(`📊 Checked ${result.summary.addonsChecked} addon(s) in ${result.metadata.durationMs}ms`)
    );

    if (result.summary.problems === 0 && result.summary.warnings === 0) {
        console.error(chalk.green('✅ No problems or warnings found!'));
    } else {
        console.error(chalk.yellow(`⚠️  ${formatSummary(result)}`));
    }

    for (const reporter of reporters) {
        switch (reporter) {
            case 'console':
                console.log(formatText(result, useColor));
                break;
            case 'json':
                console.log(formatJson(result));
                break;
            case 'log':
                await fs.writeFile(getReporterLogPath(), `${formatText(result, false)}\n${formatSummary(result)}\n`);
                console.error(chalk.blue(`📝 Report written to ${getReporterLogPath()}`));
                break;
        }
    }

    if (options.sarif) {
        await fs.writeFile(options.sarif, generateSarif(result));
        console.error(chalk.blue(`📝 SARIF written to ${options.sarif}`));
    }

    const hasFailingFindings = result.addons.some(addon =>
        addon.findings.some(f => failOn.includes(f.severity))
    );
    return hasFailingFindings ? 1 : 0;
}

/**
 * Parse a comma-separated severity list.
 *
 * @throws ConfigError on unknown severities
 */
export function parseSeverities(value: string): Severity[] {
    return splitList(value).map(name => {
        const severity = SEVERITIES.find(s => s === name);
        if (severity === undefined) {
            throw new ConfigError(`Unknown severity "${name}". Expected one of: ${SEVERITIES.join(', ')}`);
        }
        return severity;
    });
}

/**
 * Parse a comma-separated reporter list.
 *
 * @throws ConfigError on unknown reporters
 */
export function parseReporters(value: string): ReporterName[] {
    return splitList(value).map(name => {
        const reporter = REPORTERS.find(r => r === name);
        if (reporter === undefined) {
            throw new ConfigError(`Unknown reporter "${name}". Expected one of: ${REPORTERS.join(', ')}`);
        }
        return reporter;
    });
}

function splitList(value: string): string[] {
    return value.split(',').map(s => s.trim()).filter(Boolean);
}

function readPackageVersion(): string {
    const packageJson: unknown = JSON.parse(
        readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
    );
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
        && typeof packageJson.version === 'string') {
        return packageJson.version;
    }
    return '0.0.0';
}
