/**
 * Core type definitions for the addon linter.
 *
 * These types describe what the checks consume (a file index and the parsed
 * addon metadata), what they produce (severity-tagged findings), and the
 * configuration and result shapes the orchestrator works with.
 */

import type { AddonMetadata } from './metadata.js';
import type { Report } from './report.js';
import type { RuleId } from './rules.js';

/**
 * Severity levels for findings.
 *
 * - problem: Must be fixed before the addon can be accepted
 * - warning: Should be reviewed by a human
 * - information: Context for the reviewer; never fails a run by default
 */
export type Severity = 'information' | 'warning' | 'problem';

/** All severities, least severe first. */
export const SEVERITIES: readonly Severity[] = ['information', 'warning', 'problem'];

/**
 * One file discovered under an addon root.
 *
 * `path` is the directory holding the file, `name` its base name, so
 * `path.join(entry.path, entry.name)` is the full path.
 */
export interface FileEntry {
    readonly name: string;
    readonly path: string;
}

/**
 * A single finding. Findings are frozen when created and never change.
 */
export interface Finding {
    readonly severity: Severity;

    readonly message: string;

    /** Rule that produced the finding; becomes the SARIF rule ID */
    readonly ruleId: RuleId;

    /**
     * Addon-root-relative path (forward slashes) of the file or directory
     * the finding is about, when there is one.
     */
    readonly path?: string;
}

/**
 * Everything a check may look at for one addon.
 */
export interface CheckContext {
    /** Report for this addon; checks only ever append to it */
    report: Report;

    /** Absolute path to the addon root */
    addonPath: string;

    fileIndex: readonly FileEntry[];

    /** Parsed addon.xml, or null if it is missing or not parseable */
    metadata: AddonMetadata | null;

    config: LintConfig;
}

/**
 * Interface that all checks registered with the orchestrator implement.
 *
 * Checks are synchronous and independent: none reads another's findings.
 */
export interface AddonCheck {
    /** Unique identifier, also used to disable the check in configuration */
    readonly name: string;

    readonly description: string;

    run(context: CheckContext): void;
}

/**
 * Configuration for a lint run.
 *
 * Kept serializable so it can be stored alongside results.
 */
export interface LintConfig {
    /** Addon directories, repository directories or addon zip archives */
    paths: string[];

    /** Which severity levels cause the process to exit non-zero */
    failOn: Severity[];

    /**
     * Base directory for resolving relative paths.
     * Defaults to current working directory.
     */
    basePath?: string;

    /**
     * Target release the addon is submitted for, e.g. "matrix".
     * Decides whether the new language directory structure is allowed.
     * Defaults to the newest known branch.
     */
    branch?: string;

    /** Downgrade a folder name / addon id mismatch to information */
    allowFolderIdMismatch?: boolean;

    /** The debug log is being written; exclude it from the whitelist check */
    debugLogEnabled?: boolean;

    /** The reporter log is being written; exclude it from the whitelist check */
    reporterLogEnabled?: boolean;

    /**
     * Enable or disable individual checks by name.
     * By default, all registered checks run.
     */
    checks?: Record<string, boolean>;
}

/**
 * Findings collected for one addon.
 */
export interface AddonResult {
    /** Absolute path of the checked addon directory */
    addonPath: string;

    /**
     * Path shown to users: relative to the base path, or prefixed with the
     * archive name for addons extracted from a zip.
     */
    displayPath: string;

    /** Id declared in addon.xml, if it could be read */
    addonId?: string;

    findings: Finding[];
}

/**
 * Result of a complete lint run.
 */
export interface LintResult {
    addons: AddonResult[];

    summary: {
        problems: number;
        warnings: number;
        information: number;
        addonsChecked: number;
        addonsWithProblems: number;
    };

    metadata: {
        /** ISO 8601 timestamp when the run started */
        startTime: string;
        durationMs: number;
        version: string;
        config: LintConfig;
    };
}
