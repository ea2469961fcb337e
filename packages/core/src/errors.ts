/**
 * Errors raised by the collaborators around the checks.
 *
 * Checks themselves never throw: malformed input ends up as a finding.
 * These errors surface from loading, discovery and configuration, and the
 * entry points turn them into exit codes.
 */

export class AddonLintError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** addon.xml is missing or is not well-formed XML. */
export class MetadataError extends AddonLintError {}

/** A document is not well-formed XML, or its bytes do not decode. */
export class XmlError extends AddonLintError {}

/** A configured path does not exist or cannot be read. */
export class DiscoveryError extends AddonLintError {}

/** An option has a value the linter does not know. */
export class ConfigError extends AddonLintError {}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
