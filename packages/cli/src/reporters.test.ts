import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError, createFinding, type LintResult } from '@addon-lint/core';
import { parseReporters, parseSeverities } from './cli.js';
import { formatJson, formatSummary, formatText } from './reporters.js';

function lintResult(): LintResult {
    return {
        addons: [
            {
                addonPath: '/work/repo/plugin.one',
                displayPath: 'repo/plugin.one',
                addonId: 'plugin.one',
                findings: [
                    createFinding('information', 'Created by Jane Doe', 'addon-xml', 'addon.xml'),
                    createFinding('problem', 'Addon id and folder name does not match.', 'folder-id'),
                ],
            },
            {
                addonPath: '/work/repo/plugin.two',
                displayPath: 'repo/plugin.two',
                findings: [],
            },
        ],
        summary: { problems: 1, warnings: 0, information: 1, addonsChecked: 2, addonsWithProblems: 1 },
        metadata: {
            startTime: '2024-05-01T10:00:00.000Z',
            durationMs: 5,
            version: '0.1.0',
            config: { paths: ['repo'], failOn: ['problem'] },
        },
    };
}

describe('formatText', () => {
    it('groups findings under each addon', () => {
        assert.equal(formatText(lintResult(), false), [
            'repo/plugin.one',
            '  INFO     Created by Jane Doe [addon-xml]',
            '  PROBLEM  Addon id and folder name does not match. [folder-id]',
            '',
            'repo/plugin.two',
            '  No findings',
            '',
        ].join('\n'));
    });
});

describe('formatJson', () => {
    it('round-trips the result', () => {
        assert.deepEqual(JSON.parse(formatJson(lintResult())), lintResult());
    });
});

describe('formatSummary', () => {
    it('counts findings by severity', () => {
        assert.equal(
            formatSummary(lintResult()),
            'Found 1 problems, 0 warnings, 1 information in 2 addon(s)'
        );
    });
});

describe('option parsing', () => {
    it('parses severity lists', () => {
        assert.deepEqual(parseSeverities('problem, warning'), ['problem', 'warning']);
        assert.throws(() => parseSeverities('error'), ConfigError);
    });

    it('parses reporter lists', () => {
        assert.deepEqual(parseReporters('console,log'), ['console', 'log']);
        assert.throws(() => parseReporters('xml'), ConfigError);
    });
});
