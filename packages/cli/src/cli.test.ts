import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { spawnSync } from 'node:child_process';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const mainPath = path.resolve(__dirname, './main.ts');
const tsxLoader = import.meta.resolve('tsx');

const ADDON_XML = (id: string) =>
    `<?xml version="1.0" encoding="UTF-8"?>\n<addon id="${id}" version="1.0.0" provider-name="Jane Doe"/>\n`;

function runCli(args: string[], cwd: string) {
    return spawnSync(process.execPath, ['--import', tsxLoader, mainPath, ...args], {
        cwd,
        stdio: 'pipe',
        encoding: 'utf-8',
    });
}

describe('CLI integration', () => {
    let tempDir: string;

    before(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'addon-lint-cli-'));

        await fs.mkdir(path.join(tempDir, 'plugin.clean', 'resources', 'language', 'resource.language.en_gb'), {
            recursive: true,
        });
        await fs.writeFile(path.join(tempDir, 'plugin.clean', 'addon.xml'), ADDON_XML('plugin.clean'));
        await fs.writeFile(path.join(tempDir, 'plugin.clean', 'main.py'), 'print("hi")\n');

        await fs.mkdir(path.join(tempDir, 'plugin.renamed'));
        await fs.writeFile(path.join(tempDir, 'plugin.renamed', 'addon.xml'), ADDON_XML('plugin.original'));
    });

    after(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('exits 0 and prints JSON for a clean addon', () => {
        const result = runCli(['--reporter', 'json', 'plugin.clean'], tempDir);

        assert.equal(result.status, 0, result.stderr);
        const output = JSON.parse(result.stdout);
        assert.equal(output.summary.problems, 0);
        assert.equal(output.summary.warnings, 0);
        assert.equal(output.addons[0].displayPath, 'plugin.clean');
    });

    it('exits 1 when a finding matches --fail-on', () => {
        const result = runCli(['--no-color', 'plugin.renamed'], tempDir);

        assert.equal(result.status, 1);
        assert.ok(result.stdout.includes('  PROBLEM  Addon id and folder name does not match. [folder-id]'));
    });

    it('downgrades the mismatch when it is allowed', () => {
        const result = runCli(['--allow-folder-id-mismatch', 'plugin.renamed'], tempDir);
        assert.equal(result.status, 0, result.stderr);
    });

    it('exits 2 on an unknown branch', () => {
        const result = runCli(['--branch', 'frodo', 'plugin.clean'], tempDir);

        assert.equal(result.status, 2);
        assert.ok(result.stderr.includes('Unknown branch "frodo"'));
    });

    it('does not flag its own log files', async () => {
        const addonDir = path.join(tempDir, 'plugin.clean');
        const result = runCli(['--enable-debug-log', '--reporter', 'json,log', '.'], addonDir);

        assert.equal(result.status, 0, result.stderr);
        const debugLog = await fs.readFile(path.join(addonDir, 'addon-lint.log'), 'utf-8');
        assert.ok(debugLog.includes('Checking plugin.clean'));
        const reportLog = await fs.readFile(path.join(addonDir, 'addon-lint-report.log'), 'utf-8');
        assert.ok(reportLog.startsWith('plugin.clean\n'));

        const output = JSON.parse(result.stdout);
        assert.equal(output.summary.warnings, 0);
    });

    it('writes SARIF output', async () => {
        const sarifPath = path.join(tempDir, 'results.sarif');
        const result = runCli(['--sarif', sarifPath, '--reporter', 'json', 'plugin.renamed'], tempDir);

        assert.equal(result.status, 1);
        const sarif = JSON.parse(await fs.readFile(sarifPath, 'utf-8'));
        assert.equal(sarif.version, '2.1.0');
        assert.ok(sarif.runs[0].results.some((r: { ruleId: string }) => r.ruleId === 'folder-id'));
    });
});
