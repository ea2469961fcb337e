import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createFileIndex } from '../file-index.js';
import { Report } from '../report.js';
import { makeTempDir, writeTree } from '../testing.js';
import type { FileEntry } from '../types.js';
import { checkFilePermission } from './permissions.js';

describe('checkFilePermission', { skip: process.platform === 'win32' }, () => {
    let addonPath: string;
    let fileIndex: FileEntry[];

    before(async () => {
        addonPath = path.join(await makeTempDir(), 'plugin.video.demo');
        await writeTree(addonPath, {
            'main.py': 'print("hi")\n',
            'bin/install.sh': '#!/bin/sh\n',
        });
        await fs.chmod(path.join(addonPath, 'main.py'), 0o644);
        await fs.chmod(path.join(addonPath, 'bin', 'install.sh'), 0o755);
        fileIndex = createFileIndex(addonPath);
    });

    after(async () => {
        await fs.rm(path.dirname(addonPath), { recursive: true, force: true });
    });

    it('reports executable files', () => {
        const report = new Report();
        checkFilePermission(report, fileIndex, addonPath, true);

        assert.deepEqual(report.findings, [{
            severity: 'problem',
            message: 'bin/install.sh is marked as stand-alone executable',
            ruleId: 'executable-file',
            path: 'bin/install.sh',
        }]);
    });

    it('does nothing where there is no execute bit', () => {
        const report = new Report();
        checkFilePermission(report, fileIndex, addonPath, false);

        assert.equal(report.size, 0);
    });

    it('ignores entries that are not regular files', () => {
        const report = new Report();
        checkFilePermission(report, [
            { name: 'bin', path: addonPath },
            { name: 'missing.sh', path: addonPath },
        ], addonPath, true);

        assert.equal(report.size, 0);
    });

    it('follows symbolic links to executable files', async () => {
        const root = path.dirname(addonPath);
        const linkedAddon = path.join(root, 'plugin.linked');
        await writeTree(root, { 'tool.bin': '#!/bin/sh\n', 'plugin.linked/addon.xml': '<addon/>' });
        await fs.chmod(path.join(root, 'tool.bin'), 0o755);
        await fs.symlink(path.join(root, 'tool.bin'), path.join(linkedAddon, 'run.exe'));

        const report = new Report();
        checkFilePermission(report, createFileIndex(linkedAddon), linkedAddon, true);

        assert.deepEqual(report.findings.map(f => f.message), ['run.exe is marked as stand-alone executable']);
    });

    it('leaves permissions alone', async () => {
        checkFilePermission(new Report(), fileIndex, addonPath, true);
        const stats = await fs.stat(path.join(addonPath, 'bin', 'install.sh'));
        assert.equal(stats.mode & 0o777, 0o755);
    });
});
