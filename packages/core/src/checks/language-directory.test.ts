import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Report } from '../report.js';
import { makeTempDir, writeTree } from '../testing.js';
import { checkForNewLanguageDirectoryStructure } from './language-directory.js';

describe('checkForNewLanguageDirectoryStructure', () => {
    let tempDir: string;

    before(async () => {
        tempDir = await makeTempDir();
        await writeTree(tempDir, {
            'plugin.old/resources/language/English/strings.po': 'msgid ""\n',
            'plugin.new/resources/language/resource.language.en_gb/strings.po': 'msgid ""\n',
            'plugin.new/resources/language/resource.language.de_de/nested/': '',
            'plugin.new/resources/language/README.txt': 'translations live here',
            'plugin.none/addon.xml': '<addon/>',
        });
    });

    after(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('flags the old layout when the new one is supported', () => {
        const report = new Report();
        checkForNewLanguageDirectoryStructure(report, path.join(tempDir, 'plugin.old'), true);

        assert.deepEqual(report.findings, [{
            severity: 'problem',
            message: 'Using the old language directory structure in resources/language/English, ' +
                'please move to the new one.',
            ruleId: 'language-directory',
            path: 'resources/language/English',
        }]);
    });

    it('flags the new layout when the target does not support it', () => {
        const report = new Report();
        checkForNewLanguageDirectoryStructure(report, path.join(tempDir, 'plugin.new'), false);

        assert.deepEqual(report.findings.map(f => f.message), [
            'Using the new language directory structure in resources/language/resource.language.de_de ' +
            'for a target version that does not support it. Please use the old language file structure ' +
            'or move the addon to a newer branch.',
            'Using the new language directory structure in resources/language/resource.language.en_gb ' +
            'for a target version that does not support it. Please use the old language file structure ' +
            'or move the addon to a newer branch.',
        ]);
    });

    it('accepts the layout that matches the target', () => {
        const report = new Report();
        checkForNewLanguageDirectoryStructure(report, path.join(tempDir, 'plugin.new'), true);
        checkForNewLanguageDirectoryStructure(report, path.join(tempDir, 'plugin.old'), false);

        assert.equal(report.size, 0);
    });

    it('defaults to the new layout being supported', () => {
        const report = new Report();
        checkForNewLanguageDirectoryStructure(report, path.join(tempDir, 'plugin.old'));

        assert.equal(report.count('problem'), 1);
    });

    it('counts symbolic links to directories as language folders', { skip: process.platform === 'win32' }, async () => {
        const addonPath = path.join(tempDir, 'plugin.linked');
        await writeTree(tempDir, {
            'shared/English/strings.po': 'msgid ""\n',
            'plugin.linked/resources/language/': '',
        });
        await fs.symlink(path.join(tempDir, 'shared', 'English'), path.join(addonPath, 'resources', 'language', 'English'));

        const report = new Report();
        checkForNewLanguageDirectoryStructure(report, addonPath, true);

        assert.deepEqual(report.findings.map(f => f.path), ['resources/language/English']);
    });

    it('passes addons without a language directory', () => {
        const report = new Report();
        checkForNewLanguageDirectoryStructure(report, path.join(tempDir, 'plugin.none'), true);

        assert.equal(report.size, 0);
    });
});
