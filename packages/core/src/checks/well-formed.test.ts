import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createFileIndex } from '../file-index.js';
import { Report } from '../report.js';
import { addonXml, makeTempDir, writeTree } from '../testing.js';
import type { FileEntry } from '../types.js';
import { checkForInvalidJsonFiles, checkForInvalidXmlFiles } from './well-formed.js';

describe('well-formedness checks', () => {
    let addonPath: string;
    let fileIndex: FileEntry[];

    before(async () => {
        addonPath = path.join(await makeTempDir(), 'plugin.video.demo');
        await writeTree(addonPath, {
            'addon.xml': addonXml('plugin.video.demo'),
            'resources/settings.xml': '<settings><category label="General"/></settings>',
            'resources/broken.xml': '<settings><category></settings>',
            'resources/data/config.json': '{"timeout": 30, "hosts": ["a", "b"]}',
            'resources/data/bad.json': '{"timeout": }',
            'resources/data/empty.json': '',
            'resources/data/latin1.json': Buffer.from([0x7b, 0x22, 0x61, 0x22, 0x3a, 0x22, 0xff, 0x22, 0x7d]),
            'resources/skins/entity.xml': '<window>&nbsp;</window>',
            'resources/skins/latin1.xml': Buffer.from([0x3c, 0x61, 0x3e, 0xff, 0x3c, 0x2f, 0x61, 0x3e]),
            'resources/skins/two-roots.xml': '<window/><window/>',
        });
        fileIndex = createFileIndex(addonPath);
    });

    after(async () => {
        await fs.rm(path.dirname(addonPath), { recursive: true, force: true });
    });

    it('reports each malformed XML file once', () => {
        const report = new Report();
        checkForInvalidXmlFiles(report, fileIndex, addonPath);

        assert.deepEqual(report.findings[0], {
            severity: 'problem',
            message: 'Invalid xml found. resources/broken.xml',
            ruleId: 'invalid-xml',
            path: 'resources/broken.xml',
        });
        assert.deepEqual(report.findings.map(f => f.message), [
            'Invalid xml found. resources/broken.xml',
            'Invalid xml found. resources/skins/entity.xml',
            'Invalid xml found. resources/skins/latin1.xml',
            'Invalid xml found. resources/skins/two-roots.xml',
        ]);
    });

    it('reports each malformed or empty JSON file once', () => {
        const report = new Report();
        checkForInvalidJsonFiles(report, fileIndex, addonPath);

        assert.deepEqual(report.findings.map(f => [f.severity, f.message]), [
            ['problem', 'Invalid json found. resources/data/bad.json'],
            ['problem', 'Invalid json found. resources/data/empty.json'],
            ['problem', 'Invalid json found. resources/data/latin1.json'],
        ]);
    });

    it('reports nothing for well-formed files', () => {
        const valid = fileIndex.filter(f => f.name === 'addon.xml' || ['settings.xml', 'config.json'].includes(f.name));
        assert.equal(valid.length, 3);
        const report = new Report();

        checkForInvalidXmlFiles(report, valid, addonPath);
        checkForInvalidJsonFiles(report, valid, addonPath);

        assert.equal(report.size, 0);
    });

    it('treats files that cannot be read as invalid', () => {
        const missing: FileEntry[] = [
            { name: 'gone.xml', path: addonPath },
            { name: 'gone.json', path: addonPath },
        ];
        const report = new Report();

        checkForInvalidXmlFiles(report, missing, addonPath);
        checkForInvalidJsonFiles(report, missing, addonPath);

        assert.deepEqual(report.findings.map(f => f.message), [
            'Invalid xml found. gone.xml',
            'Invalid json found. gone.json',
        ]);
    });
});
