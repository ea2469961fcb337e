/**
 * Fixture helpers for the tests: build small addon trees in a temp directory.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'addon-lint-test-'));
}

/**
 * Write files below `root`. Keys are forward-slash relative paths; a key
 * ending in "/" creates an empty directory. Byte arrays are written as is.
 */
export async function writeTree(root: string, files: Record<string, string | Uint8Array>): Promise<void> {
    for (const [relative, content] of Object.entries(files)) {
        const target = path.join(root, ...relative.split('/'));
        if (relative.endsWith('/')) {
            await fs.mkdir(target, { recursive: true });
            continue;
        }
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, content);
    }
}

export function addonXml(id: string, providerName?: string): string {
    const provider = providerName === undefined ? '' : ` provider-name="${providerName}"`;
    return [
        '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
        `<addon id="${id}" name="Demo" version="1.0.0"${provider}>`,
        '    <requires>',
        '        <import addon="xbmc.python" version="3.0.0"/>',
        '    </requires>',
        '    <extension point="xbmc.python.pluginsource" library="main.py"/>',
        '</addon>',
        '',
    ].join('\n');
}
