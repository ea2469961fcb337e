import * as fs from 'node:fs';

/**
 * Start a fresh debug log at `filePath` and return a writer for it.
 *
 * Every line is prefixed with an ISO timestamp. The file is created before
 * the run starts, so the whitelist check must be told to skip it.
 */
export function createDebugLog(filePath: string): (message: string) => void {
    fs.writeFileSync(filePath, '');
    return message => {
        fs.appendFileSync(filePath, `${new Date().toISOString()} ${message}\n`);
    };
}
