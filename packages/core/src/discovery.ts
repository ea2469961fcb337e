/**
 * Addon discovery.
 *
 * Turns the configured paths into the list of addon directories to check.
 * A path can be an addon directory, a repository directory holding several
 * addons, or a zip archive of an addon as it is distributed.
 */

import fastGlob from 'fast-glob';
import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DiscoveryError } from './errors.js';
import { ADDON_XML, addonFileExists } from './metadata.js';

/**
 * One addon to check.
 */
export interface DiscoveredAddon {
    /** Absolute path of the addon directory */
    addonPath: string;

    /** Path shown in reports */
    displayPath: string;
}

/**
 * Options for addon discovery.
 */
export interface DiscoveryOptions {
    /** Base directory for resolving relative paths */
    basePath: string;

    /**
     * Directory zip archives are extracted into. Required when any path is a
     * zip archive; the caller owns and removes it.
     */
    extractDir?: string;
}

/**
 * Discover addons for the given paths.
 *
 * - `*.zip` files are extracted and every top-level directory in the archive
 *   is an addon
 * - a directory with an addon.xml is an addon
 * - any other directory is a repository: its immediate subdirectories holding
 *   an addon.xml are addons. A directory with none of those is still checked
 *   as an addon, so its missing addon.xml gets reported.
 *
 * Addons are returned in the order of `paths`; within a repository or an
 * archive they are sorted by name.
 *
 * @throws DiscoveryError when a path does not exist or a zip archive is given
 *         without an extraction directory
 */
export async function discoverAddons(
    paths: string[],
    options: DiscoveryOptions
): Promise<DiscoveredAddon[]> {
    const addons: DiscoveredAddon[] = [];

    for (const input of paths) {
        const absolute = path.resolve(options.basePath, input);

        let stats: Stats;
        try {
            stats = await fs.stat(absolute);
        } catch (error) {
            throw new DiscoveryError(`Path not found: ${input}`, { cause: error });
        }

        if (stats.isFile() && path.extname(absolute).toLowerCase() === '.zip') {
            if (!options.extractDir) {
                throw new DiscoveryError(`No extraction directory for archive ${input}`);
            }
            addons.push(...await discoverArchive(absolute, options.extractDir, options.basePath));
            continue;
        }

        if (!stats.isDirectory()) {
            throw new DiscoveryError(`Not an addon directory or zip archive: ${input}`);
        }

        addons.push(...await discoverDirectory(absolute, options.basePath));
    }

    return addons;
}

async function discoverDirectory(directory: string, basePath: string): Promise<DiscoveredAddon[]> {
    if (addonFileExists(directory, ADDON_XML)) {
        return [{ addonPath: directory, displayPath: displayPathFor(basePath, directory) }];
    }

    const children = await findAddonDirectories(directory);
    if (children.length === 0) {
        return [{ addonPath: directory, displayPath: displayPathFor(basePath, directory) }];
    }

    return children.map(child => ({
        addonPath: child,
        displayPath: displayPathFor(basePath, child),
    }));
}

/**
 * Immediate subdirectories of `directory` that hold an addon.xml, sorted.
 */
async function findAddonDirectories(directory: string): Promise<string[]> {
    const manifests = await fastGlob(`*/${ADDON_XML}`, {
        cwd: directory,
        onlyFiles: true,
        caseSensitiveMatch: true,
    });

    return manifests
        .map(manifest => path.join(directory, path.dirname(manifest)))
        .sort((a, b) => a.localeCompare(b));
}

async function discoverArchive(
    archivePath: string,
    extractDir: string,
    basePath: string
): Promise<DiscoveredAddon[]> {
    const extractPath = await unpackAddonArchive(archivePath, extractDir);
    const archiveName = displayPathFor(basePath, archivePath);

    const entries = await fs.readdir(extractPath, { withFileTypes: true });
    const directories = entries
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name)
        .sort((a, b) => a.localeCompare(b));

    // An archive without a top-level folder is checked as the addon itself
    if (directories.length === 0) {
        return [{ addonPath: extractPath, displayPath: archiveName }];
    }

    return directories.map(name => ({
        addonPath: path.join(extractPath, name),
        displayPath: `${archiveName}/${name}`,
    }));
}

/**
 * Extract an addon zip archive and return the path it was extracted to.
 *
 * Each archive gets its own directory under `targetDir`, so the folder
 * inside the archive keeps its name and the folder/id check still applies.
 *
 * @param archivePath - Path to the zip file
 * @param targetDir - Directory to extract into
 */
export async function unpackAddonArchive(
    archivePath: string,
    targetDir: string
): Promise<string> {
    // Dynamic import to avoid loading adm-zip unless needed
    const AdmZip = (await import('adm-zip')).default;

    const extractPath = await fs.mkdtemp(
        path.join(targetDir, `${path.basename(archivePath, path.extname(archivePath))}-`)
    );

    try {
        const zip = new AdmZip(archivePath);
        zip.extractAllTo(extractPath, true);
    } catch (error) {
        throw new DiscoveryError(`Cannot extract ${archivePath}`, { cause: error });
    }

    return extractPath;
}

function displayPathFor(basePath: string, target: string): string {
    const relative = path.relative(basePath, target).split(path.sep).join('/');
    // The base path itself, or something outside it
    if (relative === '' || relative.startsWith('..')) {
        return path.basename(target);
    }
    return relative;
}
