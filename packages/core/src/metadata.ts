/**
 * addon.xml loading.
 *
 * The metadata file is parsed once per addon and handed to the checks as an
 * immutable node. Only the root element's attributes are exposed; the checks
 * never need anything deeper.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { MetadataError, errorMessage } from './errors.js';
import { parseXmlRoot, readXmlRoot, type XmlElement } from './xml.js';

/** Name of the metadata file. Matched exactly, including case. */
export const ADDON_XML = 'addon.xml';

/**
 * Read-only view of the addon.xml root element.
 */
export class AddonMetadata {
    private readonly attributes: ReadonlyMap<string, string>;

    constructor(
        readonly tag: string,
        attributes: Iterable<[string, string]>
    ) {
        this.attributes = new Map(attributes);
    }

    /**
     * Value of a root attribute; undefined when it is absent.
     */
    attribute(name: string): string | undefined {
        return this.attributes.get(name);
    }

    get id(): string | undefined {
        return this.attribute('id');
    }

    get providerName(): string | undefined {
        return this.attribute('provider-name');
    }

    get version(): string | undefined {
        return this.attribute('version');
    }

    get name(): string | undefined {
        return this.attribute('name');
    }
}

/**
 * Check for a file with exactly this name directly inside the addon root.
 *
 * Uses the directory listing rather than fs.existsSync so that a file named
 * "Addon.XML" does not count on case-insensitive file systems.
 */
export function addonFileExists(addonPath: string, fileName: string): boolean {
    try {
        return fs.readdirSync(addonPath, { withFileTypes: true })
            .some(entry => entry.isFile() && entry.name === fileName);
    } catch {
        // addon path is not a readable directory
        return false;
    }
}

/**
 * Parse addon.xml content.
 *
 * @throws MetadataError when the content is not well-formed XML or has no
 *         root element
 */
export function parseAddonMetadata(content: string | Uint8Array): AddonMetadata {
    let root: XmlElement;
    try {
        root = typeof content === 'string' ? parseXmlRoot(content) : readXmlRoot(content);
    } catch (error) {
        throw new MetadataError(`Invalid addon.xml: ${errorMessage(error)}`, { cause: error });
    }

    return new AddonMetadata(root.name, root.attributes);
}

/**
 * Read and parse the addon.xml of an addon.
 *
 * @throws MetadataError when the file is missing or not parseable
 */
export function loadAddonMetadata(addonPath: string): AddonMetadata {
    if (!addonFileExists(addonPath, ADDON_XML)) {
        throw new MetadataError(`${ADDON_XML} not found in ${addonPath}`);
    }

    let content: Buffer;
    try {
        content = fs.readFileSync(path.join(addonPath, ADDON_XML));
    } catch (error) {
        throw new MetadataError(`Cannot read ${ADDON_XML}: ${errorMessage(error)}`, { cause: error });
    }

    return parseAddonMetadata(content);
}

/**
 * Like loadAddonMetadata, but returns null instead of throwing MetadataError.
 */
export function tryLoadAddonMetadata(addonPath: string): AddonMetadata | null {
    try {
        return loadAddonMetadata(addonPath);
    } catch (error) {
        if (error instanceof MetadataError) {
            return null;
        }
        throw error;
    }
}
