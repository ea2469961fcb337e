/**
 * Strict XML reading shared by the well-formedness check and the addon.xml
 * loader.
 *
 * Bytes are decoded by the encoding the document declares (UTF-8 when it
 * declares none, UTF-16 when it starts with a UTF-16 byte order mark), and
 * decoding is fatal: a byte sequence that is not valid in that encoding
 * makes the document invalid. Parsing is done by saxes, which rejects
 * undefined entities, text or a second element after the root, and a
 * document without a root.
 */

import { TextDecoder } from 'node:util';
import { SaxesParser } from 'saxes';
import { XmlError } from './errors.js';

export interface XmlElement {
    name: string;
    attributes: ReadonlyMap<string, string>;
}

const DECLARED_ENCODING = /^<\?xml[^>]*?\sencoding\s*=\s*["']([A-Za-z][A-Za-z0-9._-]*)["']/;

/**
 * Decode an XML document.
 *
 * @throws XmlError for an unknown encoding or bytes that do not decode
 */
export function decodeXml(bytes: Uint8Array): string {
    let encoding = 'utf-8';
    if (bytes[0] === 0xfe && bytes[1] === 0xff) {
        encoding = 'utf-16be';
    } else if (bytes[0] === 0xff && bytes[1] === 0xfe) {
        encoding = 'utf-16le';
    } else {
        // The declaration is ASCII in every encoding a single-byte prefix can carry
        const head = Buffer.from(bytes.subarray(0, 200)).toString('latin1');
        const declared = DECLARED_ENCODING.exec(head)?.[1];
        if (declared !== undefined) {
            encoding = declared.toLowerCase();
        }
    }

    let decoder: TextDecoder;
    try {
        decoder = new TextDecoder(encoding, { fatal: true });
    } catch (error) {
        throw new XmlError(`Unsupported encoding "${encoding}"`, { cause: error });
    }

    try {
        return decoder.decode(bytes);
    } catch (error) {
        throw new XmlError(`Not valid ${encoding}`, { cause: error });
    }
}

/**
 * Parse a whole document and return its root element.
 *
 * @throws XmlError when the document is not well-formed
 */
export function parseXmlRoot(content: string): XmlElement {
    const parser = new SaxesParser();
    // Written from the parser callbacks
    const state: { root?: XmlElement; failure?: Error; depth: number } = { depth: 0 };

    const fail = (error: Error): void => {
        if (state.failure === undefined) {
            state.failure = error;
        }
    };

    parser.on('error', fail);
    parser.on('opentag', tag => {
        if (state.depth === 0) {
            if (state.root !== undefined) {
                fail(new Error('junk after document element'));
            } else {
                const attributes = new Map<string, string>();
                for (const [key, value] of Object.entries(tag.attributes)) {
                    if (typeof value === 'string') {
                        attributes.set(key, value);
                    }
                }
                state.root = { name: tag.name, attributes };
            }
        }
        if (!tag.isSelfClosing) {
            state.depth++;
        }
    });
    parser.on('closetag', tag => {
        if (!tag.isSelfClosing) {
            state.depth--;
        }
    });

    parser.write(content).close();

    if (state.failure !== undefined) {
        throw new XmlError(state.failure.message, { cause: state.failure });
    }
    if (state.root === undefined) {
        throw new XmlError('no element found');
    }
    return state.root;
}

/**
 * Decode and parse in one step.
 *
 * @throws XmlError
 */
export function readXmlRoot(bytes: Uint8Array): XmlElement {
    return parseXmlRoot(decodeXml(bytes));
}
