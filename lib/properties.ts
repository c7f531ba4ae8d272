import { PropertiesParseError } from './errors';

const XML_DECLARATION = /^\uFEFF?\s*<\?xml[\s\S]*?\?>/;
const DOCTYPE = /^\s*<!DOCTYPE[^>]*>/;
const COMMENT_PATTERN = /<!--[\s\S]*?-->/g;
const ROOT_PATTERN = /^\s*(?:<properties\s*\/>|<properties\s*>([\s\S]*)<\/properties\s*>)\s*$/;
const CDATA_PATTERN = /<!\[CDATA\[([\s\S]*?)\]\]>/g;

const WHITESPACE = /\s+/y;
const COMMENT_ELEMENT = /<comment\s*(?:\/>|>[^<]*<\/comment\s*>)/y;
const ENTRY_ELEMENT = /<entry\s+key\s*=\s*(?:"([^<"]*)"|'([^<']*)')\s*(?:\/>|>((?:[^<]|<!\[CDATA\[[\s\S]*?\]\]>)*)<\/entry\s*>)/y;

const NAMED_ENTITIES: Record<string, string> = {
    lt: '<',
    gt: '>',
    amp: '&',
    quot: '"',
    apos: "'",
};

function decodeCharacterReference(ref: string): string {
    const codePoint = ref.startsWith('#x')
        ? parseInt(ref.slice(2), 16)
        : parseInt(ref.slice(1), 10);

    const valid = Number.isInteger(codePoint)
        && codePoint > 0
        && codePoint <= 0x10ffff
        && (codePoint < 0xd800 || codePoint > 0xdfff);
    if (!valid) {
        throw new PropertiesParseError(`Invalid character reference &${ref};`);
    }
    return String.fromCodePoint(codePoint);
}

function decodeEntities(text: string): string {
    return text.replace(/&([^;&]*)(;?)/g, (match, ref: string, semicolon: string) => {
        if (!semicolon) {
            throw new PropertiesParseError(`Unterminated entity reference ${match}`);
        }
        if (/^#x[0-9a-fA-F]+$|^#[0-9]+$/.test(ref)) {
            return decodeCharacterReference(ref);
        }
        const named = NAMED_ENTITIES[ref];
        if (named === undefined) {
            throw new PropertiesParseError(`Undeclared entity &${ref};`);
        }
        return named;
    });
}

/**
 * Decodes element text, leaving CDATA sections verbatim
 */
function decodeText(text: string): string {
    let result = '';
    let last = 0;
    for (const match of text.matchAll(CDATA_PATTERN)) {
        const index = match.index ?? 0;
        result += decodeEntities(text.slice(last, index)) + match[1];
        last = index + match[0].length;
    }
    return result + decodeEntities(text.slice(last));
}

function matchAt(pattern: RegExp, text: string, position: number): RegExpExecArray | null {
    pattern.lastIndex = position;
    return pattern.exec(text);
}

/**
 * Parses an XML properties document
 * (`<properties><entry key="...">value</entry></properties>`).
 * A key that appears twice keeps its last value.
 * Throws PropertiesParseError for anything that is not a well-formed properties document.
 */
export function parseXmlProperties(xml: string): Map<string, string> {
    const content = xml
        .replace(XML_DECLARATION, '')
        .replace(COMMENT_PATTERN, '')
        .replace(DOCTYPE, '');

    const root = ROOT_PATTERN.exec(content);
    if (!root) {
        throw new PropertiesParseError('Document is not a single <properties> element');
    }

    const properties = new Map<string, string>();
    const body = root[1] ?? '';
    let position = 0;

    while (position < body.length) {
        const whitespace = matchAt(WHITESPACE, body, position);
        if (whitespace) {
            position += whitespace[0].length;
            continue;
        }

        const comment = matchAt(COMMENT_ELEMENT, body, position);
        if (comment) {
            position += comment[0].length;
            continue;
        }

        const entry = matchAt(ENTRY_ELEMENT, body, position);
        if (!entry) {
            throw new PropertiesParseError(`Unexpected content at offset ${position}: ${body.slice(position, position + 40)}`);
        }

        const key = decodeEntities(entry[1] ?? entry[2] ?? '');
        const value = entry[3] === undefined ? '' : decodeText(entry[3]);
        properties.set(key, value);
        position += entry[0].length;
    }

    return properties;
}
