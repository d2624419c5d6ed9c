/**
 * Object names for managed instances
 *
 * `domain:key=value[,key=value...]`. Two names that differ only in the order
 * of their key properties are the same name; the canonical form lists the
 * properties sorted by key.
 *
 * @module ObjectName
 */

import { MalformedObjectNameError } from "./errors.ts";

const ILLEGAL_KEY_CHARS = /[:,=*?"]/;
const ILLEGAL_VALUE_CHARS = /[=:"*?]/;
const QUOTED_ESCAPES = new Set(['"', "\\", "*", "?", "n"]);

function compareKeys(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Parsed, validated object name
 *
 * @example
 * ```typescript
 * const name = ObjectName.parse("app:type=Cache,name=users");
 * name.canonicalName; // "app:name=users,type=Cache"
 * name.getKeyProperty("type"); // "Cache"
 * ```
 */
export class ObjectName {
    readonly domain: string;
    readonly canonicalName: string;
    private readonly properties: ReadonlyMap<string, string>;

    private constructor(domain: string, properties: ReadonlyMap<string, string>) {
        this.domain = domain;
        this.properties = properties;

        const sorted = [...properties.entries()].sort(([a], [b]) => compareKeys(a, b));
        this.canonicalName = `${domain}:${sorted.map(([key, value]) => `${key}=${value}`).join(",")}`;
    }

    /**
     * Parse object name text
     *
     * @throws {MalformedObjectNameError} If the text is not a valid object name
     */
    static parse(text: string): ObjectName {
        const separator = text.indexOf(":");
        if (separator === -1) {
            throw new MalformedObjectNameError(text, "missing ':' after domain");
        }

        const domain = text.slice(0, separator);
        if (/[*?\n]/.test(domain)) {
            throw new MalformedObjectNameError(text, "domain contains an illegal character");
        }

        return new ObjectName(domain, parseKeyProperties(text, text.slice(separator + 1)));
    }

    /**
     * Build an object name from a domain and key properties
     *
     * @throws {MalformedObjectNameError} If a key or value is not valid
     */
    static of(domain: string, properties: Readonly<Record<string, string>>): ObjectName {
        const text = `${domain}:${Object.entries(properties)
            .map(([key, value]) => `${key}=${value}`)
            .join(",")}`;
        return ObjectName.parse(text);
    }

    /**
     * Value of a key property, or undefined if the name has no such key
     */
    getKeyProperty(key: string): string | undefined {
        return this.properties.get(key);
    }

    /**
     * Key properties in the order they were written
     */
    get keyProperties(): ReadonlyMap<string, string> {
        return new Map(this.properties);
    }

    equals(other: ObjectName): boolean {
        return this.canonicalName === other.canonicalName;
    }

    toString(): string {
        return this.canonicalName;
    }
}

function parseKeyProperties(text: string, list: string): Map<string, string> {
    if (list.length === 0) {
        throw new MalformedObjectNameError(text, "no key properties");
    }

    const properties = new Map<string, string>();
    let pos = 0;

    while (pos <= list.length) {
        const equals = list.indexOf("=", pos);
        const comma = list.indexOf(",", pos);
        if (equals === -1 || (comma !== -1 && comma < equals)) {
            throw new MalformedObjectNameError(text, "key property without '='");
        }

        const key = list.slice(pos, equals);
        if (key.length === 0) {
            throw new MalformedObjectNameError(text, "empty key");
        }
        if (ILLEGAL_KEY_CHARS.test(key) || key.includes("\n")) {
            throw new MalformedObjectNameError(text, `key '${key}' contains an illegal character`);
        }
        if (properties.has(key)) {
            throw new MalformedObjectNameError(text, `duplicate key '${key}'`);
        }

        const { value, end } = list[equals + 1] === '"' ? readQuotedValue(text, list, equals + 1) : readPlainValue(text, list, equals + 1);
        properties.set(key, value);

        if (end === list.length) {
            break;
        }
        if (list[end] !== ",") {
            throw new MalformedObjectNameError(text, `unexpected '${list[end]}' after value of '${key}'`);
        }
        pos = end + 1;
        if (pos === list.length) {
            throw new MalformedObjectNameError(text, "trailing ','");
        }
    }

    return properties;
}

function readPlainValue(text: string, list: string, start: number): { value: string; end: number } {
    const comma = list.indexOf(",", start);
    const end = comma === -1 ? list.length : comma;
    const value = list.slice(start, end);

    if (value.length === 0) {
        throw new MalformedObjectNameError(text, "empty value");
    }
    if (ILLEGAL_VALUE_CHARS.test(value) || value.includes("\n")) {
        throw new MalformedObjectNameError(text, `value '${value}' contains an illegal character; quote it`);
    }
    return { value, end };
}

/** Quoted values keep their quotes and escapes, as written. */
function readQuotedValue(text: string, list: string, start: number): { value: string; end: number } {
    let pos = start + 1;
    while (pos < list.length) {
        const char = list[pos];
        if (char === "\\") {
            const escaped = list[pos + 1];
            if (escaped === undefined || !QUOTED_ESCAPES.has(escaped)) {
                throw new MalformedObjectNameError(text, "invalid escape in quoted value");
            }
            pos += 2;
            continue;
        }
        if (char === '"') {
            return { value: list.slice(start, pos + 1), end: pos + 1 };
        }
        if (char === "\n") {
            throw new MalformedObjectNameError(text, "newline in quoted value");
        }
        pos++;
    }
    throw new MalformedObjectNameError(text, "unterminated quoted value");
}
