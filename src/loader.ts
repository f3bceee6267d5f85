import { InflectionData } from './inflectionData';
import { NAMED_MARKER } from './interpolate';
import {
    BadInflectionAlias,
    BadInflectionToken,
    DuplicatedInflectionToken,
    InflectorError
} from './errors';
import { isRecord } from './core';
import type { LocaleDatabases } from './types';

/** Reserved token name holding a kind's default token */
export const DEFAULT_TOKEN_KEY = 'default';

/** Characters that would make a token unusable inside a pattern */
const INVALID_TOKEN_NAME = /[\s,|:!{}@\\]/;

/**
 * Build fresh loose and strict databases from a locale's inflection tree.
 *
 * Kinds prefixed with `@` are stored in the strict database under their bare name.
 * Values prefixed with `@` are aliases; they may point to other aliases of the
 * same kind and are stored resolved to the final true token.
 *
 * Nothing is shared with previously loaded data, so a caller can swap the
 * result in only after loading succeeds.
 *
 * @param locale - Locale the data belongs to
 * @param tree - Inflection data, e.g. `{ gender: { m: 'male', masculine: '@m', default: 'm' } }`
 * @throws {DuplicatedInflectionToken} If a token name is used by two loose kinds
 * @throws {BadInflectionAlias} If an alias or default points to no true token of its kind
 * @throws {BadInflectionToken} If a token has an empty or non-string value, or an invalid name
 *
 * @example
 * ```ts
 * const { loose, strict } = loadInflections('en', {
 *     gender: { m: 'male', f: 'female', default: 'f' },
 *     '@person': { i: 'first', you: 'second' }
 * });
 * loose.getDefaultToken('gender'); // => 'f'
 * strict.hasToken('you', 'person'); // => true
 * ```
 */
export function loadInflections(locale: string, tree: unknown): LocaleDatabases<InflectionData> {
    const loose = new InflectionData(locale);
    const strict = new InflectionData(locale, { strict: true });

    if (tree === undefined || tree === null) {
        return { loose, strict };
    }
    if (!isRecord(tree)) {
        throw new InflectorError(`Inflection data for locale "${locale}" must be an object, got ${typeof tree}.`);
    }

    // Loose kinds share one namespace: remember which kind owns each name
    const owners = new Map<string, string>();

    for (const [kindKey, entries] of Object.entries(tree)) {
        const isStrict = kindKey.startsWith(NAMED_MARKER);
        const kind = isStrict ? kindKey.slice(NAMED_MARKER.length) : kindKey;

        if (!kind || INVALID_TOKEN_NAME.test(kind)) {
            throw new InflectorError(`Inflection kind "${kindKey}" in locale "${locale}" has an invalid name.`);
        }
        if (!isRecord(entries)) {
            throw new InflectorError(`Inflection kind "${kindKey}" in locale "${locale}" must be an object.`);
        }

        loadKind(isStrict ? strict : loose, locale, kind, entries, isStrict ? undefined : owners);
    }

    for (const db of [loose, strict]) {
        const unresolved = db.validateDefaultTokens();
        if (unresolved) {
            throw new BadInflectionAlias(locale, DEFAULT_TOKEN_KEY, unresolved.kind, unresolved.target);
        }
    }

    return { loose, strict };
}

/**
 * Load the tokens, aliases and default of one kind
 */
function loadKind(
    db: InflectionData,
    locale: string,
    kind: string,
    entries: Record<string, unknown>,
    owners: Map<string, string> | undefined
): void {
    const aliases = new Map<string, string>();
    let defaultTarget: string | undefined;

    // --- 1. True tokens first, aliases collected for later ---
    for (const [name, value] of Object.entries(entries)) {
        if (typeof value !== 'string' || value === '' || value === NAMED_MARKER) {
            throw new BadInflectionToken(locale, name, kind, value);
        }

        if (name === DEFAULT_TOKEN_KEY) {
            defaultTarget = value.startsWith(NAMED_MARKER) ? value.slice(NAMED_MARKER.length) : value;
            continue;
        }

        if (INVALID_TOKEN_NAME.test(name) || name === '') {
            throw new BadInflectionToken(locale, name, kind);
        }

        if (owners) {
            const owner = owners.get(name);
            if (owner !== undefined && owner !== kind) {
                throw new DuplicatedInflectionToken(locale, name, kind, owner);
            }
            owners.set(name, kind);
        }

        if (value.startsWith(NAMED_MARKER)) {
            aliases.set(name, value.slice(NAMED_MARKER.length));
        } else {
            db.addToken(name, kind, value);
        }
    }

    // --- 2. Aliases, following alias-to-alias references to a true token ---
    for (const [name, target] of aliases) {
        const seen = new Set<string>([name]);
        let resolved = target;
        while (aliases.has(resolved) && !seen.has(resolved)) {
            seen.add(resolved);
            resolved = aliases.get(resolved) ?? resolved;
        }

        if (!db.addAlias(name, resolved, kind)) {
            throw new BadInflectionAlias(locale, name, kind, target);
        }
    }

    // --- 3. Default token (validated once every kind is loaded) ---
    if (defaultTarget !== undefined) {
        db.setDefaultToken(kind, defaultTarget);
    }
}
