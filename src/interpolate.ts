import type { InflectionData } from './inflectionData';
import type { InflectionOptionValues, InflectionSwitches, LocaleDatabases } from './types';
import {
    InflectionOptionIncorrect,
    InflectionOptionNotFound,
    InvalidInflectionToken,
    MisplacedInflectionToken
} from './errors';

// --- PATTERN SYNTAX ---

/** Marks named (strict) patterns and option keys, and doubles as an escape: `@@{...}` */
export const NAMED_MARKER = '@';

/** Backslash escape: `\@{...}`, or a leading `\` in a value */
export const ESCAPE = '\\';

/** Value that is replaced by the matched token's description */
export const LOUD_MARKER = '~';

export const OPERATOR_NOT = '!';
export const OPERATOR_MULTI = ',';
export const GROUP_SEPARATOR = '|';
export const VALUE_SEPARATOR = ':';

/**
 * Matches `@{...}` and `@kind{...}` with the preceding character captured
 * so escaped patterns can be told apart.
 *
 * Pattern content may hold brace placeholders up to two levels deep
 * (`%{name}`, `{{name}}`), which pass through to the host untouched.
 */
export const PATTERN = /(.?)@([^\s{}@|:,!\\]*)\{((?:[^{}]|\{(?:[^{}]|\{[^{}]*\})*\})+)\}/g;

// --- HELPERS ---

function hasOption(options: InflectionOptionValues, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(options, key);
}

/**
 * Read an option value as a token name.
 * Values that cannot name a token count as empty.
 */
function toTokenName(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    if (typeof value === 'symbol') return value.description;
    return undefined;
}

interface TokenGroup {
    tokenList: string;
    value: string;
}

/**
 * Split pattern content into token groups and the trailing free text.
 * Only the last segment can act as free text; empty segments are ignored.
 */
function parseGroups(content: string): { groups: TokenGroup[]; freeText: string } {
    const segments = content.split(GROUP_SEPARATOR);
    const groups: TokenGroup[] = [];
    let freeText = '';

    segments.forEach((segment, index) => {
        const separator = segment.indexOf(VALUE_SEPARATOR);
        if (separator === -1) {
            if (index === segments.length - 1) freeText = segment;
            return;
        }
        groups.push({
            tokenList: segment.slice(0, separator),
            value: segment.slice(separator).replace(/^:+/, '')
        });
    });

    return { groups, freeText };
}

// --- INTERPOLATION ---

/**
 * Interpolate every inflection pattern found in a string.
 *
 * @param text - Translation string containing `@{...}` / `@kind{...}` patterns
 * @param databases - Loose and strict inflection data for the string's locale
 * @param options - Values keyed by kind (`gender`) or strict kind (`@gender`)
 * @param switches - Interpolation switches, already merged with defaults
 * @returns The string with each pattern replaced by its selected value
 *
 * @example
 * ```ts
 * interpolate('Dear @{f:Lady|m:Sir|All}!', databases, { gender: 'm' }, switches);
 * // => 'Dear Sir!'
 * ```
 */
export function interpolate(
    text: string,
    databases: LocaleDatabases<InflectionData>,
    options: InflectionOptionValues,
    switches: InflectionSwitches
): string {
    if (!text.includes(NAMED_MARKER)) return text;

    return text.replace(PATTERN, (match: string, prefix: string, strictKind: string, content: string) => {
        // Escaped: drop the escape character, keep the rest verbatim
        if (prefix === NAMED_MARKER || prefix === ESCAPE) {
            return match.slice(1);
        }
        const pattern = match.slice(prefix.length);
        return prefix + interpolatePattern(pattern, strictKind, content, databases, options, switches);
    });
}

/**
 * Resolve a single pattern occurrence
 */
function interpolatePattern(
    pattern: string,
    strictKind: string,
    content: string,
    databases: LocaleDatabases<InflectionData>,
    options: InflectionOptionValues,
    switches: InflectionSwitches
): string {
    const { raises, unknownDefaults, excludedDefaults, aliasedPatterns } = switches;
    const named = strictKind !== '';
    const db = named ? databases.strict : databases.loose;
    // Kind passed to database lookups: only named patterns scope by kind up front
    const scope = named ? strictKind : undefined;
    const strictKey = named ? NAMED_MARKER + strictKind : undefined;

    let kind = scope;
    let defaultToken = named ? db.getDefaultToken(strictKind) : undefined;
    let requested: string | undefined;
    let defaultValue: string | undefined;
    let found: string | undefined;
    let foundValue = '';

    const { groups, freeText } = parseGroups(content);

    for (const { tokenList, value } of groups) {
        const positives = new Set<string>();
        const negatives = new Set<string>();

        // --- 1. Parse tokens, binding the pattern's kind on the first valid one ---
        for (const raw of tokenList.split(OPERATOR_MULTI)) {
            const negative = raw.startsWith(OPERATOR_NOT);
            let name = negative ? raw.slice(OPERATOR_NOT.length) : raw;

            if (!name) {
                if (raises) throw new InvalidInflectionToken(pattern, raw);
                continue;
            }

            if (aliasedPatterns) {
                name = db.getTrueToken(name, scope) ?? name;
            }

            const tokenKind = db.getKind(name, scope);
            if (tokenKind === undefined) {
                if (raises) throw new InvalidInflectionToken(pattern, name);
                continue;
            }

            if (kind === undefined) {
                kind = tokenKind;
                defaultToken = db.getDefaultToken(kind);
            } else if (tokenKind !== kind) {
                if (raises) throw new MisplacedInflectionToken(pattern, name, kind);
                continue;
            }

            (negative ? negatives : positives).add(name);
        }

        // --- 2. Pick the option: @kind beats kind for named patterns ---
        const key = strictKey !== undefined && hasOption(options, strictKey)
            ? strictKey
            : kind !== undefined && hasOption(options, kind) ? kind : undefined;

        let option: string | undefined;
        if (key === undefined) {
            requested = undefined;
            option = defaultToken;
        } else {
            requested = toTokenName(options[key]);
            option = requested ? db.getTrueToken(requested, kind) : undefined;
            if (option === undefined && unknownDefaults) {
                option = defaultToken;
            }
        }

        if (option === undefined && raises) {
            throw key === undefined
                ? new InflectionOptionNotFound(pattern, strictKey ?? kind, tokenList)
                : new InflectionOptionIncorrect(pattern, key, tokenList, options[key]);
        }

        // --- 3. Match the group ---
        const matches = (token: string | undefined): boolean => {
            switch (negatives.size) {
                case 0: return token !== undefined && positives.has(token);
                case 1: return token === undefined || !negatives.has(token);
                default: return true;
            }
        };

        if (excludedDefaults && defaultToken !== undefined && defaultValue === undefined && matches(defaultToken)) {
            defaultValue = value;
        }

        if (matches(option)) {
            found = option ?? '';
            foundValue = value;
            break;
        }
    }

    // --- 4. Emit ---
    if (found === undefined) {
        if (excludedDefaults && defaultValue !== undefined && kind !== undefined && db.hasToken(requested, kind)) {
            return defaultValue;
        }
        return freeText;
    }

    if (foundValue === LOUD_MARKER) {
        return db.getDescription(found, kind) ?? '';
    }
    if (foundValue.startsWith(ESCAPE)) {
        return foundValue.slice(ESCAPE.length);
    }
    return foundValue;
}
