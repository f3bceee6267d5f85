/**
 * Shared Configuration Helper for i18n-inflections
 *
 * Validates and freezes the settings shared by the translation backend
 * and its inflector: locales, where inflection data lives inside
 * translation files, and the default interpolation switches.
 *
 * @example
 * ```ts
 * import { createSharedConfig } from 'i18n-inflections/config';
 *
 * export const sharedConfig = createSharedConfig({
 *     fallbackLocale: 'en',
 *     supportedLocales: ['en', 'pl'],
 *     switches: { excludedDefaults: true }
 * });
 * ```
 */

import type { InflectionSwitches, SharedInflectorConfig } from './types';

/**
 * Default interpolation switches
 */
export const DEFAULT_SWITCHES: Readonly<InflectionSwitches> = Object.freeze({
    raises: false,
    unknownDefaults: true,
    excludedDefaults: false,
    aliasedPatterns: false
});

const SWITCH_NAMES: ReadonlyArray<keyof InflectionSwitches> = [
    'raises',
    'unknownDefaults',
    'excludedDefaults',
    'aliasedPatterns'
];

/**
 * Default values for shared configuration
 */
const DEFAULTS: SharedInflectorConfig = {
    fallbackLocale: 'en',
    inflectionsKey: 'i18n.inflections',
    warnOnAutoFix: true
};

/**
 * Dot path of identifier-like segments, e.g. `i18n.inflections`
 */
export const VALID_INFLECTIONS_KEY_PATTERN = /^[a-zA-Z0-9_-]+(\.[a-zA-Z0-9_-]+)*$/;

function isSwitchName(name: string): name is keyof InflectionSwitches {
    return SWITCH_NAMES.some(known => known === name);
}

/**
 * Validate a partial set of switches and merge it over a base set.
 *
 * @param switches - Switches to apply
 * @param base - Switches to start from
 * @param context - Context string for error messages
 * @throws {Error} If a switch is unknown or not a boolean
 */
export function createInflectionSwitches(
    switches: Partial<InflectionSwitches> = {},
    base: Readonly<InflectionSwitches> = DEFAULT_SWITCHES,
    context: string = 'createInflectionSwitches'
): InflectionSwitches {
    if (typeof switches !== 'object' || switches === null || Array.isArray(switches)) {
        throw new Error(
            `[i18n-inflections] ${context}: switches must be an object, ` +
            `got ${typeof switches}: ${JSON.stringify(switches)}`
        );
    }

    const merged: InflectionSwitches = { ...base };
    for (const [name, value] of Object.entries(switches)) {
        if (!isSwitchName(name)) {
            throw new Error(
                `[i18n-inflections] ${context}: unknown switch '${name}'. ` +
                `Known switches: ${SWITCH_NAMES.join(', ')}.`
            );
        }
        if (value === undefined) continue;
        if (typeof value !== 'boolean') {
            throw new Error(
                `[i18n-inflections] ${context}: switch '${name}' must be a boolean, ` +
                `got ${typeof value}: ${JSON.stringify(value)}`
            );
        }
        merged[name] = value;
    }
    return merged;
}

/**
 * Creates a validated, frozen shared configuration object.
 *
 * @param config - Partial configuration to merge with defaults
 * @returns Frozen SharedInflectorConfig object
 *
 * @throws {Error} If fallbackLocale is not a non-empty string
 * @throws {Error} If inflectionsKey is not a valid dot path
 * @throws {Error} If supportedLocales is not a non-empty array of non-empty strings
 * @throws {Error} If switches contain unknown names or non-boolean values
 */
export function createSharedConfig(config: Partial<SharedInflectorConfig> = {}): Readonly<SharedInflectorConfig> {
    // --- Type Validation ---

    const rawFallbackLocale = config.fallbackLocale ?? DEFAULTS.fallbackLocale;
    if (typeof rawFallbackLocale !== 'string') {
        throw new Error(
            `[i18n-inflections] createSharedConfig: fallbackLocale must be a string, ` +
            `got ${typeof rawFallbackLocale}: ${JSON.stringify(rawFallbackLocale)}`
        );
    }

    if (config.supportedLocales !== undefined && !Array.isArray(config.supportedLocales)) {
        throw new Error(
            `[i18n-inflections] createSharedConfig: supportedLocales must be an array, ` +
            `got ${typeof config.supportedLocales}: ${JSON.stringify(config.supportedLocales)}`
        );
    }

    if (config.warnOnAutoFix !== undefined && typeof config.warnOnAutoFix !== 'boolean') {
        throw new Error(
            `[i18n-inflections] createSharedConfig: warnOnAutoFix must be a boolean, ` +
            `got ${typeof config.warnOnAutoFix}: ${JSON.stringify(config.warnOnAutoFix)}`
        );
    }

    const inflectionsKey = validateInflectionsKey(
        config.inflectionsKey ?? DEFAULTS.inflectionsKey,
        'createSharedConfig'
    );

    const switches = config.switches === undefined
        ? undefined
        : createInflectionSwitches(config.switches, DEFAULT_SWITCHES, 'createSharedConfig');

    const merged: SharedInflectorConfig = {
        fallbackLocale: rawFallbackLocale.trim(),
        supportedLocales: config.supportedLocales ? [...config.supportedLocales] : undefined,
        inflectionsKey,
        switches,
        warnOnAutoFix: config.warnOnAutoFix ?? DEFAULTS.warnOnAutoFix
    };

    const warn = (message: string) => {
        if (merged.warnOnAutoFix) {
            console.warn(message);
        }
    };

    // --- Value Validation ---

    if (merged.fallbackLocale === '') {
        throw new Error(
            '[i18n-inflections] createSharedConfig: fallbackLocale must be a non-empty string'
        );
    }

    if (merged.supportedLocales) {
        if (merged.supportedLocales.length === 0) {
            throw new Error(
                '[i18n-inflections] createSharedConfig: supportedLocales cannot be an empty array'
            );
        }

        // Check types before any trim
        for (let i = 0; i < merged.supportedLocales.length; i++) {
            const locale: unknown = merged.supportedLocales[i];
            if (typeof locale !== 'string') {
                throw new Error(
                    `[i18n-inflections] createSharedConfig: supportedLocales[${i}] must be a string, ` +
                    `got ${typeof locale}: ${JSON.stringify(locale)}`
                );
            }
        }

        merged.supportedLocales = merged.supportedLocales.map(l => l.trim());

        for (let i = 0; i < merged.supportedLocales.length; i++) {
            if (merged.supportedLocales[i] === '') {
                throw new Error(
                    `[i18n-inflections] createSharedConfig: supportedLocales[${i}] is empty or whitespace-only`
                );
            }
        }

        // Remove duplicates (case-insensitive, first occurrence wins)
        const seenLower = new Set<string>();
        const uniqueLocales: string[] = [];
        const removedDuplicates: string[] = [];
        for (const locale of merged.supportedLocales) {
            const lower = locale.toLowerCase();
            if (seenLower.has(lower)) {
                removedDuplicates.push(locale);
            } else {
                seenLower.add(lower);
                uniqueLocales.push(locale);
            }
        }
        if (removedDuplicates.length > 0) {
            warn(
                `[i18n-inflections] createSharedConfig: duplicate locales detected and removed from supportedLocales: ${removedDuplicates.join(', ')}`
            );
            merged.supportedLocales = uniqueLocales;
        }

        // fallbackLocale must be present with identical casing
        const fallbackLower = merged.fallbackLocale.toLowerCase();
        const existingIndex = merged.supportedLocales.findIndex(l => l.toLowerCase() === fallbackLower);

        if (existingIndex === -1) {
            warn(
                `[i18n-inflections] createSharedConfig: fallbackLocale '${merged.fallbackLocale}' ` +
                `was not in supportedLocales. Adding it automatically.`
            );
            merged.supportedLocales = [merged.fallbackLocale, ...merged.supportedLocales];
        } else if (merged.supportedLocales[existingIndex] !== merged.fallbackLocale) {
            const original = merged.supportedLocales[existingIndex];
            merged.supportedLocales[existingIndex] = merged.fallbackLocale;
            warn(
                `[i18n-inflections] createSharedConfig: normalized locale casing '${original}' → '${merged.fallbackLocale}' ` +
                `to match fallbackLocale.`
            );
        }

        Object.freeze(merged.supportedLocales);
    }

    if (merged.switches) {
        Object.freeze(merged.switches);
    }

    return Object.freeze(merged);
}

export type { SharedInflectorConfig } from './types';

/**
 * Validate the dot path under which translation data keeps inflections.
 *
 * @param key - The path to validate
 * @param context - Context string for error messages (e.g., 'createI18n')
 * @returns The trimmed path
 * @throws {Error} If key is not a valid dot path
 */
export function validateInflectionsKey(key: string, context: string = 'validateInflectionsKey'): string {
    if (typeof key !== 'string') {
        throw new Error(
            `[i18n-inflections] ${context}: inflectionsKey must be a string, ` +
            `got ${typeof key}: ${JSON.stringify(key)}`
        );
    }

    const trimmed = key.trim();
    if (trimmed === '') {
        throw new Error(
            `[i18n-inflections] ${context}: inflectionsKey must be a non-empty string`
        );
    }

    if (!VALID_INFLECTIONS_KEY_PATTERN.test(trimmed)) {
        throw new Error(
            `[i18n-inflections] ${context}: inflectionsKey '${trimmed}' is invalid. ` +
            `Use dot-separated segments of letters, digits, hyphens (-) and underscores (_).`
        );
    }

    return trimmed;
}
