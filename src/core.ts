import type { InterpolationParams, TranslationData } from './types';

/**
 * Unsafe keys that could lead to prototype pollution attacks.
 * Block these to prevent malicious translation keys from accessing Object prototype.
 */
const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Safely access nested object properties via dot-notation
 * @example getNestedValue({ a: { b: 'hello' } }, 'a.b') // => 'hello'
 * @returns The value at the path, or undefined if not found. Callers should check the type.
 *
 * SECURITY: Blocks __proto__, constructor, and prototype keys.
 */
export function getNestedValue(obj: Record<string, unknown> | undefined | null, path: string): unknown {
    return path.split('.').reduce<unknown>((acc, part) => {
        if (UNSAFE_KEYS.has(part)) return undefined;
        if (isRecord(acc)) {
            return acc[part];
        }
        return undefined;
    }, obj);
}

/**
 * Recursively merge translation data into a copy of `target`.
 * Nested objects are merged, anything else from `source` replaces the target value.
 * Neither argument is modified.
 *
 * SECURITY: Unsafe keys in `source` are skipped.
 */
export function deepMerge(target: TranslationData, source: TranslationData): TranslationData {
    const result: TranslationData = { ...target };
    for (const [key, value] of Object.entries(source)) {
        if (UNSAFE_KEYS.has(key)) continue;
        const existing = result[key];
        result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
    }
    return result;
}

/**
 * Replace {{param}} placeholders with values from params
 *
 * @param text - Text containing placeholders
 * @param key - Translation key, used in warnings
 * @param params - Parameter values; dot paths reach nested values
 * @returns Text with placeholders filled; unknown placeholders are kept as-is
 */
export function interpolateParams(text: string, key: string, params?: InterpolationParams): string {
    // Matches {{var}}, {{ var }}, {{user.name}} and {{user-name}}
    const placeholderRegex = /\{\{\s*([\w.-]+)\s*\}\}/g;

    const hasPlaceholders = placeholderRegex.test(text);
    placeholderRegex.lastIndex = 0; // Reset regex state after test()

    if (!hasPlaceholders) {
        return text;
    }

    if (!params) {
        const matches = text.match(/\{\{\s*([\w.-]+)/g);
        const placeholderNames = matches?.map(m => m.replace(/\{\{\s*/, '')) || [];
        console.warn(
            `[i18n-inflections] Translation '${key}' has placeholders [${placeholderNames.join(', ')}] ` +
            `but no params were provided. Did you forget to pass them?`
        );
        return text;
    }

    return text.replace(placeholderRegex, (_, varPath: string) => {
        const val = getNestedValue(params, varPath);
        if (val === undefined) {
            console.warn(
                `[i18n-inflections] Missing param '${varPath}' for translation '${key}'. ` +
                `Provided params: [${Object.keys(params).join(', ')}]`
            );
            return `{{${varPath}}}`;
        }
        return String(val);
    });
}

/**
 * Core translation logic
 * Completely decoupled from application state and data
 * @param locale - Current locale
 * @param fallbackLocale - Fallback locale when translation is missing
 * @param translations - Dictionary of all translation objects
 * @param key - Translation key (dot notation)
 * @param params - Optional interpolation parameters
 * @param onMissingKey - Optional callback when key is missing in current locale
 * @param inflect - Optional pass run on the raw text before {{param}} substitution,
 *   given the locale the text was actually found in
 * @returns Translated string or the key if not found
 */
export function translateInternal(
    locale: string,
    fallbackLocale: string,
    translations: Record<string, TranslationData>,
    key: string,
    params?: InterpolationParams,
    onMissingKey?: (key: string, locale: string) => void,
    inflect?: (text: string, locale: string) => string
): string {
    const lookup = (messages: TranslationData | undefined): string | undefined => {
        const val = getNestedValue(messages, key);
        return typeof val === 'string' ? val : undefined;
    };

    // 1. Try current locale
    let text = lookup(translations[locale]);
    let textLocale = locale;

    // 2. Fallback to default locale
    if (text === undefined && locale !== fallbackLocale) {
        if (onMissingKey) {
            onMissingKey(key, locale);
        } else {
            console.warn(`[i18n-inflections] Key '${key}' missing in '${locale}'. Fallback to '${fallbackLocale}'.`);
        }
        text = lookup(translations[fallbackLocale]);
        textLocale = fallbackLocale;
    }

    // 3. Return key if nothing found
    if (text === undefined) {
        return key;
    }

    // 4. Inflection patterns, then {{param}} placeholders
    if (inflect) {
        text = inflect(text, textLocale);
    }
    return interpolateParams(text, key, params);
}
