import { translateInternal, deepMerge, getNestedValue, isRecord } from './core';
import { createInflectionSwitches, validateInflectionsKey } from './config';
import { Inflector } from './inflector';
import type {
    I18nConfig,
    InterpolationParams,
    TranslateOptions,
    TranslationData
} from './types';

/**
 * Translation backend with inflection support
 */
export interface I18nInstance {
    /** Current locale */
    readonly locale: string;
    readonly fallbackLocale: string;
    /** Inflection data and queries for every locale with stored translations */
    readonly inflector: Inflector;

    /**
     * Switch the current locale.
     * @returns false (and keeps the current locale) if the locale is not supported
     */
    setLocale(locale: string): boolean;

    /**
     * Merge translation data into a locale and reload its inflections.
     * Nothing changes if the merged inflection data is invalid.
     */
    storeTranslations(locale: string, data: TranslationData): void;

    /**
     * Translate a key, resolving inflection patterns and {{param}} placeholders.
     * `params` provides both the inflection options (`gender`, `@gender`)
     * and placeholder values.
     */
    t(key: string, params?: InterpolationParams, options?: TranslateOptions): string;
}

/**
 * Creates a translation backend whose strings may contain inflection patterns.
 *
 * @example
 * ```ts
 * import { createI18n } from 'i18n-inflections';
 *
 * const i18n = createI18n({
 *     initialLocale: 'en',
 *     translations: {
 *         en: {
 *             i18n: { inflections: { gender: { f: 'female', m: 'male', default: 'f' } } },
 *             welcome: 'Dear @{f:Madam|m:Sir}, welcome back {{name}}!'
 *         }
 *     }
 * });
 *
 * i18n.t('welcome', { gender: 'm', name: 'Alex' }); // => 'Dear Sir, welcome back Alex!'
 * ```
 */
export function createI18n(config: I18nConfig = {}): I18nInstance {
    // Resolution: explicit > shared > hardcoded default
    const { shared } = config;
    const fallbackLocale = config.fallbackLocale ?? shared?.fallbackLocale ?? 'en';
    const inflectionsKey = validateInflectionsKey(
        config.inflectionsKey ?? shared?.inflectionsKey ?? 'i18n.inflections',
        'createI18n'
    );
    const switches = createInflectionSwitches(
        config.switches,
        createInflectionSwitches(shared?.switches, undefined, 'createI18n'),
        'createI18n'
    );
    const warnOnAutoFix = shared?.warnOnAutoFix ?? true;
    const onMissingKey = config.onMissingKey;

    const warnAuto = (message: string) => {
        if (warnOnAutoFix) {
            console.warn(message);
        }
    };

    const translations: Record<string, TranslationData> = {};
    const inflector = new Inflector({ switches });

    /**
     * Case-insensitive locale lookup against supported locales, or against
     * the locales with stored translations when none are configured.
     * Returns the canonical casing, or null if not supported.
     */
    function findLocale(locale: string): string | null {
        const known = shared?.supportedLocales ?? Object.keys(translations);
        if (known.includes(locale)) {
            return locale;
        }
        const lower = locale.toLowerCase();
        return known.find(l => l.toLowerCase() === lower) ?? null;
    }

    function storeTranslations(locale: string, data: TranslationData): void {
        if (!isRecord(data)) {
            throw new Error(
                `[i18n-inflections] storeTranslations: translations for '${locale}' must be an object, ` +
                `got ${typeof data}`
            );
        }
        // Load into fresh databases first; commit translations only on success
        const merged = deepMerge(translations[locale] ?? {}, data);
        inflector.loadInflections(locale, getNestedValue(merged, inflectionsKey));
        translations[locale] = merged;
    }

    for (const [locale, data] of Object.entries(config.translations ?? {})) {
        storeTranslations(locale, data);
    }

    if (Object.keys(translations).length === 0) {
        warnAuto('[i18n-inflections] No translations provided. All t() calls will return the key until storeTranslations() is called.');
    }

    // --- INITIAL LOCALE ---
    const normalizedInitialLocale = config.initialLocale ? findLocale(config.initialLocale) : null;
    if (config.initialLocale && !normalizedInitialLocale) {
        warnAuto(
            `[i18n-inflections] Explicit initialLocale '${config.initialLocale}' is not in supported locales. ` +
            `Falling back to '${fallbackLocale}'.`
        );
    }

    let currentLocale = normalizedInitialLocale ?? fallbackLocale;
    inflector.locale = currentLocale;

    function setLocale(locale: string): boolean {
        const found = findLocale(locale);
        if (!found) {
            warnAuto(`[i18n-inflections] Locale '${locale}' is not supported. Keeping '${currentLocale}'.`);
            return false;
        }
        currentLocale = found;
        inflector.locale = found;
        return true;
    }

    function t(key: string, params?: InterpolationParams, options: TranslateOptions = {}): string {
        const locale = options.locale ?? currentLocale;
        return translateInternal(
            locale,
            fallbackLocale,
            translations,
            key,
            params,
            onMissingKey,
            (text, textLocale) => inflector.interpolate(text, textLocale, params, options.switches)
        );
    }

    return {
        get locale() {
            return currentLocale;
        },
        fallbackLocale,
        inflector,
        setLocale,
        storeTranslations,
        t
    };
}

export { Inflector, StrictInflector } from './inflector';
export type { InflectorOptions } from './inflector';
export { InflectionData } from './inflectionData';
export { InflectionRegistry } from './registry';
export { interpolate, PATTERN, NAMED_MARKER, ESCAPE, LOUD_MARKER } from './interpolate';
export { loadInflections, DEFAULT_TOKEN_KEY } from './loader';
export { translateInternal, interpolateParams, getNestedValue, deepMerge } from './core';
export { createSharedConfig, createInflectionSwitches, DEFAULT_SWITCHES } from './config';
export * from './errors';
export type * from './types';
