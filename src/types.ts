// --- INFLECTION DATA TYPES ---

/**
 * A true token: a symbolic value with its own kind and description.
 */
export interface TrueTokenEntry {
    type: 'token';
    name: string;
    kind: string;
    description: string;
}

/**
 * An alias: redirects to a true token of the same kind.
 * Aliases never point at other aliases, so resolution is always one hop.
 */
export interface AliasEntry {
    type: 'alias';
    name: string;
    kind: string;
    target: string;
}

export type TokenEntry = TrueTokenEntry | AliasEntry;

/**
 * Value returned by raw token readers.
 * True tokens carry their description, aliases the name of their target.
 */
export type RawTokenValue =
    | { type: 'token'; description: string }
    | { type: 'alias'; target: string };

/**
 * Options for constructing an inflection database
 */
export interface InflectionDataOptions {
    /**
     * When true, the kind takes part in token identity:
     * the same token name may exist under several kinds,
     * and every lookup must name its kind.
     *
     * @default false
     */
    strict?: boolean;
}

/**
 * A default token that could not be resolved to a true token
 */
export interface UnresolvedDefault {
    kind: string;
    target: string;
}

// --- INTERPOLATION TYPES ---

/**
 * Switches controlling pattern interpolation.
 */
export interface InflectionSwitches {
    /**
     * Raise typed errors for invalid tokens, misplaced tokens
     * and missing or incorrect options instead of skipping them.
     * @default false
     */
    raises: boolean;

    /**
     * Fall back to the kind's default token when the given option
     * is empty or names no known token of the kind.
     * @default true
     */
    unknownDefaults: boolean;

    /**
     * When a valid option matches no group, use the value of the group
     * that the default token would have matched instead of the free text.
     * @default false
     */
    excludedDefaults: boolean;

    /**
     * Resolve aliases used inside patterns to their true tokens before matching.
     * @default false
     */
    aliasedPatterns: boolean;
}

/**
 * Values supplied at render time, keyed by kind name (`gender`)
 * or by strict kind name (`@gender`). Non-inflection keys are ignored
 * by the interpolator and left for parameter substitution.
 */
export interface InflectionOptionValues {
    [kind: string]: unknown;
}

/**
 * Per-locale databases handed to the interpolator
 */
export interface LocaleDatabases<Db> {
    loose: Db;
    strict: Db;
}

// --- SHARED CONFIGURATION ---

/**
 * Shared configuration for the translation backend and its inflector.
 *
 * @example
 * ```ts
 * import { createSharedConfig } from 'i18n-inflections/config';
 *
 * export const sharedConfig = createSharedConfig({
 *     fallbackLocale: 'en',
 *     supportedLocales: ['en', 'pl'],
 *     switches: { raises: true }
 * });
 *
 * const i18n = createI18n({ shared: sharedConfig, translations });
 * ```
 */
export interface SharedInflectorConfig {
    /**
     * Locale used when a key is missing in the current locale.
     */
    fallbackLocale: string;

    /**
     * List of supported locale codes for validation.
     * If not provided, any locale value is accepted.
     */
    supportedLocales?: string[];

    /**
     * Dot path under which each locale's translation data keeps its inflections.
     *
     * @default 'i18n.inflections'
     */
    inflectionsKey: string;

    /**
     * Default interpolation switches. Per-call switches take precedence.
     */
    switches?: Partial<InflectionSwitches>;

    /**
     * Whether to emit console warnings when auto-fixing configuration issues.
     *
     * @default true
     */
    warnOnAutoFix?: boolean;
}

// --- TRANSLATION TYPES ---

/**
 * Nested translation data for one locale
 */
export interface TranslationData {
    [key: string]: unknown;
}

/**
 * Parameters for a translation call.
 * Inflection kinds (`gender`, `@gender`) and {{param}} values share this object.
 */
export interface InterpolationParams {
    [key: string]: unknown;
}

/**
 * Per-call translation options
 */
export interface TranslateOptions {
    /** Locale to translate into instead of the current one */
    locale?: string;
    /** Overrides for the inflector's default switches */
    switches?: Partial<InflectionSwitches>;
}

/**
 * Configuration for createI18n
 */
export interface I18nConfig {
    /**
     * Shared configuration. Explicit options below take precedence.
     */
    shared?: SharedInflectorConfig;

    /** Initial translation data per locale */
    translations?: Record<string, TranslationData>;

    /** Locale to start with. Falls back to `fallbackLocale`. */
    initialLocale?: string;

    /** @default 'en' */
    fallbackLocale?: string;

    /** @default 'i18n.inflections' */
    inflectionsKey?: string;

    /** Default interpolation switches */
    switches?: Partial<InflectionSwitches>;

    /**
     * Called when a key is missing in the requested locale.
     * Replaces the default console warning.
     */
    onMissingKey?: (key: string, locale: string) => void;
}
