import { InflectionData } from './inflectionData';
import { InflectionRegistry } from './registry';
import { interpolate, NAMED_MARKER } from './interpolate';
import { loadInflections } from './loader';
import { createInflectionSwitches, DEFAULT_SWITCHES } from './config';
import type {
    InflectionOptionValues,
    InflectionSwitches,
    LocaleDatabases,
    RawTokenValue
} from './types';

export interface InflectorOptions {
    /** Locale used when a call does not name one */
    locale?: string;
    /** Default interpolation switches */
    switches?: Partial<InflectionSwitches>;
}

/**
 * Queries against strict (kind-namespaced) inflection data.
 * Every lookup needs a kind; without one it misses.
 */
export class StrictInflector {
    constructor(private readonly owner: Inflector) {}

    private db(locale: string | undefined): InflectionData | undefined {
        return this.owner.registries.strict.getDatabase(locale ?? this.owner.locale);
    }

    kinds(locale?: string): string[] {
        return this.db(locale)?.getKinds() ?? [];
    }

    tokens(kind?: string, locale?: string): Record<string, string> {
        return this.db(locale)?.getTokens(kind) ?? {};
    }

    trueTokens(kind?: string, locale?: string): Record<string, string> {
        return this.db(locale)?.getTrueTokens(kind) ?? {};
    }

    rawTokens(kind?: string, locale?: string): Record<string, RawTokenValue> {
        return this.db(locale)?.getRawTokens(kind) ?? {};
    }

    aliases(kind?: string, locale?: string): Record<string, string> {
        return this.db(locale)?.getAliases(kind) ?? {};
    }

    defaultToken(kind: string, locale?: string): string | undefined {
        return this.db(locale)?.getDefaultToken(kind);
    }

    hasKind(kind: string | undefined, locale?: string): boolean {
        return this.db(locale)?.hasKind(kind) ?? false;
    }

    hasToken(token: string | undefined, kind?: string, locale?: string): boolean {
        return this.db(locale)?.hasToken(token, kind) ?? false;
    }

    hasAlias(token: string | undefined, kind?: string, locale?: string): boolean {
        return this.db(locale)?.hasAlias(token, kind) ?? false;
    }

    hasTrueToken(token: string | undefined, kind?: string, locale?: string): boolean {
        return this.db(locale)?.hasTrueToken(token, kind) ?? false;
    }

    trueToken(token: string | undefined, kind?: string, locale?: string): string | undefined {
        return this.db(locale)?.getTrueToken(token, kind);
    }

    tokenDescription(token: string | undefined, kind?: string, locale?: string): string | undefined {
        return this.db(locale)?.getDescription(token, kind);
    }

    kind(token: string | undefined, kind?: string, locale?: string): string | undefined {
        return this.db(locale)?.getKind(token, kind);
    }
}

/**
 * Inflection data registry and pattern interpolator for all locales.
 *
 * Query methods operate on loose data, where a kind is an optional filter.
 * A kind written as `@kind` is looked up in the strict data instead;
 * `inflector.strict` gives direct access to strict queries.
 *
 * @example
 * ```ts
 * const inflector = new Inflector({ locale: 'en' });
 * inflector.loadInflections('en', {
 *     gender: { m: 'male', f: 'female', masculine: '@m', default: 'm' }
 * });
 *
 * inflector.trueToken('masculine'); // => 'm'
 * inflector.interpolate('Dear @{f:Madam|m:Sir}', 'en', { gender: 'f' }); // => 'Dear Madam'
 * ```
 */
export class Inflector {
    /** Locale used when a call does not name one */
    locale: string | undefined;

    /** Default switches; per-call switches override them */
    readonly options: InflectionSwitches;

    readonly registries: LocaleDatabases<InflectionRegistry> = {
        loose: new InflectionRegistry(),
        strict: new InflectionRegistry({ strict: true })
    };

    readonly strict: StrictInflector = new StrictInflector(this);

    constructor(options: InflectorOptions = {}) {
        this.locale = options.locale;
        this.options = createInflectionSwitches(options.switches, DEFAULT_SWITCHES, 'Inflector');
    }

    // --- DATA LIFECYCLE ---

    /**
     * Build and register both databases of a locale from its inflection tree.
     * The current databases are only replaced if loading succeeds.
     */
    loadInflections(locale: string, tree: unknown): LocaleDatabases<InflectionData> {
        const databases = loadInflections(locale, tree);
        this.registries.loose.addDatabase(databases.loose);
        this.registries.strict.addDatabase(databases.strict);
        return databases;
    }

    deleteInflections(locale: string): void {
        this.registries.loose.deleteDatabase(locale);
        this.registries.strict.deleteDatabase(locale);
    }

    /**
     * Databases used to interpolate strings of a locale.
     * Locales without data get new empty databases that are not registered.
     */
    databases(locale?: string): LocaleDatabases<InflectionData> {
        const target = locale ?? this.locale;
        return {
            loose: this.registries.loose.getDatabase(target) ?? new InflectionData(target),
            strict: this.registries.strict.getDatabase(target) ?? new InflectionData(target, { strict: true })
        };
    }

    // --- INTERPOLATION ---

    /**
     * Interpolate inflection patterns in a string.
     *
     * @param text - String containing `@{...}` patterns
     * @param locale - Locale whose inflection data is used
     * @param options - Values keyed by kind (`gender`) or strict kind (`@gender`)
     * @param switches - Overrides for the default switches
     */
    interpolate(
        text: string,
        locale?: string,
        options: InflectionOptionValues = {},
        switches: Partial<InflectionSwitches> = {}
    ): string {
        const merged = createInflectionSwitches(switches, this.options, 'interpolate');
        return interpolate(text, this.databases(locale), options, merged);
    }

    // --- QUERIES ---

    /**
     * Pick the database for a kind: `@kind` selects strict data
     */
    private scope(kind: string | undefined, locale: string | undefined): { db: InflectionData | undefined; kind: string | undefined } {
        const target = locale ?? this.locale;
        if (kind !== undefined && kind.startsWith(NAMED_MARKER)) {
            return {
                db: this.registries.strict.getDatabase(target),
                kind: kind.slice(NAMED_MARKER.length)
            };
        }
        return { db: this.registries.loose.getDatabase(target), kind };
    }

    kinds(locale?: string): string[] {
        return this.scope(undefined, locale).db?.getKinds() ?? [];
    }

    tokens(kind?: string, locale?: string): Record<string, string> {
        const s = this.scope(kind, locale);
        return s.db?.getTokens(s.kind) ?? {};
    }

    trueTokens(kind?: string, locale?: string): Record<string, string> {
        const s = this.scope(kind, locale);
        return s.db?.getTrueTokens(s.kind) ?? {};
    }

    rawTokens(kind?: string, locale?: string): Record<string, RawTokenValue> {
        const s = this.scope(kind, locale);
        return s.db?.getRawTokens(s.kind) ?? {};
    }

    aliases(kind?: string, locale?: string): Record<string, string> {
        const s = this.scope(kind, locale);
        return s.db?.getAliases(s.kind) ?? {};
    }

    defaultToken(kind: string, locale?: string): string | undefined {
        const s = this.scope(kind, locale);
        return s.db?.getDefaultToken(s.kind);
    }

    hasKind(kind: string | undefined, locale?: string): boolean {
        const s = this.scope(kind, locale);
        return s.db?.hasKind(s.kind) ?? false;
    }

    hasToken(token: string | undefined, kind?: string, locale?: string): boolean {
        const s = this.scope(kind, locale);
        return s.db?.hasToken(token, s.kind) ?? false;
    }

    hasAlias(token: string | undefined, kind?: string, locale?: string): boolean {
        const s = this.scope(kind, locale);
        return s.db?.hasAlias(token, s.kind) ?? false;
    }

    hasTrueToken(token: string | undefined, kind?: string, locale?: string): boolean {
        const s = this.scope(kind, locale);
        return s.db?.hasTrueToken(token, s.kind) ?? false;
    }

    trueToken(token: string | undefined, kind?: string, locale?: string): string | undefined {
        const s = this.scope(kind, locale);
        return s.db?.getTrueToken(token, s.kind);
    }

    tokenDescription(token: string | undefined, kind?: string, locale?: string): string | undefined {
        const s = this.scope(kind, locale);
        return s.db?.getDescription(token, s.kind);
    }

    /** Kind of a token in loose data */
    kind(token: string | undefined, locale?: string): string | undefined {
        return this.scope(undefined, locale).db?.getKind(token);
    }
}
