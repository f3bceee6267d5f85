import type {
    AliasEntry,
    InflectionDataOptions,
    RawTokenValue,
    TokenEntry,
    TrueTokenEntry,
    UnresolvedDefault
} from './types';

/**
 * In-memory store of inflection kinds, tokens, aliases and default tokens
 * for a single locale.
 *
 * The same class serves both modes:
 * - loose (default): one flat token namespace shared by all kinds,
 *   kind arguments act as an expectation filter
 * - strict: the kind is part of each token's identity, so every lookup
 *   has to name it and tokens may repeat across kinds
 *
 * All lookups report a miss with `undefined` (or `false` for predicates).
 *
 * @example
 * ```ts
 * const db = new InflectionData('en');
 * db.addToken('m', 'gender', 'male');
 * db.addAlias('masculine', 'm');
 * db.getTrueToken('masculine'); // => 'm'
 * db.getDescription('masculine'); // => 'male'
 * ```
 */
export class InflectionData {
    readonly locale: string | undefined;
    readonly strict: boolean;

    /** Entries in insertion order, keyed by storageKey() */
    private readonly tokens = new Map<string, TokenEntry>();
    private readonly kinds = new Set<string>();
    private readonly defaults = new Map<string, string>();

    constructor(locale?: string, options: InflectionDataOptions = {}) {
        this.locale = locale;
        this.strict = options.strict ?? false;
    }

    // --- MUTATIONS ---

    /**
     * Add a true token, overwriting any existing entry with the same identity.
     */
    addToken(name: string, kind: string, description: string): void {
        const entry: TrueTokenEntry = { type: 'token', name, kind, description };
        this.tokens.set(this.storageKey(name, kind), entry);
        this.kinds.add(kind);
    }

    /**
     * Add an alias, overwriting any existing entry with the same identity.
     *
     * The target must already exist as a true token (of `kind`, when given).
     * Strict databases need the kind to find the target.
     *
     * @returns false (and nothing is stored) for empty names, unknown targets
     *   or a kind that differs from the target's
     */
    addAlias(name: string, target: string, kind?: string): boolean {
        if (!name || !target || name === target) return false;

        const found = this.find(target, kind || undefined);
        if (!found || found.type !== 'token') return false;

        const entry: AliasEntry = { type: 'alias', name, kind: found.kind, target: found.name };
        this.tokens.set(this.storageKey(name, found.kind), entry);
        return true;
    }

    /**
     * Record the default token of a kind. The target may be an alias
     * until validateDefaultTokens() resolves it.
     */
    setDefaultToken(kind: string, target: string): void {
        this.defaults.set(kind, target);
    }

    /**
     * Resolve every default token to a true token of its kind and store the result.
     *
     * @returns the first default that could not be resolved, or undefined
     */
    validateDefaultTokens(): UnresolvedDefault | undefined {
        for (const [kind, target] of this.defaults) {
            const resolved = this.getTrueToken(target, kind);
            if (resolved === undefined) {
                return { kind, target };
            }
            this.defaults.set(kind, resolved);
        }
        return undefined;
    }

    // --- PREDICATES ---

    hasToken(token: string | undefined, kind?: string): boolean {
        return this.find(token, kind) !== undefined;
    }

    hasTrueToken(token: string | undefined, kind?: string): boolean {
        return this.find(token, kind)?.type === 'token';
    }

    hasAlias(token: string | undefined, kind?: string): boolean {
        return this.find(token, kind)?.type === 'alias';
    }

    hasKind(kind: string | undefined): boolean {
        return kind !== undefined && this.kinds.has(kind);
    }

    hasDefaultToken(kind: string | undefined): boolean {
        return kind !== undefined && this.defaults.has(kind);
    }

    isEmpty(): boolean {
        return this.tokens.size === 0;
    }

    // --- SINGLE LOOKUPS ---

    getKind(token: string | undefined, kind?: string): string | undefined {
        return this.find(token, kind)?.kind;
    }

    /**
     * Get the true token for a token or alias name.
     * Returns the name itself for true tokens.
     */
    getTrueToken(token: string | undefined, kind?: string): string | undefined {
        return this.resolve(token, kind)?.name;
    }

    getTargetForAlias(alias: string | undefined, kind?: string): string | undefined {
        const entry = this.find(alias, kind);
        return entry?.type === 'alias' ? entry.target : undefined;
    }

    getDefaultToken(kind: string | undefined): string | undefined {
        return kind === undefined ? undefined : this.defaults.get(kind);
    }

    /**
     * Get the description of a token. Aliases report their target's description.
     */
    getDescription(token: string | undefined, kind?: string): string | undefined {
        return this.resolve(token, kind)?.description;
    }

    getKinds(): string[] {
        return Array.from(this.kinds);
    }

    // --- BULK READERS ---
    // Without a kind, loose databases return everything and strict ones nothing.

    /** True tokens only: `token => description` */
    getTrueTokens(kind?: string): Record<string, string> {
        const result: Array<[string, string]> = [];
        for (const entry of this.entries(kind)) {
            if (entry.type === 'token') result.push([entry.name, entry.description]);
        }
        return Object.fromEntries(result);
    }

    /** Aliases only: `alias => target` */
    getAliases(kind?: string): Record<string, string> {
        const result: Array<[string, string]> = [];
        for (const entry of this.entries(kind)) {
            if (entry.type === 'alias') result.push([entry.name, entry.target]);
        }
        return Object.fromEntries(result);
    }

    /** All entries, keeping true tokens and aliases distinguishable */
    getRawTokens(kind?: string): Record<string, RawTokenValue> {
        const result: Array<[string, RawTokenValue]> = [];
        for (const entry of this.entries(kind)) {
            result.push([
                entry.name,
                entry.type === 'token'
                    ? { type: 'token', description: entry.description }
                    : { type: 'alias', target: entry.target }
            ]);
        }
        return Object.fromEntries(result);
    }

    /** All entries with aliases resolved: `token => description` */
    getTokens(kind?: string): Record<string, string> {
        const result: Array<[string, string]> = [];
        for (const entry of this.entries(kind)) {
            const description = this.resolve(entry.name, entry.kind)?.description;
            if (description !== undefined) result.push([entry.name, description]);
        }
        return Object.fromEntries(result);
    }

    // --- INTERNALS ---

    private storageKey(name: string, kind: string): string {
        return this.strict ? `${kind}\u0000${name}` : name;
    }

    private find(token: string | undefined, kind?: string): TokenEntry | undefined {
        if (!token) return undefined;

        if (this.strict) {
            if (!kind) return undefined;
            return this.tokens.get(this.storageKey(token, kind));
        }

        const entry = this.tokens.get(token);
        if (!entry || (kind !== undefined && entry.kind !== kind)) return undefined;
        return entry;
    }

    /** Follow an alias to its true token (a single hop) */
    private resolve(token: string | undefined, kind?: string): TrueTokenEntry | undefined {
        const entry = this.find(token, kind);
        if (!entry) return undefined;
        if (entry.type === 'token') return entry;

        const target = this.find(entry.target, entry.kind);
        return target?.type === 'token' ? target : undefined;
    }

    private entries(kind?: string): TokenEntry[] {
        if (kind === undefined) {
            return this.strict ? [] : Array.from(this.tokens.values());
        }
        return Array.from(this.tokens.values()).filter(entry => entry.kind === kind);
    }
}
