import { InflectionData } from './inflectionData';
import { InflectorError } from './errors';

/**
 * Per-locale inflection databases of one mode (loose or strict).
 *
 * Databases are replaced as a whole, never merged: readers holding a
 * reference to the previous instance keep a consistent view while a
 * reload swaps in the new one.
 */
export class InflectionRegistry {
    readonly strict: boolean;
    private readonly databases = new Map<string, InflectionData>();

    constructor(options: { strict?: boolean } = {}) {
        this.strict = options.strict ?? false;
    }

    /**
     * Create an empty database for a locale, replacing any existing one
     */
    newDatabase(locale: string): InflectionData {
        return this.addDatabase(new InflectionData(locale, { strict: this.strict }));
    }

    /**
     * Register a database under its locale, replacing any existing one
     *
     * @throws {InflectorError} If the database has no locale or a different mode
     */
    addDatabase(db: InflectionData): InflectionData {
        if (!db.locale) {
            throw new InflectorError('Cannot register an inflection database without a locale.');
        }
        if (db.strict !== this.strict) {
            throw new InflectorError(
                `Cannot register a ${db.strict ? 'strict' : 'loose'} database for locale "${db.locale}" ` +
                `in a ${this.strict ? 'strict' : 'loose'} registry.`
            );
        }
        this.databases.set(db.locale, db);
        return db;
    }

    deleteDatabase(locale: string): void {
        this.databases.delete(locale);
    }

    getDatabase(locale: string | undefined): InflectionData | undefined {
        return locale ? this.databases.get(locale) : undefined;
    }

    hasDatabase(locale: string | undefined): boolean {
        return locale ? this.databases.has(locale) : false;
    }

    /** Locales with a registered database */
    locales(): string[] {
        return Array.from(this.databases.keys());
    }
}
