const PREFIX = '[i18n-inflections]';

/** Render a caller-supplied value for a message; never throws */
function describeValue(value: unknown): string {
    if (typeof value === 'bigint') return `${value}n`;
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}

export class InflectorError extends Error {
    constructor(message: string) {
        super(`${PREFIX} ${message}`);
        this.name = 'InflectorError';
    }
}

// --- INTERPOLATION ERRORS ---
// Raised only when the `raises` switch is on.

export class InflectionPatternError extends InflectorError {
    constructor(
        message: string,
        public readonly pattern: string,
        public readonly token: string
    ) {
        super(message);
        this.name = 'InflectionPatternError';
    }
}

export class InvalidInflectionToken extends InflectionPatternError {
    constructor(pattern: string, token: string) {
        super(`Token "${token}" used in pattern "${pattern}" is invalid.`, pattern, token);
        this.name = 'InvalidInflectionToken';
    }
}

export class MisplacedInflectionToken extends InflectionPatternError {
    constructor(
        pattern: string,
        token: string,
        public readonly kind: string
    ) {
        super(
            `Token "${token}" used in pattern "${pattern}" is not of kind "${kind}" ` +
            `like the tokens before it.`,
            pattern,
            token
        );
        this.name = 'MisplacedInflectionToken';
    }
}

export class InflectionOptionNotFound extends InflectionPatternError {
    constructor(
        pattern: string,
        public readonly kind: string | undefined,
        token: string
    ) {
        super(
            `Option "${kind ?? '?'}" required by pattern "${pattern}" was not found ` +
            `and no default token is set.`,
            pattern,
            token
        );
        this.name = 'InflectionOptionNotFound';
    }
}

export class InflectionOptionIncorrect extends InflectionPatternError {
    constructor(
        pattern: string,
        public readonly kind: string,
        token: string,
        public readonly option: unknown
    ) {
        super(
            `Option "${kind}" required by pattern "${pattern}" has an incorrect value: ` +
            `${describeValue(option)}.`,
            pattern,
            token
        );
        this.name = 'InflectionOptionIncorrect';
    }
}

// --- CONFIGURATION ERRORS ---
// Raised while loading inflection data, regardless of switches.

export class InflectionConfigurationError extends InflectorError {
    constructor(
        message: string,
        public readonly locale: string,
        public readonly token: string,
        public readonly kind: string
    ) {
        super(message);
        this.name = 'InflectionConfigurationError';
    }
}

export class DuplicatedInflectionToken extends InflectionConfigurationError {
    constructor(
        locale: string,
        token: string,
        kind: string,
        public readonly originalKind: string
    ) {
        super(
            `Token "${token}" of kind "${kind}" in locale "${locale}" ` +
            `is already defined for kind "${originalKind}".`,
            locale,
            token,
            kind
        );
        this.name = 'DuplicatedInflectionToken';
    }
}

export class BadInflectionAlias extends InflectionConfigurationError {
    constructor(
        locale: string,
        token: string,
        kind: string,
        public readonly target: string
    ) {
        super(
            `Alias "${token}" of kind "${kind}" in locale "${locale}" ` +
            `points to an unknown token "${target}".`,
            locale,
            token,
            kind
        );
        this.name = 'BadInflectionAlias';
    }
}

export class BadInflectionToken extends InflectionConfigurationError {
    constructor(
        locale: string,
        token: string,
        kind: string,
        public readonly value?: unknown
    ) {
        super(
            `Token "${token}" of kind "${kind}" in locale "${locale}" has an invalid value` +
            (value === undefined ? '.' : `: ${describeValue(value)}.`),
            locale,
            token,
            kind
        );
        this.name = 'BadInflectionToken';
    }
}
