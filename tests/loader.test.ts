import { describe, it, expect } from 'vitest';
import { loadInflections, DEFAULT_TOKEN_KEY } from '../src/loader';
import {
	BadInflectionAlias,
	BadInflectionToken,
	DuplicatedInflectionToken,
	InflectorError
} from '../src/errors';
import { loadFixture } from './helpers';

function loadError(tree: unknown): unknown {
	try {
		loadInflections('xx', tree);
	} catch (error) {
		return error;
	}
	return undefined;
}

describe('loadInflections', () => {
	describe('loose kinds', () => {
		const { loose, strict } = loadFixture();

		it('loads true tokens with descriptions', () => {
			expect(loose.locale).toBe('xx');
			expect(loose.getTrueTokens('gender')).toEqual({ m: 'male', f: 'female', n: 'neuter', s: 'strange' });
			expect(loose.getKinds()).toEqual(['gender', 'person']);
		});

		it('loads aliases', () => {
			expect(loose.getAliases('gender')).toEqual({
				masculine: 'm',
				feminine: 'f',
				neuter: 'n',
				neutral: 'n'
			});
		});

		it('resolves alias chains to the final true token', () => {
			expect(loose.getTargetForAlias('neutral')).toBe('n');
			expect(loose.getDescription('neutral')).toBe('neuter');
		});

		it('resolves the default token through aliases', () => {
			expect(loose.getDefaultToken('gender')).toBe('n');
			expect(loose.hasDefaultToken('person')).toBe(false);
		});

		it('does not store the default key as a token', () => {
			expect(loose.hasToken(DEFAULT_TOKEN_KEY)).toBe(false);
		});

		it('keeps @kinds out of the loose database', () => {
			expect(loose.hasToken('past')).toBe(false);
			expect(strict.hasToken('past')).toBe(false);
		});
	});

	describe('strict kinds', () => {
		const { strict } = loadFixture();

		it('stores @kinds under their bare name', () => {
			expect(strict.strict).toBe(true);
			expect(strict.getKinds()).toEqual(['gender', 'tense']);
			expect(strict.hasToken('past', 'tense')).toBe(true);
			expect(strict.getDefaultToken('tense')).toBe('now');
			expect(strict.getTrueToken('masculine', 'gender')).toBe('m');
		});

		it('allows the same token name in several strict kinds', () => {
			const data = loadInflections('xx', {
				'@gender': { m: 'male' },
				'@size': { m: 'medium' }
			});
			expect(data.strict.getDescription('m', 'gender')).toBe('male');
			expect(data.strict.getDescription('m', 'size')).toBe('medium');
		});

		it('allows a strict token to repeat a loose one', () => {
			const data = loadInflections('xx', {
				gender: { m: 'male' },
				'@size': { m: 'medium' }
			});
			expect(data.loose.getKind('m')).toBe('gender');
			expect(data.strict.getKind('m', 'size')).toBe('size');
		});
	});

	it('accepts a default written as an alias reference', () => {
		const data = loadInflections('xx', { gender: { m: 'male', default: '@m' } });
		expect(data.loose.getDefaultToken('gender')).toBe('m');
	});

	it('returns empty databases for missing data', () => {
		expect(loadInflections('xx', undefined).loose.isEmpty()).toBe(true);
		expect(loadInflections('xx', null).strict.isEmpty()).toBe(true);
	});

	it('builds fresh databases on every call', () => {
		const first = loadInflections('xx', { gender: { m: 'male' } });
		const second = loadInflections('xx', { gender: { f: 'female' } });
		expect(first.loose.hasToken('f')).toBe(false);
		expect(second.loose.hasToken('m')).toBe(false);
	});

	describe('invalid data', () => {
		it('rejects a token used by two loose kinds', () => {
			const error = loadError({ gender: { m: 'male' }, title: { m: 'mister' } });
			expect(error).toBeInstanceOf(DuplicatedInflectionToken);
			if (error instanceof DuplicatedInflectionToken) {
				expect(error.token).toBe('m');
				expect(error.kind).toBe('title');
				expect(error.originalKind).toBe('gender');
				expect(error.locale).toBe('xx');
			}
		});

		it('rejects an alias to an unknown token', () => {
			const error = loadError({ gender: { m: 'male', x: '@zz' } });
			expect(error).toBeInstanceOf(BadInflectionAlias);
			if (error instanceof BadInflectionAlias) {
				expect(error.token).toBe('x');
				expect(error.target).toBe('zz');
			}
		});

		it('rejects an alias to a token of another kind', () => {
			expect(loadError({ gender: { m: 'male' }, person: { me: '@m' } })).toBeInstanceOf(BadInflectionAlias);
		});

		it('rejects circular aliases', () => {
			const error = loadError({ gender: { m: 'male', a: '@b', b: '@a' } });
			expect(error).toBeInstanceOf(BadInflectionAlias);
			if (error instanceof BadInflectionAlias) {
				expect(error.token).toBe('a');
				expect(error.target).toBe('b');
			}
		});

		it('rejects a default that names no token of its kind', () => {
			const error = loadError({ gender: { m: 'male', default: 'x' } });
			expect(error).toBeInstanceOf(BadInflectionAlias);
			if (error instanceof BadInflectionAlias) {
				expect(error.token).toBe('default');
				expect(error.kind).toBe('gender');
				expect(error.target).toBe('x');
			}
		});

		it('rejects empty and non-string token values', () => {
			expect(loadError({ gender: { m: '' } })).toBeInstanceOf(BadInflectionToken);
			expect(loadError({ gender: { m: '@' } })).toBeInstanceOf(BadInflectionToken);
			expect(loadError({ gender: { default: '' } })).toBeInstanceOf(BadInflectionToken);

			const error = loadError({ gender: { m: 5 } });
			expect(error).toBeInstanceOf(BadInflectionToken);
			if (error instanceof BadInflectionToken) {
				expect(error.value).toBe(5);
			}
		});

		it('rejects token names that cannot appear in patterns', () => {
			expect(loadError({ gender: { 'a b': 'x' } })).toBeInstanceOf(BadInflectionToken);
			expect(loadError({ gender: { 'a,b': 'x' } })).toBeInstanceOf(BadInflectionToken);
			expect(loadError({ gender: { '!a': 'x' } })).toBeInstanceOf(BadInflectionToken);
		});

		it('rejects data that is not an object', () => {
			expect(() => loadInflections('xx', 'gender')).toThrow(InflectorError);
			expect(() => loadInflections('xx', { gender: 'male' })).toThrow(
				'Inflection kind "gender" in locale "xx" must be an object.'
			);
		});

		it('rejects invalid kind names', () => {
			expect(() => loadInflections('xx', { '@': { m: 'male' } })).toThrow(InflectorError);
			expect(() => loadInflections('xx', { 'my kind': { m: 'male' } })).toThrow(
				'Inflection kind "my kind" in locale "xx" has an invalid name.'
			);
		});
	});
});
