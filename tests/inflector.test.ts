import { describe, it, expect, beforeEach } from 'vitest';
import { Inflector } from '../src/inflector';
import { BadInflectionAlias, InflectionOptionIncorrect } from '../src/errors';
import { genderInflections } from './helpers';

describe('Inflector', () => {
	let inflector: Inflector;

	beforeEach(() => {
		inflector = new Inflector({ locale: 'xx' });
		inflector.loadInflections('xx', genderInflections);
	});

	describe('options', () => {
		it('starts from the default switches', () => {
			expect(new Inflector().options).toEqual({
				raises: false,
				unknownDefaults: true,
				excludedDefaults: false,
				aliasedPatterns: false
			});
		});

		it('merges given switches over the defaults', () => {
			const custom = new Inflector({ switches: { raises: true } });
			expect(custom.options.raises).toBe(true);
			expect(custom.options.unknownDefaults).toBe(true);
		});

		it('rejects unknown switches', () => {
			const switches = JSON.parse('{"loud": true}');
			expect(() => new Inflector({ switches })).toThrow("Inflector: unknown switch 'loud'");
		});
	});

	describe('loose queries', () => {
		it('lists kinds and tokens', () => {
			expect(inflector.kinds()).toEqual(['gender', 'person']);
			expect(inflector.trueTokens('person')).toEqual({ i: 'I', you: 'You' });
			expect(inflector.tokens('person')).toEqual({ i: 'I', you: 'You' });
			expect(inflector.aliases('gender')).toEqual({
				masculine: 'm',
				feminine: 'f',
				neuter: 'n',
				neutral: 'n'
			});
		});

		it('answers token predicates', () => {
			expect(inflector.hasKind('gender')).toBe(true);
			expect(inflector.hasToken('masculine')).toBe(true);
			expect(inflector.hasToken('masculine', 'person')).toBe(false);
			expect(inflector.hasAlias('masculine')).toBe(true);
			expect(inflector.hasTrueToken('masculine')).toBe(false);
		});

		it('resolves tokens', () => {
			expect(inflector.trueToken('feminine')).toBe('f');
			expect(inflector.tokenDescription('feminine')).toBe('female');
			expect(inflector.kind('you')).toBe('person');
			expect(inflector.defaultToken('gender')).toBe('n');
		});

		it('reads raw tokens', () => {
			expect(inflector.rawTokens('person')).toEqual({
				i: { type: 'token', description: 'I' },
				you: { type: 'token', description: 'You' }
			});
		});

		it('routes @kind arguments to strict data', () => {
			expect(inflector.hasKind('@tense')).toBe(true);
			expect(inflector.hasKind('tense')).toBe(false);
			expect(inflector.hasToken('past', '@tense')).toBe(true);
			expect(inflector.defaultToken('@tense')).toBe('now');
			expect(inflector.tokens('@tense')).toEqual({ past: 'past', now: 'present' });
		});

		it('queries another locale when one is named', () => {
			inflector.loadInflections('yy', { gender: { m: 'masculin' } });
			expect(inflector.tokenDescription('m', undefined, 'yy')).toBe('masculin');
			expect(inflector.tokenDescription('m')).toBe('male');
		});

		it('returns separate empty databases for locales without data', () => {
			inflector.databases('de').loose.addToken('m', 'gender', 'male');

			expect(inflector.databases('de').loose.isEmpty()).toBe(true);
			expect(inflector.databases('fr').loose.getKinds()).toEqual([]);
			expect(inflector.registries.loose.hasDatabase('de')).toBe(false);

			const other = new Inflector();
			expect(other.interpolate('@{m:Sir|Other}', 'fr', { gender: 'm' })).toBe('Other');
			expect(other.databases('fr').loose.getKinds()).toEqual([]);
		});

		it('returns empty results for locales without data', () => {
			expect(inflector.kinds('zz')).toEqual([]);
			expect(inflector.tokens(undefined, 'zz')).toEqual({});
			expect(inflector.hasToken('m', undefined, 'zz')).toBe(false);
			expect(inflector.trueToken('m', undefined, 'zz')).toBeUndefined();
		});
	});

	describe('strict queries', () => {
		it('needs a kind for every lookup', () => {
			expect(inflector.strict.hasToken('m')).toBe(false);
			expect(inflector.strict.hasToken('m', 'gender')).toBe(true);
			expect(inflector.strict.tokens()).toEqual({});
		});

		it('lists strict kinds and tokens', () => {
			expect(inflector.strict.kinds()).toEqual(['gender', 'tense']);
			expect(inflector.strict.trueTokens('tense')).toEqual({ past: 'past', now: 'present' });
			expect(inflector.strict.aliases('gender')).toEqual({ masculine: 'm' });
			expect(inflector.strict.rawTokens('tense')).toEqual({
				past: { type: 'token', description: 'past' },
				now: { type: 'token', description: 'present' }
			});
		});

		it('resolves strict tokens', () => {
			expect(inflector.strict.trueToken('masculine', 'gender')).toBe('m');
			expect(inflector.strict.tokenDescription('now', 'tense')).toBe('present');
			expect(inflector.strict.kind('now', 'tense')).toBe('tense');
			expect(inflector.strict.defaultToken('gender')).toBe('n');
			expect(inflector.strict.hasKind('tense')).toBe(true);
			expect(inflector.strict.hasAlias('masculine', 'gender')).toBe(true);
			expect(inflector.strict.hasTrueToken('masculine', 'gender')).toBe(false);
		});
	});

	describe('data lifecycle', () => {
		it('keeps the previous data when a reload fails', () => {
			expect(() => inflector.loadInflections('xx', { gender: { m: 'male', x: '@zz' } })).toThrow(
				BadInflectionAlias
			);
			expect(inflector.hasToken('masculine')).toBe(true);
			expect(inflector.strict.hasToken('past', 'tense')).toBe(true);
		});

		it('replaces data on reload', () => {
			inflector.loadInflections('xx', { gender: { m: 'male' } });
			expect(inflector.hasToken('f')).toBe(false);
			expect(inflector.strict.kinds()).toEqual([]);
		});

		it('deletes a locale', () => {
			inflector.deleteInflections('xx');
			expect(inflector.kinds()).toEqual([]);
			expect(inflector.registries.strict.hasDatabase('xx')).toBe(false);
		});
	});

	describe('interpolate', () => {
		it('uses the current locale by default', () => {
			expect(inflector.interpolate('@{f:Lady|m:Sir}', undefined, { gender: 'f' })).toBe('Lady');
		});

		it('renders free text for locales without data', () => {
			expect(inflector.interpolate('@{f:Lady|m:Sir|Someone}', 'zz', { gender: 'f' })).toBe('Someone');
		});

		it('applies per-call switches over the defaults', () => {
			const text = '@{masculine:Sir|Other}';
			expect(inflector.interpolate(text, 'xx', { gender: 'm' })).toBe('Other');
			expect(inflector.interpolate(text, 'xx', { gender: 'm' }, { aliasedPatterns: true })).toBe('Sir');
			expect(inflector.options.aliasedPatterns).toBe(false);
		});

		it('raises when configured to', () => {
			const strictInflector = new Inflector({
				locale: 'xx',
				switches: { raises: true, unknownDefaults: false }
			});
			strictInflector.loadInflections('xx', genderInflections);

			expect(() => strictInflector.interpolate('@{f:Lady|m:Sir}', 'xx', { gender: 'bogus' })).toThrow(
				InflectionOptionIncorrect
			);
			expect(
				strictInflector.interpolate('@{f:Lady|m:Sir}', 'xx', { gender: 'bogus' }, { raises: false })
			).toBe('');
		});
	});
});
