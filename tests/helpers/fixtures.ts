/**
 * Shared inflection data for tests
 */
import { loadInflections } from '../../src/loader';

export const genderInflections = {
    gender: {
        m: 'male',
        f: 'female',
        n: 'neuter',
        s: 'strange',
        masculine: '@m',
        feminine: '@f',
        neuter: '@n',
        neutral: '@neuter',
        default: 'neutral'
    },
    person: {
        i: 'I',
        you: 'You'
    },
    '@gender': {
        m: 'male',
        f: 'female',
        n: 'neuter',
        masculine: '@m',
        default: 'n'
    },
    '@tense': {
        past: 'past',
        now: 'present',
        default: 'now'
    }
};

/**
 * Loose and strict databases built from genderInflections
 */
export function loadFixture(locale: string = 'xx') {
    return loadInflections(locale, genderInflections);
}
