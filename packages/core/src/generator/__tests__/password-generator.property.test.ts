import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { PasswordGenerator } from '../password-generator.js';
import { maxPasswordLength } from '../character-source.js';
import { isOk } from '../../types/result.js';
import type {
  CharacterClassConfiguration,
  Configuration,
  Rule,
} from '../../types/rule.js';
import { SeededRandomSource } from '../../util/rng.js';

/** Fixed seed for deterministic property runs */
const PROPERTY_TEST_SEED = 424242;

const ALPHABET = Array.from('abcdefghijklmnopqrstuvwxyz0123456789');

// Disjoint classes cut from ALPHABET, minimums adding up to at most length.
const configurationArbitrary = fc
  .record({
    length: fc.integer({ min: 1, max: 16 }),
    classes: fc.array(
      fc.record({
        size: fc.integer({ min: 1, max: 6 }),
        minimum: fc.integer({ min: 0, max: 4 }),
      }),
      { minLength: 1, maxLength: 4 }
    ),
  })
  .filter(({ length, classes }) => {
    const total = classes.reduce((sum, c) => sum + c.minimum, 0);
    return total >= 1 && total <= length;
  })
  .map(({ length, classes }): Configuration => {
    let offset = 0;
    const characterClasses: CharacterClassConfiguration[] = classes.map(
      ({ size, minimum }) => {
        const characters = ALPHABET.slice(offset, offset + size).join('');
        offset += size;
        return { characters, minimum };
      }
    );
    return { length, characterClasses };
  });

function staticRule(config: Configuration): Rule {
  return {
    config: () => config,
    valid: () => true,
  };
}

function occurrences(password: string, characters: string): number {
  return Array.from(password).filter((c) => characters.includes(c)).length;
}

describe('PasswordGenerator properties', () => {
  it('bounds the length and meets every class minimum', () => {
    fc.assert(
      fc.property(configurationArbitrary, fc.integer(), (config, seed) => {
        const generator = new PasswordGenerator(staticRule(config), {
          random: new SeededRandomSource(seed, 'password-properties'),
        });

        const result = generator.generate();
        expect(isOk(result)).toBe(true);
        const password = result.unwrap();
        const length = Array.from(password).length;

        expect(length).toBeGreaterThanOrEqual(config.length);
        expect(length).toBeLessThanOrEqual(maxPasswordLength(config, 1.5));
        for (const characterClass of config.characterClasses) {
          expect(
            occurrences(password, characterClass.characters)
          ).toBeGreaterThanOrEqual(characterClass.minimum);
        }
      }),
      { seed: PROPERTY_TEST_SEED, numRuns: 100 }
    );
  });

  it('only draws characters from classes with a positive minimum', () => {
    fc.assert(
      fc.property(configurationArbitrary, fc.integer(), (config, seed) => {
        const allowed = config.characterClasses
          .filter((c) => c.minimum > 0)
          .map((c) => c.characters)
          .join('');
        const generator = new PasswordGenerator(staticRule(config), {
          random: new SeededRandomSource(seed, 'password-alphabet'),
        });

        const password = generator.generateOrThrow();
        for (const c of password) {
          expect(allowed).toContain(c);
        }
      }),
      { seed: PROPERTY_TEST_SEED, numRuns: 100 }
    );
  });

  it('fails at the rejection ceiling when the rule rejects everything', () => {
    fc.assert(
      fc.property(
        configurationArbitrary,
        fc.integer({ min: 1, max: 20 }),
        (config, maxRejections) => {
          let calls = 0;
          const generator = new PasswordGenerator(
            {
              config: () => config,
              valid: () => {
                calls++;
                return false;
              },
            },
            { maxRejections, random: new SeededRandomSource(maxRejections) }
          );

          expect(isOk(generator.generate())).toBe(false);
          expect(calls).toBe(maxRejections);
        }
      ),
      { seed: PROPERTY_TEST_SEED, numRuns: 50 }
    );
  });
});
