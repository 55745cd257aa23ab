/**
 * Character source construction and composition checks.
 *
 * The character source is a weighted random set whose distribution matches
 * the desired composition of the final password: a class's share of the
 * probability mass is its share of the total minimum, spread evenly across
 * the class's distinct characters.
 */

import { ErrorCode } from '../errors/codes.js';
import { ConfigurationError } from '../types/errors.js';
import type { Configuration } from '../types/rule.js';
import type { RandomSource } from '../util/rng.js';
import { WeightedRandomSet, type WeightedEntry } from './weighted-random-set.js';

export interface CompiledCharacterClass {
  characters: ReadonlySet<string>;
  minimum: number;
}

/** Distinct code points of a class, in first-seen order. */
export function distinctCharacters(characters: string): string[] {
  return Array.from(new Set(Array.from(characters)));
}

export function compileClasses(
  config: Configuration
): CompiledCharacterClass[] {
  return config.characterClasses.map((characterClass) => ({
    characters: new Set(Array.from(characterClass.characters)),
    minimum: characterClass.minimum,
  }));
}

/** Upper bound on password length before the assembly loop restarts. */
export function maxPasswordLength(
  config: Configuration,
  overflowFactor: number
): number {
  return Math.floor(config.length * overflowFactor);
}

/**
 * Rejects configurations that can never produce a password.
 */
export function validateConfiguration(
  config: Configuration,
  overflowFactor: number
): void {
  if (!Number.isInteger(config.length) || config.length <= 0) {
    throw new ConfigurationError({
      message: 'length must be a positive integer',
      context: { option: 'length', value: config.length },
    });
  }
  if (!Array.isArray(config.characterClasses)) {
    throw new ConfigurationError({
      message: 'characterClasses must be an array',
      context: { option: 'characterClasses' },
    });
  }

  let totalMinimum = 0;
  config.characterClasses.forEach((characterClass, classIndex) => {
    const { characters, minimum } = characterClass;
    if (!Number.isInteger(minimum) || minimum < 0) {
      throw new ConfigurationError({
        message: `character class ${classIndex} minimum must be a non-negative integer`,
        context: { classIndex, value: minimum },
      });
    }
    if (typeof characters !== 'string') {
      throw new ConfigurationError({
        message: `character class ${classIndex} characters must be a string`,
        context: { classIndex },
      });
    }
    if (minimum > 0 && characters.length === 0) {
      throw new ConfigurationError({
        message: `character class ${classIndex} requires ${minimum} characters but has none`,
        context: { classIndex, value: minimum },
      });
    }
    totalMinimum += minimum;
  });

  if (totalMinimum === 0) {
    throw new ConfigurationError({
      message: 'at least one character class needs a positive minimum',
      errorCode: ErrorCode.INVALID_WEIGHTS,
      context: { value: totalMinimum },
      suggestions: ['Give at least one character class a minimum of 1'],
    });
  }

  const maxLength = maxPasswordLength(config, overflowFactor);
  const required = requiredLength(config);
  if (required > maxLength) {
    throw new ConfigurationError({
      message: `character class minimums need at least ${required} characters, more than the maximum length ${maxLength}`,
      errorCode: ErrorCode.UNSATISFIABLE_CONFIGURATION,
      context: { value: required, maxLength },
      suggestions: ['Raise the length or lower the character class minimums'],
    });
  }
}

/**
 * Fewest characters any complete password holds: the largest total minimum
 * over classes that share no character. Overlapping classes can be met by
 * the same characters, so only disjoint ones add up.
 * Exhaustive over subsets of classes.
 */
export function requiredLength(config: Configuration): number {
  const classes = compileClasses(config).filter((c) => c.minimum > 0);

  const best = (
    index: number,
    chosen: readonly ReadonlySet<string>[],
    total: number
  ): number => {
    if (index === classes.length) return total;
    const skipped = best(index + 1, chosen, total);
    const current = classes[index];
    if (chosen.some((set) => sharesCharacter(set, current.characters))) {
      return skipped;
    }
    const taken = best(
      index + 1,
      [...chosen, current.characters],
      total + current.minimum
    );
    return Math.max(skipped, taken);
  };

  return best(0, [], 0);
}

function sharesCharacter(
  a: ReadonlySet<string>,
  b: ReadonlySet<string>
): boolean {
  for (const c of a) {
    if (b.has(c)) return true;
  }
  return false;
}

/**
 * One weighted entry per character: (minimum / totalMinimum) / k for a class
 * of k distinct characters. Classes with a zero minimum contribute nothing.
 */
export function characterWeights(
  config: Configuration
): WeightedEntry<string>[] {
  let totalMinimum = 0;
  for (const characterClass of config.characterClasses) {
    totalMinimum += characterClass.minimum;
  }

  const entries: WeightedEntry<string>[] = [];
  for (const characterClass of config.characterClasses) {
    const probability = characterClass.minimum / totalMinimum;
    if (!(probability > 0)) continue;

    const characters = distinctCharacters(characterClass.characters);
    for (const value of characters) {
      entries.push({ value, weight: probability / characters.length });
    }
  }
  return entries;
}

export function buildCharacterSource(
  config: Configuration,
  random?: RandomSource
): WeightedRandomSet<string> {
  return new WeightedRandomSet(characterWeights(config), random);
}

/** Number of characters in the candidate that belong to the class. */
export function countOccurrences(
  candidate: readonly string[],
  characters: ReadonlySet<string>
): number {
  let total = 0;
  for (const c of candidate) {
    if (characters.has(c)) total++;
  }
  return total;
}

/**
 * Minimum length met and every class minimum met.
 */
export function isComplete(
  candidate: readonly string[],
  length: number,
  classes: readonly CompiledCharacterClass[]
): boolean {
  if (candidate.length < length) return false;
  return classes.every(
    (characterClass) =>
      countOccurrences(candidate, characterClass.characters) >=
      characterClass.minimum
  );
}

/** Identifies the parts of a configuration the weights depend on. */
export function weightsFingerprint(config: Configuration): string {
  return JSON.stringify(
    config.characterClasses.map((c) => [c.characters, c.minimum])
  );
}
