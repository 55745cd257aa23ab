/**
 * Password rule types
 */

/**
 * Character composition of one class of characters.
 */
export interface CharacterClassConfiguration {
  /** Characters (Unicode code points) in this class. Duplicates are ignored. */
  characters: string;
  /** Minimum number of characters from this class in the password. */
  minimum: number;
}

/**
 * Properties of the generated password.
 */
export interface Configuration {
  /**
   * Minimum length of the password.
   * The actual length is random, in the range length <= n <= 1.5 * length.
   * Random lengths let the minimum composition be met without enforcing an
   * exact composition (eg. exactly 2 digits and exactly 1 special character).
   */
  length: number;
  characterClasses: readonly CharacterClassConfiguration[];
}

/**
 * Sets the behavior of the password generator.
 */
export interface Rule {
  /** Configuration associated with this rule. May be called many times. */
  config(): Configuration;
  /**
   * Whether a partially assembled candidate is acceptable. Called after
   * every appended character.
   */
  valid(candidate: string): boolean;
}
