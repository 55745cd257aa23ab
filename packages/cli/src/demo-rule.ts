import {
  COMPATIBLE_SPECIAL_CHARACTERS,
  UNAMBIGUOUS_DIGITS,
  UNAMBIGUOUS_LETTERS,
  type CharacterClassConfiguration,
  type Configuration,
  type Rule,
} from '@passforge/core';

export interface DemoRuleOptions {
  length: number;
  specialCharacters: boolean;
  /** Candidates matching this pattern are rejected. Must not carry the g or y flag. */
  forbid?: RegExp;
}

/**
 * Rule behind the `passforge` command: half letters, a third digits and,
 * optionally, a sixth special characters, all drawn from sets that avoid
 * look-alike glyphs.
 */
export class DemoRule implements Rule {
  constructor(private readonly options: DemoRuleOptions) {}

  config(): Configuration {
    const { length, specialCharacters } = this.options;
    const characterClasses: CharacterClassConfiguration[] = [
      { characters: UNAMBIGUOUS_LETTERS, minimum: Math.ceil(length * 0.5) },
      { characters: UNAMBIGUOUS_DIGITS, minimum: Math.ceil(length * 0.33) },
    ];
    if (specialCharacters) {
      characterClasses.push({
        characters: COMPATIBLE_SPECIAL_CHARACTERS,
        minimum: Math.ceil(length * 0.17),
      });
    }
    return { length, characterClasses };
  }

  valid(candidate: string): boolean {
    return this.options.forbid ? !this.options.forbid.test(candidate) : true;
  }
}
