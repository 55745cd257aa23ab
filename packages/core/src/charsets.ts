// Characters for use as character classes.

export const DIGIT_CHARACTERS = '0123456789';
export const UPPERCASE_CHARACTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const LOWERCASE_CHARACTERS = 'abcdefghijklmnopqrstuvwxyz';
// OWASP password special characters.
export const SPECIAL_CHARACTERS = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';
export const URL_SAFE_SPECIAL_CHARACTERS = '-_';

// Without look-alikes (I/l/1, O/0/o).
export const UNAMBIGUOUS_LETTERS =
  'ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnpqrstuvwxyz';
export const UNAMBIGUOUS_DIGITS = '23456789';
// Widely compatible and unambiguous.
export const COMPATIBLE_SPECIAL_CHARACTERS = '_-@!*.';
