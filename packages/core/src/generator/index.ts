export {
  PasswordGenerator,
  type GenerationMetrics,
} from './password-generator.js';
export { WeightedRandomSet, type WeightedEntry } from './weighted-random-set.js';
export {
  buildCharacterSource,
  characterWeights,
  countOccurrences,
  distinctCharacters,
  maxPasswordLength,
  validateConfiguration,
} from './character-source.js';
