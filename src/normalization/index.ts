export {
  normalize,
  createNormalizer,
  loadAbbreviations,
  DEFAULT_ABBREVIATIONS_PATH,
  type Normalizer,
  type AbbreviationMap,
} from './normalizer.js';
