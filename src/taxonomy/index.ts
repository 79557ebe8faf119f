export {
  Taxonomy,
  TaxonomyError,
  loadTaxonomy,
  readSavedTaxonomy,
  saveTaxonomy,
  DEFAULT_TAXONOMY_PATH,
} from './taxonomy.js';
