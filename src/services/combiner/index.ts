export {
  combine,
  titleFromFileName,
  COMBINED_HEADING,
  OPTIMIZED_COMBINED_HEADING,
  SUMMARY_FILE_SUFFIX,
  type CombineResult,
} from './summary-combiner.js';
