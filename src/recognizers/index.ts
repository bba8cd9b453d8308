/**
 * Recognizers Module
 * Exports the candidate matchers and extractor
 */

export * from './base.js';
export {
  CANDIDATE_MATCHERS,
  SUPPORTED_CANDIDATE_LENGTHS,
  extractCandidates,
} from './card-candidates.js';
