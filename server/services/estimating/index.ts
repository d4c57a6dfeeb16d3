export { PricingRunService, countTiers } from './PricingRunService';
export type { PricingRunInput, PricingRunOptions, PricingRunReport, PricingServiceDeps, ParallelEnrichmentResult } from './PricingRunService';
export { EstimateInputError } from './errors';
export {
  loadBuildingMetrics,
  loadDictionary,
  loadEstimateItems,
  loadPriceKb,
  loadReferenceItems,
} from './inputLoader';
export { loadEstimatingConfig } from '../../config';

export { DEFAULT_DICTIONARY, parseDictionary, withDictionaryOverrides } from '@shared/estimate/dictionary';
export { normalizeText } from '@shared/estimate/textNormalizer';
export { expandSynonyms } from '@shared/estimate/synonyms';
export { checkUnitCompatibility } from '@shared/estimate/unitCompatibility';
export { isDisciplineCompatible } from '@shared/estimate/disciplineCompatibility';
export { scoreCandidate, SCORE_WEIGHTS } from '@shared/estimate/candidateScorer';
export { validatePrice, checkPriceSanity } from '@shared/estimate/priceValidator';
export { enrichWithPrices, matchItem, DEFAULT_MATCH_THRESHOLDS } from '@shared/estimate/priceMatcher';
export { rollupEstimate } from '@shared/rollups/estimateRollup';
export { assignItemNumbers, buildItemTree } from '@shared/estimate/itemTree';
export { traceCalculation } from '@shared/estimate/calculationTrace';
export { verifyEstimate, matchReferences } from '@shared/estimate/estimateVerifier';
export { extractBuildingMetrics } from '@shared/estimate/buildingMetrics';
export { AGGREGATION_METHODS, MERGE_STRATEGIES, aggregateKbEntries, mergeKbEntries } from '@shared/estimate/kbMaintenance';
export type { AggregationMethod, MergeStrategy } from '@shared/estimate/kbMaintenance';
export { formatVerificationReport, verificationToCsv } from '@shared/estimate/verificationReportText';
export type * from '@shared/estimate/types';
