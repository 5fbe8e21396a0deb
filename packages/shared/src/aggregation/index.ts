export {
  combine,
  buildExtractionResult,
  buildScoreBreakdown,
  buildScoringSummary,
  missingSections,
  lowConfidenceSections,
  mergeUnique,
  LOW_CONFIDENCE_THRESHOLD,
  type SectionPayload,
} from './combine';
export {
  emptyAccountInfo,
  emptyFinancialDetails,
  emptyPaymentStructure,
  emptyRevenueClassification,
  emptyScoreBreakdown,
  emptyServiceLevelAgreement,
  unscoredGapAnalysis,
  UNSCORED_MISSING_FIELD,
  UNSCORED_RECOMMENDATION,
} from './zero-values';
export { toText, toTextList, toNumber, toFlag, toConfidence } from './normalize';
