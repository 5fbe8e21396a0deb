/**
 * Extraction Aggregator
 *
 * Merges the four section payloads into one ContractAnalysis. Absent or
 * unusable payloads are zero-filled, never fatal here; deciding whether a run
 * fails is the orchestrator's job.
 */

import { isRecord, type JsonObject } from '../guards';
import {
  SCORE_MAXIMUMS,
  SECTION_NAMES,
  type ContractAnalysis,
  type ExtractionResult,
  type GapAnalysis,
  type ScoreBreakdown,
  type ScoreComponent,
  type SectionName,
  type SectionStatus,
} from '../types';
import {
  clamp,
  normalizeAccountInfo,
  normalizeFinancialDetails,
  normalizeParties,
  normalizePaymentStructure,
  normalizeRevenueClassification,
  normalizeServiceLevelAgreement,
  round2,
  toNumber,
  toTextList,
} from './normalize';
import {
  emptyAccountInfo,
  emptyFinancialDetails,
  emptyPaymentStructure,
  emptyRevenueClassification,
  emptyScoreBreakdown,
  emptyServiceLevelAgreement,
  unscoredGapAnalysis,
} from './zero-values';

export const LOW_CONFIDENCE_THRESHOLD = 0.6;

export type SectionPayload = JsonObject | null;

const SCORE_COMPONENTS: readonly ScoreComponent[] = [
  'financial_completeness',
  'party_identification',
  'payment_terms_clarity',
  'sla_definition',
  'contact_information',
];

/**
 * Order-preserving union without duplicates.
 */
export function mergeUnique(...lists: string[][]): string[] {
  return Array.from(new Set(lists.flat()));
}

function objectField(payload: SectionPayload, key: string): JsonObject | null {
  if (!payload) return null;
  const value = payload[key];
  return isRecord(value) ? value : null;
}

export function buildExtractionResult(
  basic: SectionPayload,
  financial: SectionPayload,
  technical: SectionPayload
): ExtractionResult {
  const status = (present: boolean): SectionStatus => (present ? 'extracted' : 'missing');

  const rawParties = basic ? basic.parties : undefined;
  const accountInfo = objectField(basic, 'account_info');
  const financialDetails = objectField(financial, 'financial_details');
  const paymentStructure = objectField(financial, 'payment_structure');
  const revenue = objectField(financial, 'revenue_classification');
  const sla = objectField(technical, 'sla');

  return {
    parties: normalizeParties(rawParties),
    account_info: accountInfo ? normalizeAccountInfo(accountInfo) : emptyAccountInfo(),
    financial_details: financialDetails
      ? normalizeFinancialDetails(financialDetails)
      : emptyFinancialDetails(),
    payment_structure: paymentStructure
      ? normalizePaymentStructure(paymentStructure)
      : emptyPaymentStructure(),
    revenue_classification: revenue
      ? normalizeRevenueClassification(revenue)
      : emptyRevenueClassification(),
    sla: sla ? normalizeServiceLevelAgreement(sla) : emptyServiceLevelAgreement(),
    section_status: {
      parties: status(Array.isArray(rawParties)),
      account_info: status(accountInfo !== null),
      financial_details: status(financialDetails !== null),
      payment_structure: status(paymentStructure !== null),
      revenue_classification: status(revenue !== null),
      sla: status(sla !== null),
    },
  };
}

/**
 * Clamp each sub-score to its maximum and recompute the total. The remote
 * total_score is ignored.
 */
export function buildScoreBreakdown(raw: JsonObject): ScoreBreakdown {
  const breakdown = emptyScoreBreakdown();
  let sum = 0;
  for (const component of SCORE_COMPONENTS) {
    const value = round2(clamp(toNumber(raw[component]) ?? 0, 0, SCORE_MAXIMUMS[component]));
    breakdown[component] = value;
    sum += value;
  }
  breakdown.total_score = round2(Math.min(100, sum));
  return breakdown;
}

function sectionConfidence(result: ExtractionResult, section: SectionName): number | null {
  if (section === 'parties') {
    if (result.parties.length === 0) return null;
    const total = result.parties.reduce((acc, party) => acc + party.confidence_score, 0);
    return total / result.parties.length;
  }
  return result[section].confidence_score;
}

export function missingSections(result: ExtractionResult): string[] {
  return SECTION_NAMES.filter((section) => result.section_status[section] === 'missing');
}

export function lowConfidenceSections(result: ExtractionResult): string[] {
  return SECTION_NAMES.filter((section) => {
    if (result.section_status[section] !== 'extracted') return false;
    const confidence = sectionConfidence(result, section);
    return confidence !== null && confidence < LOW_CONFIDENCE_THRESHOLD;
  });
}

export function combine(
  basic: SectionPayload,
  financial: SectionPayload,
  technical: SectionPayload,
  scoring: SectionPayload
): ContractAnalysis {
  const extractionResult = buildExtractionResult(basic, financial, technical);
  const rawScoring = objectField(scoring, 'scoring');

  if (!rawScoring) {
    return {
      extraction_result: extractionResult,
      scoring: emptyScoreBreakdown(),
      gap_analysis: unscoredGapAnalysis(),
    };
  }

  const remoteGaps = objectField(scoring, 'gap_analysis') ?? {};
  const gapAnalysis: GapAnalysis = {
    missing_fields: mergeUnique(
      toTextList(remoteGaps.missing_fields),
      missingSections(extractionResult)
    ),
    low_confidence_fields: mergeUnique(
      toTextList(remoteGaps.low_confidence_fields),
      lowConfidenceSections(extractionResult)
    ),
    recommendations: mergeUnique(toTextList(remoteGaps.recommendations)),
  };

  return {
    extraction_result: extractionResult,
    scoring: buildScoreBreakdown(rawScoring),
    gap_analysis: gapAnalysis,
  };
}

/**
 * Input for the scoring call: what the first three calls found, never the
 * contract text.
 */
export function buildScoringSummary(
  basic: SectionPayload,
  financial: SectionPayload,
  technical: SectionPayload
): string {
  const present = (payload: SectionPayload, key: string): string => {
    const value = objectField(payload, key);
    return value && Object.keys(value).length > 0 ? 'Yes' : 'No';
  };
  const parties = basic && Array.isArray(basic.parties) ? basic.parties.length : 0;

  return [
    `- Parties: ${parties} found`,
    `- Financial: ${present(financial, 'financial_details')}`,
    `- Payment Terms: ${present(financial, 'payment_structure')}`,
    `- SLA: ${present(technical, 'sla')}`,
    `- Contacts: ${present(basic, 'account_info')}`,
  ].join('\n');
}
