/**
 * Zero values for each extraction section. A section that could not be
 * extracted is filled with these and marked `missing` in section_status.
 */

import type {
  AccountInfo,
  FinancialDetails,
  GapAnalysis,
  PaymentStructure,
  RevenueClassification,
  ScoreBreakdown,
  ServiceLevelAgreement,
} from '../types';

export function emptyAccountInfo(): AccountInfo {
  return {
    billing_details: null,
    account_numbers: [],
    references: [],
    billing_contact: null,
    technical_contact: null,
    confidence_score: 0,
  };
}

export function emptyFinancialDetails(): FinancialDetails {
  return {
    line_items: [],
    total_contract_value: null,
    currency: null,
    tax_information: null,
    additional_fees: [],
    confidence_score: 0,
  };
}

export function emptyPaymentStructure(): PaymentStructure {
  return {
    payment_terms: null,
    payment_schedules: [],
    due_dates: [],
    payment_methods: [],
    banking_details: null,
    confidence_score: 0,
  };
}

export function emptyRevenueClassification(): RevenueClassification {
  return {
    recurring_payments: false,
    one_time_payments: false,
    subscription_model: null,
    billing_cycles: [],
    renewal_terms: null,
    auto_renewal: false,
    confidence_score: 0,
  };
}

export function emptyServiceLevelAgreement(): ServiceLevelAgreement {
  return {
    performance_metrics: [],
    benchmarks: [],
    penalty_clauses: [],
    remedies: [],
    support_terms: null,
    maintenance_terms: null,
    confidence_score: 0,
  };
}

export function emptyScoreBreakdown(): ScoreBreakdown {
  return {
    financial_completeness: 0,
    party_identification: 0,
    payment_terms_clarity: 0,
    sla_definition: 0,
    contact_information: 0,
    total_score: 0,
  };
}

export const UNSCORED_MISSING_FIELD = 'Unable to analyze due to processing error';
export const UNSCORED_RECOMMENDATION = 'Retry contract processing';

/** Gap analysis reported when the scoring call produced nothing. */
export function unscoredGapAnalysis(): GapAnalysis {
  return {
    missing_fields: [UNSCORED_MISSING_FIELD],
    low_confidence_fields: [],
    recommendations: [UNSCORED_RECOMMENDATION],
  };
}
