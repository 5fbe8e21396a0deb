/**
 * Coercion of validated section payloads into typed sections.
 *
 * Section schemas accept loosely typed values (amounts as strings, flags as
 * "yes"/"no"); everything is settled here so stored results are uniform.
 */

import { isRecord } from '../guards';
import type {
  AccountInfo,
  FinancialDetails,
  LineItem,
  PartyInfo,
  PaymentStructure,
  RevenueClassification,
  ServiceLevelAgreement,
} from '../types';

export function toText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export function toTextList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(toText).filter((item): item is string => item !== null);
}

const CURRENCY_CODE = /^[A-Z]{3}(?=[\s\d-])|(?<=[\d\s])[A-Z]{3}$/;
const PLAIN_AMOUNT = /^-?\d+(\.\d+)?$/;
const GROUPED_AMOUNT = /^-?\d{1,3}(,\d{3})+(\.\d+)?$/;

/**
 * Numbers pass through. Strings may carry a currency symbol or ISO code and
 * comma thousands separators; any other notation (exponents, decimal commas)
 * is not an amount and yields null.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const cleaned = value
    .trim()
    .replace(CURRENCY_CODE, '')
    .replace(/[$€£¥₹\s]/g, '');

  if (PLAIN_AMOUNT.test(cleaned)) return Number(cleaned);
  if (GROUPED_AMOUNT.test(cleaned)) return Number(cleaned.replace(/,/g, ''));
  return null;
}

export function toFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return ['true', 'yes', 'y'].includes(value.trim().toLowerCase());
  return false;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function toConfidence(value: unknown): number {
  return clamp(toNumber(value) ?? 0, 0, 1);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function normalizeParty(value: unknown): PartyInfo | null {
  if (!isRecord(value)) return null;
  return {
    name: toText(value.name),
    legal_entity_name: toText(value.legal_entity_name),
    registration_details: toText(value.registration_details),
    authorized_signatories: toTextList(value.authorized_signatories),
    roles: toTextList(value.roles),
    confidence_score: toConfidence(value.confidence_score),
  };
}

export function normalizeParties(value: unknown): PartyInfo[] {
  if (!Array.isArray(value)) return [];
  return value.map(normalizeParty).filter((party): party is PartyInfo => party !== null);
}

export function normalizeAccountInfo(value: Record<string, unknown>): AccountInfo {
  return {
    billing_details: toText(value.billing_details),
    account_numbers: toTextList(value.account_numbers),
    references: toTextList(value.references),
    billing_contact: toText(value.billing_contact),
    technical_contact: toText(value.technical_contact),
    confidence_score: toConfidence(value.confidence_score),
  };
}

function normalizeLineItem(value: unknown): LineItem | null {
  if (!isRecord(value)) return null;
  return {
    description: toText(value.description),
    quantity: toNumber(value.quantity),
    unit_price: toNumber(value.unit_price),
    total_price: toNumber(value.total_price),
    confidence_score: toConfidence(value.confidence_score),
  };
}

export function normalizeFinancialDetails(value: Record<string, unknown>): FinancialDetails {
  const lineItems = Array.isArray(value.line_items) ? value.line_items : [];
  const currency = toText(value.currency);
  return {
    line_items: lineItems.map(normalizeLineItem).filter((item): item is LineItem => item !== null),
    total_contract_value: toNumber(value.total_contract_value),
    currency: currency === null ? null : currency.toUpperCase(),
    tax_information: toText(value.tax_information),
    additional_fees: toTextList(value.additional_fees),
    confidence_score: toConfidence(value.confidence_score),
  };
}

export function normalizePaymentStructure(value: Record<string, unknown>): PaymentStructure {
  return {
    payment_terms: toText(value.payment_terms),
    payment_schedules: toTextList(value.payment_schedules),
    due_dates: toTextList(value.due_dates),
    payment_methods: toTextList(value.payment_methods),
    banking_details: toText(value.banking_details),
    confidence_score: toConfidence(value.confidence_score),
  };
}

export function normalizeRevenueClassification(value: Record<string, unknown>): RevenueClassification {
  return {
    recurring_payments: toFlag(value.recurring_payments),
    one_time_payments: toFlag(value.one_time_payments),
    subscription_model: toText(value.subscription_model),
    billing_cycles: toTextList(value.billing_cycles),
    renewal_terms: toText(value.renewal_terms),
    auto_renewal: toFlag(value.auto_renewal),
    confidence_score: toConfidence(value.confidence_score),
  };
}

export function normalizeServiceLevelAgreement(value: Record<string, unknown>): ServiceLevelAgreement {
  return {
    performance_metrics: toTextList(value.performance_metrics),
    benchmarks: toTextList(value.benchmarks),
    penalty_clauses: toTextList(value.penalty_clauses),
    remedies: toTextList(value.remedies),
    support_terms: toText(value.support_terms),
    maintenance_terms: toText(value.maintenance_terms),
    confidence_score: toConfidence(value.confidence_score),
  };
}
