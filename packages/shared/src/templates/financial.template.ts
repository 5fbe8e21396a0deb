/**
 * Financial Terms Template
 *
 * Line items and totals, payment structure, and revenue classification
 * (recurring vs one-time, renewal terms).
 */

import type { ExtractionTemplate } from './types';

export const FINANCIAL_TEMPLATE: ExtractionTemplate = {
  stage: 'financial',
  description: 'Financial details, payment structure and revenue classification',
  maxInputChars: 4000,
  maxOutputTokens: 4096,

  systemPrompt: `You are a contract analysis specialist for commercial and financial terms. You answer with a single JSON object.

EXTRACTION RULES:
1. Amounts are plain numbers without currency symbols or thousands separators
2. currency is an ISO 4217 code (USD, EUR, INR, ...) or null
3. Dates are YYYY-MM-DD when the contract states a full date
4. recurring_payments, one_time_payments and auto_renewal are booleans; use false when the contract is silent
5. Use null for text fields and [] for lists that are not present
6. confidence_score is a number from 0.0 to 1.0 per section`,

  userPromptTemplate: `Analyze this contract text and extract financial and payment information. Return ONLY a JSON object.

Contract Text (searching for financial terms):
{{input}}

Required JSON structure:
{
  "financial_details": {
    "line_items": [
      {
        "description": "item description",
        "quantity": 1.0,
        "unit_price": 100.0,
        "total_price": 100.0,
        "confidence_score": 0.8
      }
    ],
    "total_contract_value": 1000.0,
    "currency": "USD",
    "tax_information": "tax details or null",
    "additional_fees": ["list of fees"],
    "confidence_score": 0.8
  },
  "payment_structure": {
    "payment_terms": "Net 30",
    "payment_schedules": ["schedule details"],
    "due_dates": ["due dates"],
    "payment_methods": ["ACH", "Wire"],
    "banking_details": "bank details or null",
    "confidence_score": 0.7
  },
  "revenue_classification": {
    "recurring_payments": true,
    "one_time_payments": false,
    "subscription_model": "monthly/annual/etc",
    "billing_cycles": ["monthly", "quarterly"],
    "renewal_terms": "renewal details",
    "auto_renewal": true,
    "confidence_score": 0.6
  }
}`,
};
