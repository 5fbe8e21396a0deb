/**
 * Scoring and Gap Analysis Template
 *
 * The scoring call never sees contract text. Its input is a short summary of
 * which sections the earlier calls produced.
 */

import type { ExtractionTemplate } from './types';

export const SCORING_TEMPLATE: ExtractionTemplate = {
  stage: 'scoring',
  description: 'Completeness score and gap analysis from the extraction summary',
  maxOutputTokens: 1024,

  systemPrompt: `You score how completely a contract has been extracted and list the gaps. You answer with a single JSON object.

Scoring Guidelines (max points):
- Financial completeness: 30 points (line items, totals, currency, tax info)
- Party identification: 25 points (party names, legal entities, signatories)
- Payment terms clarity: 20 points (terms, schedules, methods)
- SLA definition: 15 points (metrics, penalties, support terms)
- Contact information: 10 points (billing and technical contacts)

Gap Analysis Rules:
- Mark fields as missing if they are critical but were not found
- Mark fields as low confidence if their confidence score is below 0.6
- Give specific, actionable recommendations`,

  userPromptTemplate: `Based on the extracted contract data, generate scoring and gap analysis. Return ONLY a JSON object.

Extracted Data Summary:
{{input}}

Required JSON structure:
{
  "scoring": {
    "financial_completeness": 25.0,
    "party_identification": 20.0,
    "payment_terms_clarity": 15.0,
    "sla_definition": 10.0,
    "contact_information": 8.0,
    "total_score": 78.0
  },
  "gap_analysis": {
    "missing_fields": ["list critical missing fields"],
    "low_confidence_fields": ["fields with confidence < 0.6"],
    "recommendations": ["actionable recommendations"]
  }
}`,
};
