/**
 * Simple Parse Template
 *
 * Five flat fields for the synchronous parse endpoint.
 */

import type { ExtractionTemplate } from './types';

export const SIMPLE_TEMPLATE: ExtractionTemplate = {
  stage: 'simple',
  description: 'Parties, dates and value for quick synchronous parsing',
  maxInputChars: 12000,
  maxOutputTokens: 1024,

  systemPrompt: `You extract the basic facts of a contract and answer with a single JSON object.

Instructions:
- Extract the main parties involved in the contract
- Find start and end dates in YYYY-MM-DD format if possible
- Include the currency symbol with the contract value (₹, $, €, etc.)
- If any field is not found, return null for that field
- Keep party names concise but complete`,

  userPromptTemplate: `Analyze the following contract text and extract the basic information. Return ONLY a JSON object.

Contract Text:
{{input}}

Required JSON structure:
{
  "party_a": "First party name (individual or company)",
  "party_b": "Second party name (individual or company)",
  "effective_date": "Contract start date (YYYY-MM-DD format if found)",
  "expiry_date": "Contract end date (YYYY-MM-DD format if found)",
  "contract_value": "Total contract value with currency symbol"
}`,
};
