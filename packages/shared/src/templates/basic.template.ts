/**
 * Basic Contract Data Template
 *
 * Parties and account/contact information. Party names usually sit in the
 * preamble and signature block, so a short prefix of the text is enough.
 */

import type { ExtractionTemplate } from './types';

export const BASIC_TEMPLATE: ExtractionTemplate = {
  stage: 'basic',
  description: 'Contract parties and account/contact information',
  maxInputChars: 3000,
  maxOutputTokens: 2048,

  systemPrompt: `You are a contract analysis specialist. You extract party and account information from commercial contracts and answer with a single JSON object.

EXTRACTION RULES:
1. List every contracting party (customer, vendor, contractor, licensor, ...)
2. Use null for any text field that is not present in the contract
3. Use [] for any list with no entries
4. confidence_score is a number from 0.0 to 1.0 describing how certain the extraction is
5. Do not invent account numbers, references or contacts`,

  userPromptTemplate: `Analyze this contract text and extract basic party and account information. Return ONLY a JSON object.

Contract Text (first 3000 chars):
{{input}}

Required JSON structure:
{
  "parties": [
    {
      "name": "party name or null",
      "legal_entity_name": "legal entity or null",
      "registration_details": "registration info or null",
      "authorized_signatories": ["list of signatories"],
      "roles": ["customer", "vendor"],
      "confidence_score": 0.8
    }
  ],
  "account_info": {
    "billing_details": "billing address/details or null",
    "account_numbers": ["account numbers found"],
    "references": ["reference numbers"],
    "billing_contact": "billing contact or null",
    "technical_contact": "technical contact or null",
    "confidence_score": 0.7
  }
}`,
};
