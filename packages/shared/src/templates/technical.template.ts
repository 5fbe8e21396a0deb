/**
 * Service Level Template
 */

import type { ExtractionTemplate } from './types';

export const TECHNICAL_TEMPLATE: ExtractionTemplate = {
  stage: 'technical',
  description: 'Service level agreement terms',
  maxInputChars: 4000,
  maxOutputTokens: 2048,

  systemPrompt: `You are a contract analysis specialist for service level agreements. You answer with a single JSON object.

EXTRACTION RULES:
1. performance_metrics are measurable commitments (uptime, response time, resolution time)
2. penalty_clauses and remedies quote or closely paraphrase the contract
3. Use null for text fields and [] for lists that are not present
4. confidence_score is a number from 0.0 to 1.0`,

  userPromptTemplate: `Analyze this contract text and extract service level agreements and technical details. Return ONLY a JSON object.

Contract Text (searching for SLA terms):
{{input}}

Required JSON structure:
{
  "sla": {
    "performance_metrics": ["99.9% uptime", "response times"],
    "benchmarks": ["performance benchmarks"],
    "penalty_clauses": ["penalties for non-compliance"],
    "remedies": ["available remedies"],
    "support_terms": "support details or null",
    "maintenance_terms": "maintenance details or null",
    "confidence_score": 0.5
  }
}`,
};
