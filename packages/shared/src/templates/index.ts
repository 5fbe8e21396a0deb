/**
 * Section Extraction Templates
 *
 * Multi-step extraction approach:
 * 1. basic: parties and account info from a short prefix of the text
 * 2. financial / technical: longer prefixes, one call each
 * 3. scoring: a summary of steps 1-2, no contract text
 */

import type { ExtractionStage, ExtractionTemplate } from './types';
import { BASIC_TEMPLATE } from './basic.template';
import { FINANCIAL_TEMPLATE } from './financial.template';
import { TECHNICAL_TEMPLATE } from './technical.template';
import { SCORING_TEMPLATE } from './scoring.template';
import { SIMPLE_TEMPLATE } from './simple.template';

// Export types
export type { ExtractionStage, ExtractionTemplate } from './types';

// Export individual templates
export { BASIC_TEMPLATE, FINANCIAL_TEMPLATE, TECHNICAL_TEMPLATE, SCORING_TEMPLATE, SIMPLE_TEMPLATE };

/**
 * Map of extraction stages to their templates
 */
const TEMPLATES: Record<ExtractionStage, ExtractionTemplate> = {
  basic: BASIC_TEMPLATE,
  financial: FINANCIAL_TEMPLATE,
  technical: TECHNICAL_TEMPLATE,
  scoring: SCORING_TEMPLATE,
  simple: SIMPLE_TEMPLATE,
};

export function getTemplateForStage(stage: ExtractionStage): ExtractionTemplate {
  return TEMPLATES[stage];
}

/**
 * Cut the input down to the template's prefix size.
 */
export function truncateInput(template: ExtractionTemplate, input: string): string {
  if (template.maxInputChars === undefined) return input;
  return input.slice(0, template.maxInputChars);
}

/**
 * Build the user prompt for a call. The replacer is a function so `$`
 * sequences in contract text are inserted literally.
 */
export function renderUserPrompt(template: ExtractionTemplate, input: string): string {
  const body = truncateInput(template, input);
  return template.userPromptTemplate.replace('{{input}}', () => body);
}
