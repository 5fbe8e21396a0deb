/**
 * Section Extraction Template Types
 *
 * Defines the interface for the per-section prompts sent to the structured
 * extraction client.
 */

/** One structured-extraction sub-call of the pipeline, plus the synchronous parse. */
export type ExtractionStage = 'basic' | 'financial' | 'technical' | 'scoring' | 'simple';

/**
 * Extraction template for one section call.
 */
export interface ExtractionTemplate {
  /** The sub-call this template drives */
  stage: ExtractionStage;

  /** System prompt with section-specific extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with one placeholder:
   * - {{input}}: contract text prefix, or the extraction summary for scoring
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;

  /**
   * Longest prefix of the contract text the call may see. Undefined for
   * calls that receive no contract text.
   */
  maxInputChars?: number;

  /** Upper bound on response tokens */
  maxOutputTokens: number;
}
