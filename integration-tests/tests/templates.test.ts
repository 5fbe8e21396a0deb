/**
 * Section template tests
 */

import {
  getTemplateForStage,
  renderUserPrompt,
  truncateInput,
  BASIC_TEMPLATE,
  SCORING_TEMPLATE,
  type ExtractionStage,
} from '@contract-pipeline/shared';

describe('Extraction templates', () => {
  it('should use a fixed prefix size per stage', () => {
    const limits: Array<[ExtractionStage, number | undefined]> = [
      ['basic', 3000],
      ['financial', 4000],
      ['technical', 4000],
      ['scoring', undefined],
      ['simple', 12000],
    ];

    for (const [stage, limit] of limits) {
      const template = getTemplateForStage(stage);
      expect(template.stage).toBe(stage);
      expect(template.maxInputChars).toBe(limit);
    }
  });

  it('should truncate input to the prefix size', () => {
    const text = 'a'.repeat(5000);

    expect(truncateInput(BASIC_TEMPLATE, text)).toHaveLength(3000);
    expect(truncateInput(getTemplateForStage('financial'), text)).toHaveLength(4000);
    expect(truncateInput(SCORING_TEMPLATE, text)).toHaveLength(5000);
  });

  it('should leave short input untouched', () => {
    expect(truncateInput(BASIC_TEMPLATE, 'short contract')).toBe('short contract');
  });

  it('should place the input where the template expects it', () => {
    const prompt = renderUserPrompt(SCORING_TEMPLATE, '- Parties: 2 found');

    expect(prompt).toContain('Extracted Data Summary:\n- Parties: 2 found\n');
    expect(prompt).not.toContain('{{input}}');
  });

  it('should insert dollar sequences literally', () => {
    const prompt = renderUserPrompt(BASIC_TEMPLATE, "Fee of $& and $' due");

    expect(prompt).toContain("Fee of $& and $' due");
  });
});
