/**
 * Test Helpers
 *
 * In-process stand-ins for the OCR and LLM services, section payload
 * fixtures, and small utilities for temp directories and clocks.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type {
  ExtractionStage,
  ExtractionTemplate,
  JsonObject,
  StructuredExtractionClient,
  TextExtractionClient,
} from '@contract-pipeline/shared';

export const CONTRACT_TEXT = 'MASTER SERVICES AGREEMENT between Acme Corp and Widget Co. Fees: $12,000 per year.';

/**
 * Text client returning a fixed text, or failing with a fixed error.
 */
export class FakeTextClient implements TextExtractionClient {
  readonly calls: Array<{ filename: string; bytes: number }> = [];

  constructor(private readonly outcome: string | Error = CONTRACT_TEXT) {}

  async extract(file: Buffer, filename: string): Promise<string> {
    this.calls.push({ filename, bytes: file.length });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

/**
 * Structured client answering per stage. Stages without a scripted answer fail.
 */
export class ScriptedStructuredClient implements StructuredExtractionClient {
  readonly calls: Array<{ stage: ExtractionStage; input: string }> = [];

  constructor(private readonly answers: Partial<Record<ExtractionStage, JsonObject | Error>>) {}

  async extract(input: string, template: ExtractionTemplate): Promise<JsonObject> {
    this.calls.push({ stage: template.stage, input });
    const answer = this.answers[template.stage];
    if (answer === undefined) {
      throw new Error(`No scripted answer for ${template.stage}`);
    }
    if (answer instanceof Error) {
      throw answer;
    }
    return structuredClone(answer);
  }

  get stages(): ExtractionStage[] {
    return this.calls.map((call) => call.stage);
  }
}

// ============================================================================
// Section payloads
// ============================================================================

export const BASIC_PAYLOAD: JsonObject = {
  parties: [
    {
      name: 'Acme Corp',
      legal_entity_name: 'Acme Corporation Ltd',
      registration_details: 'REG-001',
      authorized_signatories: ['Jane Doe'],
      roles: ['customer'],
      confidence_score: 0.9,
    },
    {
      name: 'Widget Co',
      legal_entity_name: null,
      registration_details: null,
      authorized_signatories: [],
      roles: ['vendor'],
      confidence_score: 0.8,
    },
  ],
  account_info: {
    billing_details: 'Invoices by email',
    account_numbers: ['ACC-100'],
    references: ['PO-7'],
    billing_contact: 'billing@example.com',
    technical_contact: 'ops@example.com',
    confidence_score: 0.75,
  },
};

export const FINANCIAL_PAYLOAD: JsonObject = {
  financial_details: {
    line_items: [
      {
        description: 'Annual licence',
        quantity: 1,
        unit_price: 12000,
        total_price: 12000,
        confidence_score: 0.9,
      },
    ],
    total_contract_value: '$12,000',
    currency: 'usd',
    tax_information: null,
    additional_fees: [],
    confidence_score: 0.85,
  },
  payment_structure: {
    payment_terms: 'Net 30',
    payment_schedules: ['annual'],
    due_dates: ['2025-01-31'],
    payment_methods: ['Wire'],
    banking_details: null,
    confidence_score: 0.7,
  },
  revenue_classification: {
    recurring_payments: true,
    one_time_payments: 'no',
    subscription_model: 'annual',
    billing_cycles: ['annual'],
    renewal_terms: 'Renews yearly',
    auto_renewal: 'yes',
    confidence_score: 0.65,
  },
};

export const TECHNICAL_PAYLOAD: JsonObject = {
  sla: {
    performance_metrics: ['99.9% uptime'],
    benchmarks: [],
    penalty_clauses: ['5% credit per hour of downtime'],
    remedies: ['Service credits'],
    support_terms: '24x7 email',
    maintenance_terms: null,
    confidence_score: 0.8,
  },
};

/** Sub-scores sum to 91; the remote total is deliberately wrong. */
export const SCORING_PAYLOAD: JsonObject = {
  scoring: {
    financial_completeness: 28,
    party_identification: 24,
    payment_terms_clarity: 18,
    sla_definition: 12,
    contact_information: 9,
    total_score: 99,
  },
  gap_analysis: {
    missing_fields: [],
    low_confidence_fields: [],
    recommendations: ['Add tax details'],
  },
};

export const SIMPLE_PAYLOAD: JsonObject = {
  party_a: 'Acme Corp',
  party_b: 'Widget Co',
  effective_date: '2025-01-01',
  expiry_date: '2025-12-31',
  contract_value: '$12,000',
};

export function allSectionAnswers(): Partial<Record<ExtractionStage, JsonObject | Error>> {
  return {
    basic: BASIC_PAYLOAD,
    financial: FINANCIAL_PAYLOAD,
    technical: TECHNICAL_PAYLOAD,
    scoring: SCORING_PAYLOAD,
    simple: SIMPLE_PAYLOAD,
  };
}

// ============================================================================
// Utilities
// ============================================================================

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'contract-pipeline-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Clock advancing one second per call, starting one second after `start`.
 */
export function steppingClock(start: number = Date.UTC(2025, 0, 1)): () => Date {
  let current = start;
  return () => {
    current += 1000;
    return new Date(current);
  };
}

/**
 * Keep the JSON log lines out of test output.
 */
export function silenceLogs(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
  jest.spyOn(console, 'debug').mockImplementation(() => undefined);
}
