/**
 * Shared TypeScript Types
 *
 * Types for the contract processing pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Processing Status
// ============================================================================

export const DOCUMENT_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;

export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export const TERMINAL_STATUSES: readonly DocumentStatus[] = ['completed', 'failed'];

export function isDocumentStatus(value: unknown): value is DocumentStatus {
  return DOCUMENT_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: DocumentStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// ============================================================================
// Extraction Sections
// ============================================================================

export type SectionName =
  | 'parties'
  | 'account_info'
  | 'financial_details'
  | 'payment_structure'
  | 'revenue_classification'
  | 'sla';

export const SECTION_NAMES: readonly SectionName[] = [
  'parties',
  'account_info',
  'financial_details',
  'payment_structure',
  'revenue_classification',
  'sla',
];

/** Whether a section came back from its extraction call or was zero-filled. */
export type SectionStatus = 'extracted' | 'missing';

export interface PartyInfo {
  name: string | null;
  legal_entity_name: string | null;
  registration_details: string | null;
  authorized_signatories: string[];
  roles: string[];
  confidence_score: number;
}

export interface AccountInfo {
  billing_details: string | null;
  account_numbers: string[];
  references: string[];
  billing_contact: string | null;
  technical_contact: string | null;
  confidence_score: number;
}

export interface LineItem {
  description: string | null;
  quantity: number | null;
  unit_price: number | null;
  total_price: number | null;
  confidence_score: number;
}

export interface FinancialDetails {
  line_items: LineItem[];
  total_contract_value: number | null;
  currency: string | null;
  tax_information: string | null;
  additional_fees: string[];
  confidence_score: number;
}

export interface PaymentStructure {
  payment_terms: string | null;
  payment_schedules: string[];
  due_dates: string[];
  payment_methods: string[];
  banking_details: string | null;
  confidence_score: number;
}

export interface RevenueClassification {
  recurring_payments: boolean;
  one_time_payments: boolean;
  subscription_model: string | null;
  billing_cycles: string[];
  renewal_terms: string | null;
  auto_renewal: boolean;
  confidence_score: number;
}

export interface ServiceLevelAgreement {
  performance_metrics: string[];
  benchmarks: string[];
  penalty_clauses: string[];
  remedies: string[];
  support_terms: string | null;
  maintenance_terms: string | null;
  confidence_score: number;
}

export interface ExtractionResult {
  parties: PartyInfo[];
  account_info: AccountInfo;
  financial_details: FinancialDetails;
  payment_structure: PaymentStructure;
  revenue_classification: RevenueClassification;
  sla: ServiceLevelAgreement;
  section_status: Record<SectionName, SectionStatus>;
}

// ============================================================================
// Scoring & Gap Analysis
// ============================================================================

export interface ScoreBreakdown {
  financial_completeness: number;
  party_identification: number;
  payment_terms_clarity: number;
  sla_definition: number;
  contact_information: number;
  total_score: number;
}

export type ScoreComponent = Exclude<keyof ScoreBreakdown, 'total_score'>;

export const SCORE_MAXIMUMS: Record<ScoreComponent, number> = {
  financial_completeness: 30,
  party_identification: 25,
  payment_terms_clarity: 20,
  sla_definition: 15,
  contact_information: 10,
};

export interface GapAnalysis {
  missing_fields: string[];
  low_confidence_fields: string[];
  recommendations: string[];
}

/** Output of the aggregator, persisted in one write. */
export interface ContractAnalysis {
  extraction_result: ExtractionResult;
  scoring: ScoreBreakdown;
  gap_analysis: GapAnalysis;
}

// ============================================================================
// Document Record
// ============================================================================

export interface DocumentRecord {
  document_id: string;
  filename: string;
  file_path: string;
  file_size: number;
  mime_type: string;
  status: DocumentStatus;
  progress: number;
  error_detail?: string;
  raw_text?: string;
  extraction_result?: ExtractionResult;
  scoring?: ScoreBreakdown;
  gap_analysis?: GapAnalysis;
  created_at: string;
  updated_at: string;
  completed_at?: string;
}

export interface NewDocumentRecord {
  document_id: string;
  filename: string;
  file_path: string;
  file_size: number;
  mime_type: string;
}

// ============================================================================
// Simple Parse
// ============================================================================

export interface SimpleExtractedFields {
  party_a: string | null;
  party_b: string | null;
  effective_date: string | null;
  expiry_date: string | null;
  contract_value: string | null;
}

export interface SimpleParsedResult {
  file_id: string;
  file_path: string;
  status: 'parsed';
  extracted_fields: SimpleExtractedFields;
}

// ============================================================================
// API Types
// ============================================================================

export interface UploadResponse {
  document_id: string;
  message: string;
  status: DocumentStatus;
}

export interface StatusResponse {
  document_id: string;
  status: DocumentStatus;
  progress: number;
  error_detail?: string;
  created_at: string;
  updated_at: string;
}

export interface DocumentListResponse {
  documents: StatusResponse[];
  total: number;
  page: number;
  limit: number;
  has_next: boolean;
  has_prev: boolean;
}

export type ErrorCode =
  | 'invalid_request'
  | 'payload_too_large'
  | 'not_found'
  | 'not_ready'
  | 'internal_error';

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    correlation_id: string;
  };
}
