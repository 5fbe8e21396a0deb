/**
 * Pipeline orchestrator tests
 *
 * Runs the full pipeline against the in-process store, local file storage
 * in a temp directory, and scripted OCR/LLM stand-ins.
 */

import vm from 'node:vm';
import {
  LocalFileStorage,
  MemoryDocumentStore,
  PipelineOrchestrator,
  TextExtractionError,
  buildScoringSummary,
  BASIC_UNAVAILABLE_DETAIL,
  INTERRUPTED_DETAIL,
  SCORING_UNAVAILABLE_DETAIL,
  UNSCORED_MISSING_FIELD,
  type ProcessContractJob,
  type ScoringFailurePolicy,
  type ExtractionStage,
  type JsonObject,
} from '@contract-pipeline/shared';
import {
  BASIC_PAYLOAD,
  CONTRACT_TEXT,
  FINANCIAL_PAYLOAD,
  FakeTextClient,
  ScriptedStructuredClient,
  TECHNICAL_PAYLOAD,
  allSectionAnswers,
  makeTempDir,
  removeDir,
  silenceLogs,
  steppingClock,
} from './helpers';

type Answers = Partial<Record<ExtractionStage, JsonObject | Error>>;

describe('PipelineOrchestrator', () => {
  let dir: string;
  let store: MemoryDocumentStore;
  let storage: LocalFileStorage;

  beforeAll(() => {
    silenceLogs();
  });

  beforeEach(() => {
    dir = makeTempDir();
    store = new MemoryDocumentStore({ now: steppingClock() });
    storage = new LocalFileStorage(dir);
  });

  afterEach(() => {
    removeDir(dir);
  });

  async function seed(documentId: string, bytes = Buffer.from('%PDF-1.4 contract')): Promise<ProcessContractJob> {
    const filePath = storage.save(documentId, 'contract.pdf', bytes);
    await store.create({
      document_id: documentId,
      filename: 'contract.pdf',
      file_path: filePath,
      file_size: bytes.length,
      mime_type: 'application/pdf',
    });
    return jobFor(documentId, filePath);
  }

  function jobFor(documentId: string, filePath: string): ProcessContractJob {
    return {
      event_type: 'contract.uploaded',
      correlation_id: 'test-correlation',
      document_id: documentId,
      file_path: filePath,
      filename: 'contract.pdf',
      submitted_at: '2025-01-01T00:00:00.000Z',
    };
  }

  function build(
    answers: Answers = allSectionAnswers(),
    text: string | Error = CONTRACT_TEXT,
    scoringFailurePolicy: ScoringFailurePolicy = 'degrade'
  ) {
    const textClient = new FakeTextClient(text);
    const structuredClient = new ScriptedStructuredClient(answers);
    const orchestrator = new PipelineOrchestrator({
      store,
      storage,
      textClient,
      structuredClient,
      scoringFailurePolicy,
    });
    return { orchestrator, textClient, structuredClient };
  }

  describe('successful run', () => {
    it('should complete with the combined analysis', async () => {
      const job = await seed('doc-1');
      const { orchestrator, textClient, structuredClient } = build();

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('completed');
      expect(record.progress).toBe(100);
      expect(record.error_detail).toBeUndefined();
      expect(record.completed_at).toBeDefined();
      expect(record.raw_text).toBe(CONTRACT_TEXT);
      expect(record.scoring?.total_score).toBe(91);
      expect(record.gap_analysis?.recommendations).toEqual(['Add tax details']);
      expect(textClient.calls).toEqual([{ filename: 'contract.pdf', bytes: 17 }]);
      expect(structuredClient.stages).toEqual(['basic', 'financial', 'technical', 'scoring']);
    });

    it('should report progress in order', async () => {
      const job = await seed('doc-1');
      const updates = jest.spyOn(store, 'updateStatus');
      const { orchestrator } = build();

      await orchestrator.run(job);

      expect(updates.mock.calls.map(([, update]) => [update.status, update.progress])).toEqual([
        ['processing', 10],
        ['processing', 50],
        ['processing', 90],
        ['completed', 100],
      ]);
    });

    it('should send contract text to section calls and only the summary to scoring', async () => {
      const job = await seed('doc-1');
      const { orchestrator, structuredClient } = build();

      await orchestrator.run(job);

      const inputs = structuredClient.calls.map((call) => call.input);
      expect(inputs.slice(0, 3)).toEqual([CONTRACT_TEXT, CONTRACT_TEXT, CONTRACT_TEXT]);
      expect(inputs[3]).toBe(buildScoringSummary(BASIC_PAYLOAD, FINANCIAL_PAYLOAD, TECHNICAL_PAYLOAD));
    });
  });

  describe('text extraction failure', () => {
    it('should fail the document at progress 10 without section calls', async () => {
      const job = await seed('doc-1');
      const { orchestrator, structuredClient } = build(
        allSectionAnswers(),
        new TextExtractionError('empty', 'OCR returned no text')
      );

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.progress).toBe(10);
      expect(record.error_detail).toBe('text extraction failed: OCR returned no text');
      expect(record.raw_text).toBeUndefined();
      expect(structuredClient.calls).toHaveLength(0);
    });

    it('should fail when the stored file is gone', async () => {
      const job = await seed('doc-1');
      storage.remove(job.file_path);
      const { orchestrator, textClient } = build();

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.error_detail).toMatch(/^text extraction failed: ENOENT/);
      expect(textClient.calls).toHaveLength(0);
    });
  });

  describe('basic section failure', () => {
    it('should fail the document when the basic call fails', async () => {
      const job = await seed('doc-1');
      const answers = allSectionAnswers();
      delete answers.basic;
      const { orchestrator, structuredClient } = build(answers);

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.progress).toBe(50);
      expect(record.error_detail).toBe(BASIC_UNAVAILABLE_DETAIL);
      expect(structuredClient.stages).toEqual(['basic']);
    });

    it('should fail the document when the basic payload fails its schema', async () => {
      const job = await seed('doc-1');
      const { orchestrator } = build({ ...allSectionAnswers(), basic: { notes: 'no parties here' } });

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.error_detail).toBe(BASIC_UNAVAILABLE_DETAIL);
    });
  });

  describe('optional section failures', () => {
    it('should zero-fill a failed financial call and still complete', async () => {
      const job = await seed('doc-1');
      const { orchestrator, structuredClient } = build({
        ...allSectionAnswers(),
        financial: new Error('rate limited'),
      });

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('completed');
      expect(record.extraction_result?.section_status.financial_details).toBe('missing');
      expect(record.extraction_result?.financial_details.total_contract_value).toBeNull();
      expect(record.gap_analysis?.missing_fields).toEqual([
        'financial_details',
        'payment_structure',
        'revenue_classification',
      ]);
      expect(structuredClient.calls[3].input).toContain('- Financial: No');
    });

    it('should zero-fill a failed technical call and list sla as missing', async () => {
      const job = await seed('doc-1');
      const { orchestrator, structuredClient } = build({
        ...allSectionAnswers(),
        technical: new Error('timeout'),
      });

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('completed');
      expect(record.extraction_result?.section_status.sla).toBe('missing');
      expect(record.extraction_result?.section_status.financial_details).toBe('extracted');
      expect(record.extraction_result?.sla).toEqual({
        performance_metrics: [],
        benchmarks: [],
        penalty_clauses: [],
        remedies: [],
        support_terms: null,
        maintenance_terms: null,
        confidence_score: 0,
      });
      expect(record.gap_analysis?.missing_fields).toEqual(['sla']);
      expect(structuredClient.calls[3].input).toContain('- SLA: No');
    });

    it('should degrade a failed scoring call to zero scores by default', async () => {
      const job = await seed('doc-1');
      const { orchestrator } = build({ ...allSectionAnswers(), scoring: new Error('timeout') });

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('completed');
      expect(record.scoring?.total_score).toBe(0);
      expect(record.gap_analysis?.missing_fields).toEqual([UNSCORED_MISSING_FIELD]);
      expect(record.extraction_result?.section_status.sla).toBe('extracted');
    });

    it('should fail a document without scoring when the policy says so', async () => {
      const job = await seed('doc-1');
      const { orchestrator } = build(
        { ...allSectionAnswers(), scoring: new Error('timeout') },
        CONTRACT_TEXT,
        'fail'
      );

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.error_detail).toBe(SCORING_UNAVAILABLE_DETAIL);
      expect(record.raw_text).toBeUndefined();
    });
  });

  describe('redelivery', () => {
    it('should leave terminal documents alone', async () => {
      const job = await seed('doc-1');
      await store.updateStatus('doc-1', { status: 'failed', error_detail: 'Scheduling failed: queue down' });
      const { orchestrator, textClient } = build();

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.error_detail).toBe('Scheduling failed: queue down');
      expect(textClient.calls).toHaveLength(0);
    });

    it('should mark a document found mid-run as interrupted', async () => {
      const job = await seed('doc-1');
      await store.updateStatus('doc-1', { status: 'processing', progress: 50 });
      const { orchestrator, textClient } = build();

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.progress).toBe(50);
      expect(record.error_detail).toBe(INTERRUPTED_DETAIL);
      expect(textClient.calls).toHaveLength(0);
    });

    it('should resolve for unknown documents', async () => {
      const { orchestrator } = build();

      await expect(orchestrator.run(jobFor('missing', `${dir}/missing.pdf`))).resolves.toBeUndefined();
    });
  });

  describe('unexpected errors', () => {
    it('should record store failures as processing errors', async () => {
      const job = await seed('doc-1');
      jest.spyOn(store, 'updateResult').mockRejectedValue(new Error('disk full'));
      const { orchestrator } = build();

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.progress).toBe(50);
      expect(record.error_detail).toBe('Processing error: disk full');
    });

    it('should drop an already written result when a later status write fails', async () => {
      const job = await seed('doc-1');
      const updateStatus = store.updateStatus.bind(store);
      jest.spyOn(store, 'updateStatus').mockImplementation(async (documentId, update) => {
        if (update.progress === 90) throw new Error('db blip');
        return updateStatus(documentId, update);
      });
      const { orchestrator } = build();

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.status).toBe('failed');
      expect(record.progress).toBe(50);
      expect(record.error_detail).toBe('Processing error: db blip');
      expect(record.raw_text).toBeUndefined();
      expect(record.extraction_result).toBeUndefined();
      expect(record.scoring).toBeUndefined();
      expect(record.gap_analysis).toBeUndefined();
    });

    it('should describe errors raised in another realm by their message', async () => {
      const job = await seed('doc-1');
      const foreign: unknown = vm.runInNewContext('new Error("scanner offline")');
      const orchestrator = new PipelineOrchestrator({
        store,
        storage,
        textClient: {
          extract: async () => {
            throw foreign;
          },
        },
        structuredClient: new ScriptedStructuredClient(allSectionAnswers()),
        scoringFailurePolicy: 'degrade',
      });

      await orchestrator.run(job);

      const record = await store.get('doc-1');
      expect(record.error_detail).toBe('text extraction failed: scanner offline');
    });
  });
});
