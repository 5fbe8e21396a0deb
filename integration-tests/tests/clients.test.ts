/**
 * OCR and LLM client tests
 *
 * Both clients take their transport as an option, so the remote services
 * are replaced by jest mocks.
 */

import type OpenAI from 'openai';
import {
  OcrSpaceClient,
  OpenAiStructuredExtractionClient,
  fileTypeFor,
  parseJsonPayload,
  parseOcrResponse,
  renderUserPrompt,
  FINANCIAL_TEMPLATE,
  type ChatCompletionCreate,
} from '@contract-pipeline/shared';
import { CONTRACT_TEXT, silenceLogs } from './helpers';

type FetchArgs = Parameters<typeof fetch>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function completion(content: string | null): OpenAI.Chat.Completions.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1735689600,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

describe('Text extraction client', () => {
  beforeAll(() => {
    silenceLogs();
  });

  describe('fileTypeFor', () => {
    it('should map known extensions case-insensitively', () => {
      expect(fileTypeFor('scan.PNG')).toBe('PNG');
      expect(fileTypeFor('scan.tiff')).toBe('TIFF');
      expect(fileTypeFor('contract.pdf')).toBe('PDF');
    });

    it('should default to PDF', () => {
      expect(fileTypeFor('contract.docx')).toBe('PDF');
      expect(fileTypeFor('contract')).toBe('PDF');
    });
  });

  describe('parseOcrResponse', () => {
    it('should join page texts with newlines and trim', () => {
      const text = parseOcrResponse({
        IsErroredOnProcessing: false,
        ParsedResults: [{ ParsedText: 'Page one ' }, { ParsedText: 'Page two\n' }],
      });

      expect(text).toBe('Page one \nPage two');
    });

    it('should surface remote processing errors', () => {
      expect(() =>
        parseOcrResponse({
          IsErroredOnProcessing: true,
          ErrorMessage: ['File failed validation', 'Bad size'],
        })
      ).toThrow('File failed validation; Bad size');
    });

    it('should reject responses without text', () => {
      expect(() => parseOcrResponse({ ParsedResults: [{ ParsedText: '  ' }] })).toThrow(
        'OCR returned no text'
      );
    });
  });

  describe('OcrSpaceClient', () => {
    it('should post the file with OCR options and return the text', async () => {
      const fetchImpl = jest.fn(async (..._args: FetchArgs) =>
        jsonResponse({ IsErroredOnProcessing: false, ParsedResults: [{ ParsedText: 'Agreement text' }] })
      );
      const client = new OcrSpaceClient({
        apiKey: 'test-key',
        url: 'http://ocr.test/parse/image',
        timeoutMs: 1000,
        fetchImpl,
      });

      const text = await client.extract(Buffer.from('%PDF-1.4'), 'contract.png');

      expect(text).toBe('Agreement text');
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      const [url, init] = fetchImpl.mock.calls[0];
      expect(url).toBe('http://ocr.test/parse/image');
      expect(init?.method).toBe('POST');

      const form = init?.body;
      expect(form).toBeInstanceOf(FormData);
      if (!(form instanceof FormData)) return;
      expect(form.get('apikey')).toBe('test-key');
      expect(form.get('language')).toBe('eng');
      expect(form.get('filetype')).toBe('PNG');
      expect(form.get('isTable')).toBe('true');
      expect(form.get('OCREngine')).toBe('2');
      expect(form.get('file')).toBeInstanceOf(Blob);
    });

    it('should report transport failures', async () => {
      const fetchImpl = jest.fn(async (..._args: FetchArgs): Promise<Response> => {
        throw new Error('socket hang up');
      });
      const client = new OcrSpaceClient({ apiKey: 'test-key', fetchImpl });

      await expect(client.extract(Buffer.from('x'), 'contract.pdf')).rejects.toMatchObject({
        name: 'TextExtractionError',
        reason: 'transport',
        message: 'OCR request failed: socket hang up',
      });
    });

    it('should report error statuses as transport failures', async () => {
      const fetchImpl = jest.fn(async (..._args: FetchArgs) => new Response('busy', { status: 503 }));
      const client = new OcrSpaceClient({ apiKey: 'test-key', fetchImpl });

      await expect(client.extract(Buffer.from('x'), 'contract.pdf')).rejects.toMatchObject({
        reason: 'transport',
        message: 'OCR service responded 503',
      });
    });

    it('should report bodies that are not JSON as remote failures', async () => {
      const fetchImpl = jest.fn(async (..._args: FetchArgs) => new Response('<html>', { status: 200 }));
      const client = new OcrSpaceClient({ apiKey: 'test-key', fetchImpl });

      await expect(client.extract(Buffer.from('x'), 'contract.pdf')).rejects.toMatchObject({
        reason: 'remote',
      });
    });

    it('should report empty text', async () => {
      const fetchImpl = jest.fn(async (..._args: FetchArgs) => jsonResponse({ ParsedResults: [] }));
      const client = new OcrSpaceClient({ apiKey: 'test-key', fetchImpl });

      await expect(client.extract(Buffer.from('x'), 'contract.pdf')).rejects.toMatchObject({
        reason: 'empty',
        message: 'OCR returned no text',
      });
    });
  });
});

describe('Structured extraction client', () => {
  beforeAll(() => {
    silenceLogs();
  });

  describe('parseJsonPayload', () => {
    it('should parse a bare object', () => {
      expect(parseJsonPayload('{"sla": {"support_terms": "24x7"}}')).toEqual({
        sla: { support_terms: '24x7' },
      });
    });

    it('should unwrap a fenced reply', () => {
      expect(parseJsonPayload('```json\n{"party_a": "Acme Corp"}\n```')).toEqual({ party_a: 'Acme Corp' });
      expect(parseJsonPayload('```\n{"party_b": null}\n```')).toEqual({ party_b: null });
    });

    it('should reject invalid JSON and non-objects', () => {
      expect(() => parseJsonPayload('not json')).toThrow(/^Reply is not valid JSON/);
      expect(() => parseJsonPayload('[1, 2]')).toThrow('Reply is not a JSON object');
      expect(() => parseJsonPayload('null')).toThrow('Reply is not a JSON object');
    });
  });

  describe('OpenAiStructuredExtractionClient', () => {
    it('should send one deterministic JSON-mode request per call', async () => {
      const create = jest.fn<ReturnType<ChatCompletionCreate>, Parameters<ChatCompletionCreate>>(
        async () => completion('{"financial_details": {"currency": "USD"}}')
      );
      const client = new OpenAiStructuredExtractionClient({ model: 'gpt-4o-mini', create });

      const payload = await client.extract(CONTRACT_TEXT, FINANCIAL_TEMPLATE);

      expect(payload).toEqual({ financial_details: { currency: 'USD' } });
      expect(create).toHaveBeenCalledTimes(1);
      const [params] = create.mock.calls[0];
      expect(params.model).toBe('gpt-4o-mini');
      expect(params.temperature).toBe(0);
      expect(params.max_tokens).toBe(4096);
      expect(params.response_format).toEqual({ type: 'json_object' });
      expect(params.messages).toEqual([
        { role: 'system', content: FINANCIAL_TEMPLATE.systemPrompt },
        { role: 'user', content: renderUserPrompt(FINANCIAL_TEMPLATE, CONTRACT_TEXT) },
      ]);
    });

    it('should report an empty reply', async () => {
      const create = jest.fn<ReturnType<ChatCompletionCreate>, Parameters<ChatCompletionCreate>>(
        async () => completion(null)
      );
      const client = new OpenAiStructuredExtractionClient({ create });

      await expect(client.extract(CONTRACT_TEXT, FINANCIAL_TEMPLATE)).rejects.toMatchObject({
        name: 'StructuredExtractionError',
        reason: 'empty',
        message: 'Empty response from OpenAI',
      });
    });

    it('should report transport failures', async () => {
      const create = jest.fn<ReturnType<ChatCompletionCreate>, Parameters<ChatCompletionCreate>>(
        async () => {
          throw new Error('Request timed out.');
        }
      );
      const client = new OpenAiStructuredExtractionClient({ create });

      await expect(client.extract(CONTRACT_TEXT, FINANCIAL_TEMPLATE)).rejects.toMatchObject({
        reason: 'transport',
        message: 'LLM request failed: Request timed out.',
      });
    });

    it('should report replies that are not JSON objects', async () => {
      const create = jest.fn<ReturnType<ChatCompletionCreate>, Parameters<ChatCompletionCreate>>(
        async () => completion('Sorry, I cannot help with that.')
      );
      const client = new OpenAiStructuredExtractionClient({ create });

      await expect(client.extract(CONTRACT_TEXT, FINANCIAL_TEMPLATE)).rejects.toMatchObject({
        reason: 'invalid_json',
      });
    });
  });
});
