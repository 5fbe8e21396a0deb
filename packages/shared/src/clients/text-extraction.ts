/**
 * Text Extraction Client (OCR.space)
 *
 * Posts the uploaded file to the OCR service and joins the parsed text of all
 * pages. Any failure surfaces as a TextExtractionError.
 */

import path from 'path';
import { logger } from '../logger';
import { config } from '../config';
import { TextExtractionError, describeError } from '../errors';
import { isRecord } from '../guards';
import { ocrRequestsCounter, ocrRequestDurationHistogram } from '../metrics';

export interface TextExtractionClient {
  extract(file: Buffer, filename: string): Promise<string>;
}

export interface OcrSpaceClientOptions {
  apiKey?: string;
  url?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const MIME_BY_FILETYPE: Record<string, string> = {
  PDF: 'application/pdf',
  PNG: 'image/png',
  JPG: 'image/jpeg',
  JPEG: 'image/jpeg',
  TIF: 'image/tiff',
  TIFF: 'image/tiff',
};

/**
 * OCR.space file type hint, taken from the extension. Defaults to PDF.
 */
export function fileTypeFor(filename: string): string {
  const ext = path.extname(filename).slice(1).toUpperCase();
  return ext in MIME_BY_FILETYPE ? ext : 'PDF';
}

/**
 * Join the ParsedText of every page. Throws when the service reports a
 * processing error or no page carries text.
 */
export function parseOcrResponse(body: unknown): string {
  if (!isRecord(body)) {
    throw new TextExtractionError('remote', 'OCR response is not a JSON object');
  }

  if (body.IsErroredOnProcessing === true) {
    const detail = Array.isArray(body.ErrorMessage)
      ? body.ErrorMessage.map(String).join('; ')
      : String(body.ErrorMessage ?? 'Unknown OCR error');
    throw new TextExtractionError('remote', detail);
  }

  const pages = Array.isArray(body.ParsedResults) ? body.ParsedResults : [];
  const text = pages
    .map((page) => (isRecord(page) && typeof page.ParsedText === 'string' ? page.ParsedText : ''))
    .join('\n')
    .trim();

  if (!text) {
    throw new TextExtractionError('empty', 'OCR returned no text');
  }
  return text;
}

export class OcrSpaceClient implements TextExtractionClient {
  private readonly apiKey: string;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OcrSpaceClientOptions = {}) {
    this.apiKey = options.apiKey ?? config.ocrSpaceApiKey;
    this.url = options.url ?? config.ocrSpaceUrl;
    this.timeoutMs = options.timeoutMs ?? config.ocrRequestTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async extract(file: Buffer, filename: string): Promise<string> {
    const filetype = fileTypeFor(filename);
    const form = new FormData();
    form.append('apikey', this.apiKey);
    form.append('language', 'eng');
    form.append('isOverlayRequired', 'false');
    form.append('filetype', filetype);
    form.append('detectOrientation', 'true');
    form.append('scale', 'true');
    form.append('isTable', 'true'); // keeps table rows together
    form.append('OCREngine', '2');
    const blob = new Blob([new Uint8Array(file)], { type: MIME_BY_FILETYPE[filetype] });
    form.append('file', blob, filename);

    logger.info('Requesting OCR', { filename, bytes: file.length, filetype });
    const startTime = Date.now();

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.url, {
          method: 'POST',
          body: form,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        throw new TextExtractionError('transport', `OCR request failed: ${describeError(err)}`);
      }

      if (!response.ok) {
        throw new TextExtractionError('transport', `OCR service responded ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw new TextExtractionError('remote', `OCR response is not JSON: ${describeError(err)}`);
      }

      const text = parseOcrResponse(body);
      const duration = (Date.now() - startTime) / 1000;
      ocrRequestDurationHistogram.observe(duration);
      ocrRequestsCounter.inc({ status: 'success' });

      logger.info('OCR complete', { filename, chars: text.length, duration_seconds: duration });
      return text;
    } catch (err) {
      ocrRequestDurationHistogram.observe((Date.now() - startTime) / 1000);
      ocrRequestsCounter.inc({ status: 'error' });
      logger.error('OCR failed', err, { filename });
      throw err;
    }
  }
}
