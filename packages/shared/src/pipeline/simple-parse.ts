/**
 * Synchronous Simple Parse
 *
 * Text extraction plus a single `simple` call, with no record. The upload is
 * kept on disk only for the duration of the call.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger';
import { SectionValidationError } from '../errors';
import type { LocalFileStorage } from '../storage';
import type { TextExtractionClient } from '../clients/text-extraction';
import type { StructuredExtractionClient } from '../clients/structured-extraction';
import { SIMPLE_TEMPLATE } from '../templates';
import { validateSection } from '../schemas';
import { toText } from '../aggregation';
import type { SimpleParsedResult } from '../types';

export interface SimpleParseDeps {
  storage: LocalFileStorage;
  textClient: TextExtractionClient;
  structuredClient: StructuredExtractionClient;
}

/**
 * Throws TextExtractionError when no text could be read, and
 * StructuredExtractionError or SectionValidationError when the call fails.
 */
export async function simpleParse(
  deps: SimpleParseDeps,
  file: Buffer,
  filename: string
): Promise<SimpleParsedResult> {
  const fileId = uuidv4();
  const tempPath = deps.storage.save(`tmp-${fileId}`, filename, file);

  try {
    const text = await deps.textClient.extract(deps.storage.read(tempPath), filename);
    const payload = await deps.structuredClient.extract(text, SIMPLE_TEMPLATE);

    const validation = validateSection('simple', payload);
    if (!validation.valid) {
      throw new SectionValidationError('simple', validation.errors ?? []);
    }

    logger.info('Simple parse complete', { file_id: fileId, filename });
    return {
      file_id: fileId,
      file_path: filename,
      status: 'parsed',
      extracted_fields: {
        party_a: toText(payload.party_a),
        party_b: toText(payload.party_b),
        effective_date: toText(payload.effective_date),
        expiry_date: toText(payload.expiry_date),
        contract_value: toText(payload.contract_value),
      },
    };
  } finally {
    deps.storage.remove(tempPath);
  }
}
