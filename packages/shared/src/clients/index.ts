export {
  OcrSpaceClient,
  fileTypeFor,
  parseOcrResponse,
  type TextExtractionClient,
  type OcrSpaceClientOptions,
} from './text-extraction';
export {
  OpenAiStructuredExtractionClient,
  parseJsonPayload,
  type StructuredExtractionClient,
  type ChatCompletionCreate,
  type OpenAiClientOptions,
} from './structured-extraction';
