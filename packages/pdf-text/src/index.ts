export {
  TextAcquirer,
  type StructuralAttempt,
  type TextAcquirerDependencies,
  type TextAcquirerOptions,
} from './core/text-acquirer';
export { OCR_ENGINE, PAGE_RENDERER, TEXT_ACQUISITION } from './config/constants';
export {
  loadToolConfig,
  toolEnvSchema,
  type ToolConfig,
  type ToolEnv,
} from './config/tool-config';
export { ConfigurationError } from './errors/configuration-error';
export {
  OcrError,
  RasterizationError,
  StructuralExtractionError,
  TextAcquisitionError,
} from './errors/text-acquisition-error';
export { OcrEngine, type OcrOptions } from './processors/ocr-engine';
export {
  PageRenderer,
  type PageRenderResult,
  type PageRendererOptions,
} from './processors/page-renderer';
export { PdfTextExtractor } from './processors/pdf-text-extractor';
