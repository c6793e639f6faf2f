export {
  clientInfoExtractor,
  createClientInfoExtractor,
  extractClientInfo,
  formatGroupedIdentifier,
  type ClientInfoExtractorOptions,
} from './extractors/client-info-extractor';
export type { FieldExtractor } from './extractors/field-extractor';
export {
  parseOrdonnance,
  prescriptionExtractor,
} from './extractors/prescription-extractor';
export { CLIENT_INFO } from './config/constants';
export { normalizeWhitespace } from './utils/whitespace';
