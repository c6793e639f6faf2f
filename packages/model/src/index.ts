export type { ClientInfo, ClientRecord } from './client-record';
export type {
  PrescriptionInfo,
  PrescriptionRecord,
} from './prescription-record';
export type { ExtractedRecord, FileRecord, ResultSet } from './result-set';
export type { SourceDocument } from './source-document';
