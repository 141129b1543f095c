/**
 * @schemashift/archive
 *
 * Project archive I/O, text encodings, mapping files and project
 * transformers
 */

export { readArchive, writeArchive, packArchive, unpackArchive } from './archive.js';
export type { ArchiveEntries } from './archive.js';

export { decodeDocument, encodeDocument, decodeLog, encodeLog } from './encoding.js';
export type { DecodedDocument, DocumentEncoding } from './encoding.js';

export {
  parseMappingFile,
  loadMappingTable,
  saveMappingTable,
  serializeMappingTable,
} from './mapping-store.js';
export type { MappingLoadResult } from './mapping-store.js';

export { BaseProjectTransformer } from './base-project-transformer.js';
export type {
  IProjectTransformer,
  ProjectTransformerOptions,
  TransformOptions,
} from './base-project-transformer.js';

export { EgpTransformer, createEgpTransformer, PROJECT_DOCUMENT } from './egp-transformer.js';
