export type {
  MappingRuleConfig,
  MappingFile,
  QualifiedName,
  MappingWarningKind,
  MappingWarning,
} from './mapping.js';

export type {
  TagClass,
  TagClassConfig,
  TagStats,
  ReferenceRewrite,
  RewriteDiagnostic,
  LogStats,
  DocumentStatus,
  DocumentStats,
  RewriteReport,
  TransformationResult,
  BatchReport,
} from './report.js';
