export {
  mappingRuleSchema,
  mappingFileEnvelopeSchema,
  tagNameSchema,
  tagClassConfigSchema,
  formatZodIssues,
} from './schemas.js';
export type { MappingRuleInput, TagClassConfigInput } from './schemas.js';
