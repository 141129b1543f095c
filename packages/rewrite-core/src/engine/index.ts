export { RewriteEngine } from './rewrite-engine.js';
export type {
  TextUnit,
  RewriteInput,
  RewrittenLog,
  RewriteOutput,
  RewriteEngineOptions,
} from './rewrite-engine.js';
