export { formatRewriteReport, formatBatchReport } from './report-formatter.js';
