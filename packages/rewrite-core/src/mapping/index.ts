export { MappingRule } from './mapping-rule.js';
export { MappingTable } from './mapping-table.js';
