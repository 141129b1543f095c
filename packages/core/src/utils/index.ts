export { escapeRegExp, execAll, sameName } from './regex.js';
