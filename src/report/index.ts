export { sortMismatches, formatMismatch, reportMismatches } from './reporter.js';
