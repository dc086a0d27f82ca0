/**
 * @syslang/report - Narrative and structured analysis reports
 */
export {
  render,
  toStructured,
  parseReportFormat,
  type ReportFormat,
  type StructuredReport,
  type StructuredHypothesis,
} from './reporter.js';
export { VERIFICATION_CHECKLIST, NEXT_STEPS } from './checklist.js';
