/**
 * Fixed report content: identical on every run
 */

export const VERIFICATION_CHECKLIST: readonly string[] = Object.freeze([
  'Define measurable metrics for each principle',
  'Establish baseline measurements',
  'Test under stress conditions',
  'Validate refutability conditions',
  'Document edge cases and limitations',
]);

export const NEXT_STEPS: readonly string[] = Object.freeze([
  'Collect data for every metric named above',
  'Run each test against the baseline measurements',
  'Record which hypotheses were refuted and why',
  'Revise the model and run the analysis again',
]);
