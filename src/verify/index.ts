/**
 * Load verification of the generated package.
 *
 * @packageDocumentation
 */

export { buildProbes, discoverModules, runVerification } from './probe.js';
export type { Probe, ProbeOutcome, VerifyOptions, VerifySummary } from './probe.js';
