/**
 * Removal of ephemeral build directories.
 *
 * @packageDocumentation
 */

export { cleanProject } from './clean.js';
export type { CleanSummary } from './clean.js';
