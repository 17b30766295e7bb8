/**
 * Candidate merging
 *
 * @module merge
 */

export * from './CandidateTable.js';
export * from './CoalescingMerger.js';
export * from './ResolutionScope.js';
