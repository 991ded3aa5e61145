/**
 * Step sequencing.
 *
 * @module navigation
 */

export { StepNavigator } from './step-navigator.js';
export type { NextResult, BackResult } from './step-navigator.js';
