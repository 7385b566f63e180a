/**
 * Decision Engine
 *
 * Public surface of the classification, planning, regression and
 * orchestration layers.
 */

export * from './classification.ts';
export * from './orchestrator.ts';
export * from './planner.ts';
export * from './regression.ts';
export * from './summary.ts';
export * from './types.ts';
