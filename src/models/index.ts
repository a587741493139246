/**
 * Export all data models for easy importing
 */

export * from './atom';
export * from './constraint';
export { CifBlock, CifLoop } from './cifBlock';
export type { RecordTable } from './cifBlock';
