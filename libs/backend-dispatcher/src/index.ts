export type * from './types';
export type * from './contracts';
export { aggregateOutcomes, failedHosts, outcomesOf, type BatchResult, type HostOutcome } from './results';
export type { NodeSelector } from '@libs/hostlist';
