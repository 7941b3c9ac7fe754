export * from './types';
export * from './constants';
export { InvalidArgumentError } from './errors';
export { newBlock, blockEnd, blockToString, blockListToString } from './block';
export {
  newMemorySpace,
  malloc,
  free,
  defrag,
  memoryToString,
  clearEvents,
} from './memory';
export {
  freeBytes,
  allocatedBytes,
  largestFreeBlock,
  fragmentation,
  snapshot,
  checkInvariants,
} from './inspect';
export { runScenario } from './scenario';
export type { Step, ScenarioResult } from './scenario';
