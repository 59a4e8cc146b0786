export {
  ConcurrentPool,
  type ConcurrentPoolOptions,
  type PoolOutcome,
} from './utils/concurrent-pool';
export {
  CallTimeoutError,
  callWithBounds,
  checkAborted,
  type BoundedCallOptions,
} from './utils/bounded-call';
export {
  SpawnExitError,
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  LLMCaller,
  type CallUsage,
  type LLMCallConfig,
  type LLMCallResult,
  type LLMVisionCallConfig,
} from './utils/llm-caller';
