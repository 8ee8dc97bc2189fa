export { ConcurrentPool } from './utils/concurrent-pool';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
} from './utils/llm-caller';
export { withTempDir } from './utils/temp-dir';
export { PipelineError, isPipelineError } from './errors/pipeline-error';
export { ConfigurationError } from './errors/configuration-error';
