import { PipelineError } from './pipeline-error';

/**
 * A numeric or string parameter is invalid (e.g., non-integer DPI).
 * Raised before any extraction or translation work starts.
 */
export class ConfigurationError extends PipelineError {
  public readonly name = 'ConfigurationError';
  public readonly code = 'CONFIGURATION_ERROR' as const;

  constructor(
    public readonly parameter: string,
    message: string,
  ) {
    super(`Invalid ${parameter}: ${message}`);
  }
}
