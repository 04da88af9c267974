import type { MergerConfig, ResolvedMergerConfig } from './types';

export const DEFAULT_MAX_IDLE_MAPS = 4;

/**
 * Apply defaults to a merger configuration and validate it.
 * @internal
 */
export function resolveMergerConfig(config: MergerConfig = {}): ResolvedMergerConfig {
  const maxIdleMaps = config.maxIdleMaps ?? DEFAULT_MAX_IDLE_MAPS;
  if (!Number.isInteger(maxIdleMaps) || maxIdleMaps < 0) {
    throw new RangeError(
      `Invalid maxIdleMaps ${maxIdleMaps}. Must be a non-negative integer`,
    );
  }

  return {
    maxIdleMaps,
    logger: config.logger ?? console,
  };
}
