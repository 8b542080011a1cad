import type { ToolRunner } from '@ghidra-dmg/core';
import type { Logger } from '@ghidra-dmg/utils';

/**
 * What every modification step gets handed
 */
export interface StepContext {
  runner: ToolRunner;
  logger: Logger;
  signal?: AbortSignal;
}
