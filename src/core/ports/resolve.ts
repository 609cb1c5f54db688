/**
 * Port Resolution Helpers
 * 
 * Resolve the OutputPort from a caller's options, falling back to
 * plain console output when none is provided.
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(options?: { output?: OutputPort }): OutputPort {
  return options?.output ?? consoleOutput;
}
