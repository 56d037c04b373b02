import type { SelectFile } from '../config-resolver.js';

export interface SelectStub {
  select: SelectFile;
  calls: { message: string; candidates: readonly string[] }[];
}

/**
 * Builds a file selector that records its prompts and always picks the candidate at `index`.
 */
export function createSelectStub(index: number): SelectStub {
  const calls: SelectStub['calls'] = [];
  return {
    calls,
    async select(message, candidates) {
      calls.push({ message, candidates });
      return candidates[index];
    },
  };
}
