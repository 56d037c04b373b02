import inquirer from 'inquirer';
import path from 'path';
import type { ConfigKind } from './types.js';

export interface ResolveRequest {
  kind: ConfigKind;
  candidates: readonly string[];
  region?: string;
  year?: number;
}

/**
 * Picks one configuration file out of the discovered candidates, or returns null
 * to let the next strategy decide.
 */
export interface ConfigResolver {
  resolve(request: ResolveRequest): Promise<string | null>;
}

export type SelectFile = (message: string, candidates: readonly string[]) => Promise<string>;

export class ExplicitPathResolver implements ConfigResolver {
  constructor(
    private readonly filePath: string,
    private readonly kind?: ConfigKind
  ) {}

  async resolve(request: ResolveRequest): Promise<string | null> {
    if (this.kind && this.kind !== request.kind) return null;
    return path.resolve(this.filePath);
  }
}

export class RegionYearResolver implements ConfigResolver {
  async resolve({ kind, candidates, region, year }: ResolveRequest): Promise<string | null> {
    if (kind !== 'holiday' || !region || year === undefined) return null;

    const regionLower = region.toLowerCase();
    const yearStr = String(year);
    const byName = new Map(candidates.map((file) => [path.basename(file).toLowerCase(), file]));

    const exact =
      byName.get(`holidays-${regionLower}-${yearStr}.json`) ??
      byName.get(`holidays-${regionLower}-${yearStr}.ics`);
    if (exact) return exact;

    const partial = candidates.find((file) => {
      const name = path.basename(file).toLowerCase();
      return name.includes(regionLower) && name.includes(yearStr);
    });

    return partial ?? null;
  }
}

export class SingleCandidateResolver implements ConfigResolver {
  async resolve({ candidates }: ResolveRequest): Promise<string | null> {
    return candidates.length === 1 ? candidates[0] : null;
  }
}

export const promptForFile: SelectFile = async (message, candidates) => {
  const { file } = await inquirer.prompt<{ file: string }>([
    {
      type: 'list',
      name: 'file',
      message,
      choices: candidates.map((candidate) => ({
        name: path.basename(candidate),
        value: candidate,
      })),
    },
  ]);
  return file;
};

export class PromptResolver implements ConfigResolver {
  constructor(private readonly select: SelectFile = promptForFile) {}

  async resolve({ kind, candidates }: ResolveRequest): Promise<string | null> {
    if (candidates.length === 0) return null;
    return this.select(`Select a ${kind} configuration file:`, candidates);
  }
}

export class ChainResolver implements ConfigResolver {
  constructor(private readonly resolvers: readonly ConfigResolver[]) {}

  async resolve(request: ResolveRequest): Promise<string | null> {
    for (const resolver of this.resolvers) {
      const resolved = await resolver.resolve(request);
      if (resolved) return resolved;
    }
    return null;
  }
}

/**
 * Explicit paths first, then region/year match, a lone candidate, and finally a prompt.
 */
export function createDefaultResolver(
  options: {
    vacationConfigPath?: string;
    holidayConfigPath?: string;
    interactive?: boolean;
    select?: SelectFile;
  } = {}
): ConfigResolver {
  const resolvers: ConfigResolver[] = [];

  if (options.vacationConfigPath) {
    resolvers.push(new ExplicitPathResolver(options.vacationConfigPath, 'vacation'));
  }
  if (options.holidayConfigPath) {
    resolvers.push(new ExplicitPathResolver(options.holidayConfigPath, 'holiday'));
  }

  resolvers.push(new RegionYearResolver(), new SingleCandidateResolver());

  if (options.interactive ?? true) {
    resolvers.push(new PromptResolver(options.select));
  }

  return new ChainResolver(resolvers);
}
