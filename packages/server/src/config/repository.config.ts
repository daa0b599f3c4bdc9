import { readFileSync } from 'node:fs';
import * as z from 'zod';

const repositorySchema = z.object({
  name: z.string().min(1),
  searchPrefix: z.string().default(''),
  excludedPaths: z.array(z.string()).default([]),
  includedPaths: z.array(z.string()).default([]),
  organization: z.string().optional(),
  project: z.string().optional(),
});

const repositoryFileSchema = z.object({
  repositories: z.array(repositorySchema),
});

export type RepositorySearchConfig = z.infer<typeof repositorySchema>;

/** Per-repository query prefix and path rules for code search. */
export class RepositoryConfigs {
  private readonly byName = new Map<string, RepositorySearchConfig>();

  constructor(entries: RepositorySearchConfig[] = []) {
    for (const entry of entries) {
      this.byName.set(entry.name.toLowerCase(), {
        ...entry,
        excludedPaths: entry.excludedPaths.map((path) => path.toLowerCase()),
        includedPaths: entry.includedPaths.map((path) => path.toLowerCase()),
      });
    }
  }

  static fromFile(file: string): RepositoryConfigs {
    const raw: unknown = JSON.parse(readFileSync(file, { encoding: 'utf-8' }));
    const parsed = repositoryFileSchema.safeParse(raw);

    if (!parsed.success) {
      throw new Error(`Invalid repository configuration in ${file}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }

    return new RepositoryConfigs(parsed.data.repositories);
  }

  names(): string[] {
    return [...this.byName.values()].map((entry) => entry.name);
  }

  /** Unknown repositories search unprefixed with no path rules. */
  get(repository: string): RepositorySearchConfig {
    return this.byName.get(repository.toLowerCase()) ?? {
      name: repository,
      searchPrefix: '',
      excludedPaths: [],
      includedPaths: [],
    };
  }

  applyPrefix(repository: string, searchText: string): string {
    const { searchPrefix } = this.get(repository);
    return searchPrefix ? `${searchPrefix} ${searchText}` : searchText;
  }

  /** Included paths are a whitelist for interactive searches only; research searches ignore them. */
  shouldExcludePath(repository: string, path: string, agentSearch = false): boolean {
    const { excludedPaths, includedPaths } = this.get(repository);
    const lower = path.toLowerCase();

    if (includedPaths.length > 0 && !agentSearch && !includedPaths.some((included) => lower.includes(included))) {
      return true;
    }

    return excludedPaths.some((excluded) => lower.includes(excluded));
  }
}
