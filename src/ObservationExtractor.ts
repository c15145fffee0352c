// src/ObservationExtractor.ts
// Pattern-matching technology detection over a repository snapshot: the GitHub
// language breakdown, well-known manifest files and CI configuration.

import { z } from 'zod';
import signatureData from './data/technology-signatures.json';
import type { RepositoryDataSource } from './dataSource';
import { NotFoundError, describeError } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { RepositorySnapshot, TechnologyCategory, TechnologyObservationSet } from './model';
import { TECHNOLOGY_CATEGORIES } from './model';

// ============================================================================
// SIGNATURE TABLES
// ============================================================================

const SignatureSchema = z.object({
  name: z.string(),
  category: z.enum(TECHNOLOGY_CATEGORIES),
  contains: z.string().optional(),
});
const PackageTableSchema = z.record(z.string(), SignatureSchema);

const SignatureFileSchema = z.object({
  npmPackages: PackageTableSchema,
  pythonPackages: PackageTableSchema,
  composerPackages: PackageTableSchema,
  gemPackages: PackageTableSchema,
  rootFiles: z.record(z.string(), z.array(SignatureSchema)),
  rootExtensions: z.record(z.string(), z.array(SignatureSchema)),
});

export type TechnologySignature = z.infer<typeof SignatureSchema>;
type PackageTable = z.infer<typeof PackageTableSchema>;

const SIGNATURES = SignatureFileSchema.parse(signatureData);
const ROOT_FILES = new Map(Object.entries(SIGNATURES.rootFiles));
const ROOT_EXTENSIONS = new Map(Object.entries(SIGNATURES.rootExtensions));

interface ManifestReader {
  parse: (text: string) => string[];
  packages: Map<string, TechnologySignature>;
}

// Manifests whose dependency lists are read, in addition to their rootFiles entries.
const MANIFEST_READERS = new Map<string, ManifestReader>([
  [
    'package.json',
    {
      parse: (text) => jsonDependencyNames(text, ['dependencies', 'devDependencies', 'peerDependencies']),
      packages: toMap(SIGNATURES.npmPackages),
    },
  ],
  ['requirements.txt', { parse: requirementNames, packages: toMap(SIGNATURES.pythonPackages) }],
  [
    'composer.json',
    {
      parse: (text) => jsonDependencyNames(text, ['require', 'require-dev']),
      packages: toMap(SIGNATURES.composerPackages),
    },
  ],
  ['Gemfile', { parse: gemNames, packages: toMap(SIGNATURES.gemPackages) }],
]);

function toMap(table: PackageTable): Map<string, TechnologySignature> {
  return new Map(Object.entries(table));
}

// ============================================================================
// MANIFEST PARSING
// ============================================================================

export function jsonDependencyNames(text: string, sections: string[]): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return [];
  }
  if (typeof parsed !== 'object' || parsed === null) return [];

  const names: string[] = [];
  for (const section of sections) {
    const block: unknown = Reflect.get(parsed, section);
    if (typeof block === 'object' && block !== null) {
      names.push(...Object.keys(block));
    }
  }
  return names;
}

export function requirementNames(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.replace(/#.*/, '').trim())
    .filter((line) => line.length > 0 && !line.startsWith('-'))
    .map((line) => line.split(/[\s=<>!~;[]/)[0].toLowerCase())
    .filter((name) => name.length > 0);
}

export function gemNames(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(/^\s*gem\s+['"]([^'"]+)['"]/gm)) {
    names.push(match[1]);
  }
  return names;
}

// ============================================================================
// EXTRACTOR
// ============================================================================

export class ObservationExtractor {
  constructor(
    private readonly source: Pick<RepositoryDataSource, 'fetchFileText'>,
    private readonly logger: Logger = silentLogger
  ) {}

  async extract(snapshot: RepositorySnapshot): Promise<TechnologyObservationSet> {
    const found = new Map<TechnologyCategory, Set<string>>(
      TECHNOLOGY_CATEGORIES.map((category) => [category, new Set<string>()])
    );
    const add = (signature: { name: string; category: TechnologyCategory }): void => {
      found.get(signature.category)?.add(signature.name);
    };

    for (const language of Object.keys(snapshot.languages)) {
      add({ name: language, category: 'languages' });
    }

    const rootFiles = new Set(snapshot.rootEntries.filter((e) => e.type === 'blob').map((e) => e.name));
    for (const fileName of rootFiles) {
      await this.inspectRootFile(snapshot, fileName, add);
    }

    if (snapshot.workflowFiles.some((file) => /\.ya?ml$/i.test(file))) {
      add({ name: 'GitHub Actions', category: 'tools' });
    }

    return {
      languages: found.get('languages') ?? new Set(),
      frameworks: found.get('frameworks') ?? new Set(),
      tools: found.get('tools') ?? new Set(),
      platforms: found.get('platforms') ?? new Set(),
    };
  }

  private async inspectRootFile(
    snapshot: RepositorySnapshot,
    fileName: string,
    add: (signature: TechnologySignature) => void
  ): Promise<void> {
    const extension = fileName.includes('.') ? fileName.slice(fileName.lastIndexOf('.')) : '';
    ROOT_EXTENSIONS.get(extension)?.forEach(add);

    const fileSignatures = ROOT_FILES.get(fileName) ?? [];
    const reader = MANIFEST_READERS.get(fileName);
    const needsContent = reader !== undefined || fileSignatures.some((s) => s.contains !== undefined);

    if (!needsContent) {
      fileSignatures.forEach(add);
      return;
    }

    const text = await this.readOptional(snapshot, fileName);
    for (const signature of fileSignatures) {
      if (signature.contains === undefined || (text !== null && text.includes(signature.contains))) {
        add(signature);
      }
    }
    if (text === null || reader === undefined) return;

    for (const dependency of reader.parse(text)) {
      const signature = reader.packages.get(dependency) ?? reader.packages.get(dependency.toLowerCase());
      if (signature) add(signature);
    }
  }

  /** File text, or null when the file is missing. Other failures propagate. */
  private async readOptional(snapshot: RepositorySnapshot, fileName: string): Promise<string | null> {
    try {
      return await this.source.fetchFileText(snapshot, fileName);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.debug(`[Scan] ${snapshot.id}: ${fileName} not readable (${describeError(error)})`);
        return null;
      }
      throw error;
    }
  }
}
