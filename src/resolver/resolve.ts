/**
 * Config Resolver
 *
 * Merges the command line, the Dockerfile, the manifests and Git into one
 * validated BuildConfig. A value supplied by a higher source is never
 * replaced by a lower one.
 */

import { ARCH_PLACEHOLDER, DEFAULT_ARCHITECTURES, DEFAULT_BUILD } from '../config/defaults';
import {
  BuildTypeSchema,
  type Architecture,
  type ArchitectureMap,
  type BuildConfig,
  type BuildMetadata,
  type CliFlags,
  type DockerfileInventory,
  type SourceValues,
} from '../domain/types/build';
import type { GitSource } from '../sources/git';
import { runPreflight, type PreflightInput } from './preflight';

export interface ResolverInput {
  cli: CliFlags;
  manifest: SourceValues;
  dockerfile: { values: SourceValues; inventory: DockerfileInventory };
  git: Pick<GitSource, 'values' | 'authoritative'> & Partial<Pick<GitSource, 'dirty'>>;
}

export interface ResolvedBuild {
  config: BuildConfig;
  notices: string[];
}

/**
 * First value that is neither undefined nor empty
 */
export function firstValue<T>(...candidates: Array<T | undefined>): T | undefined {
  return candidates.find((value) => value !== undefined && value !== '');
}

/**
 * Replace the architecture placeholder in an image template
 */
export const expandArch = (template: string, arch: Architecture): string =>
  template.split(ARCH_PLACEHOLDER).join(arch);

type VersionOrigin = 'cli' | 'git' | 'dockerfile' | 'manifest' | 'none';

function resolveVersion({ cli, manifest, dockerfile, git }: ResolverInput): {
  version: string | undefined;
  origin: VersionOrigin;
} {
  const ordered: Array<[VersionOrigin, string | undefined]> = [
    ['cli', cli.version],
    ['git', git.authoritative ? git.values.version : undefined],
    ['dockerfile', dockerfile.values.version],
    ['manifest', manifest.version],
    ['git', git.values.version],
  ];

  for (const [origin, version] of ordered) {
    if (version) return { version, origin };
  }
  return { version: undefined, origin: 'none' };
}

function resolveBaseImages(
  architectures: readonly Architecture[],
  cliOverrides: ArchitectureMap<string>,
  manifestOverrides: ArchitectureMap<string>,
  template: string | undefined,
): ArchitectureMap<string> {
  const images: ArchitectureMap<string> = {};
  for (const arch of architectures) {
    const image = firstValue(cliOverrides[arch], manifestOverrides[arch], template);
    if (image) {
      images[arch] = expandArch(image, arch);
    }
  }
  return images;
}

const METADATA_NOTICES: ReadonlyArray<[keyof BuildMetadata, string]> = [
  ['name', 'name'],
  ['description', 'description'],
  ['vendor', 'vendor'],
  ['maintainer', 'maintainer'],
  ['url', 'URL'],
  ['docUrl', 'documentation URL'],
];

/**
 * Resolve and validate the build configuration.
 * Throws a BuildError carrying the exit code of the first failed check.
 */
export function resolveBuildConfig(input: ResolverInput): ResolvedBuild {
  const { cli, manifest, dockerfile, git } = input;
  const notices: string[] = [];

  const metadata = (field: keyof BuildMetadata): string | undefined =>
    firstValue(cli[field], dockerfile.values[field], manifest[field], git.values[field]);

  const supplied = {
    name: metadata('name'),
    description: metadata('description'),
    vendor: metadata('vendor'),
    maintainer: metadata('maintainer'),
    url: metadata('url'),
    docUrl: metadata('docUrl'),
    gitUrl: metadata('gitUrl'),
  } satisfies Record<keyof BuildMetadata, string | undefined>;

  for (const [field, label] of METADATA_NOTICES) {
    if (!supplied[field]) notices.push(`No ${label} has been provided`);
  }

  const url = supplied.url ?? firstValue(cli.repository) ?? '';
  const meta: BuildMetadata = {
    name: supplied.name ?? DEFAULT_BUILD.name,
    description: supplied.description ?? DEFAULT_BUILD.description,
    vendor: supplied.vendor ?? DEFAULT_BUILD.vendor,
    maintainer: supplied.maintainer ?? DEFAULT_BUILD.maintainer,
    url,
    docUrl: supplied.docUrl ?? url,
    gitUrl: supplied.gitUrl ?? url,
  };

  // a declared list may be empty when every name in it was unknown
  const supportedDeclared = manifest.supportedArchitectures !== undefined;
  const supportedArchitectures: readonly Architecture[] = manifest.supportedArchitectures ?? DEFAULT_ARCHITECTURES;
  const architectures: readonly Architecture[] = cli.all ? [...supportedArchitectures] : cli.architectures;

  const { version, origin } = resolveVersion(input);
  const gitAdopted = origin === 'git';
  const dirtyUnderGit = cli.useGit && git.dirty === true;

  const baseImageTemplate = firstValue(cli.baseImageTemplate, dockerfile.values.baseImageTemplate);
  const baseImageOverrides: ArchitectureMap<string> = {
    ...manifest.baseImageOverrides,
    ...cli.baseImageOverrides,
  };

  const squash = cli.squash ?? manifest.squash ?? false;
  if (squash && cli.cache) {
    notices.push('Layer cache disabled: squashed builds cannot use a cache source');
  }

  const draft: Omit<BuildConfig, 'buildType'> & { buildType: string } = {
    ...meta,
    target: cli.target,
    architectures,
    supportedArchitectures,
    baseImageTemplate,
    baseImageOverrides,
    baseImages: resolveBaseImages(architectures, cli.baseImageOverrides, manifest.baseImageOverrides ?? {}, baseImageTemplate),
    outputImageTemplate: firstValue(cli.image, manifest.image) ?? '',
    version: version ?? '',
    buildRef: firstValue(git.values.buildRef) ?? DEFAULT_BUILD.buildRef,
    buildType: firstValue(cli.buildType, dockerfile.values.buildType) ?? DEFAULT_BUILD.buildType,
    extraBuildArgs: { ...manifest.extraBuildArgs, ...cli.extraBuildArgs },
    cacheEnabled: cli.cache && !squash,
    squash,
    parallel: cli.parallel,
    push: cli.push,
    tagLatest: cli.tagLatest || (gitAdopted && git.values.tagLatest === true),
    tagTest: cli.tagTest || dirtyUnderGit || (gitAdopted && git.values.tagTest === true),
    labelOverride: cli.labelOverride,
  };

  const preflight: PreflightInput = {
    ...draft,
    fromCount: dockerfile.inventory.fromCount,
    supportedDeclared,
    all: cli.all,
  };
  runPreflight(preflight);

  const config: BuildConfig = { ...draft, buildType: BuildTypeSchema.parse(draft.buildType) };

  return { config, notices };
}
