/**
 * Build plan
 *
 * Pure derivation of image references and `docker build` requests from a
 * resolved configuration.
 */

import type { Architecture, BuildConfig, DockerfileInventory } from '../../domain/types/build';
import type { BuildRequest } from '../../infrastructure/docker/cli';
import { expandArch } from '../../resolver/resolve';

/**
 * Build arguments passed only when the Dockerfile declares them, in this order
 */
const METADATA_BUILD_ARGS: ReadonlyArray<[string, (config: BuildConfig) => string]> = [
  ['BUILD_DESCRIPTION', (c) => c.description],
  ['BUILD_GIT_URL', (c) => c.gitUrl],
  ['BUILD_MAINTAINER', (c) => c.maintainer],
  ['BUILD_NAME', (c) => c.name],
  ['BUILD_REF', (c) => c.buildRef],
  ['BUILD_TYPE', (c) => c.buildType],
  ['BUILD_URL', (c) => c.url],
  ['BUILD_DOC_URL', (c) => c.docUrl],
  ['BUILD_VENDOR', (c) => c.vendor],
  ['BUILD_VERSION', (c) => c.version],
];

/**
 * UTC timestamp without milliseconds, e.g. `2024-05-01T12:00:00Z`
 */
export const formatBuildDate = (date: Date): string => date.toISOString().replace(/\.\d{3}Z$/, 'Z');

export const imageFor = (config: BuildConfig, arch: Architecture): string =>
  expandArch(config.outputImageTemplate, arch);

export interface ImageTags {
  image: string;
  version: string;
  latest: string;
  test: string;
}

export function imageTags(config: BuildConfig, arch: Architecture): ImageTags {
  const image = imageFor(config, arch);
  return {
    image,
    version: `${image}:${config.version}`,
    latest: `${image}:latest`,
    test: `${image}:test`,
  };
}

/**
 * Additional tags requested on top of the version tag
 */
export function extraTags(config: BuildConfig, arch: Architecture): string[] {
  const tags = imageTags(config, arch);
  const extra: string[] = [];
  if (config.tagLatest) extra.push(tags.latest);
  if (config.tagTest) extra.push(tags.test);
  return extra;
}

/**
 * Split extra build arguments into those the Dockerfile declares and those it ignores
 */
export function partitionExtraArgs(
  config: BuildConfig,
  inventory: DockerfileInventory,
): { declared: Array<[string, string]>; undeclared: string[] } {
  const declared: Array<[string, string]> = [];
  const undeclared: string[] = [];
  for (const [name, value] of Object.entries(config.extraBuildArgs)) {
    if (inventory.args.has(name)) {
      declared.push([name, value]);
    } else {
      undeclared.push(name);
    }
  }
  return { declared, undeclared };
}

export interface BuildRequestOptions {
  dockerfile: string;
  inventory: DockerfileInventory;
  buildDate: string;
  /** Whether the warm-up made `<image>:latest` available as cache */
  useCache: boolean;
}

export function createBuildRequest(
  config: BuildConfig,
  arch: Architecture,
  { dockerfile, inventory, buildDate, useCache }: BuildRequestOptions,
): BuildRequest {
  const tags = imageTags(config, arch);

  const buildArgs: Array<[string, string]> = [
    ['BUILD_FROM', config.baseImages[arch] ?? ''],
    ['BUILD_DATE', buildDate],
    ['BUILD_ARCH', arch],
  ];
  for (const [name, value] of METADATA_BUILD_ARGS) {
    if (inventory.args.has(name)) buildArgs.push([name, value(config)]);
  }
  buildArgs.push(...partitionExtraArgs(config, inventory).declared);

  return {
    context: config.target,
    dockerfile,
    tag: tags.version,
    pull: true,
    squash: config.squash,
    cacheFrom: useCache ? tags.latest : undefined,
    buildArgs,
  };
}

/**
 * JSON-friendly description of what a run would do
 */
export interface BuildPlan {
  config: BuildConfig;
  buildDate: string;
  undeclaredArgs: string[];
  architectures: Array<{
    architecture: Architecture;
    baseImage: string;
    tags: string[];
    request: Omit<BuildRequest, 'dockerfile'>;
  }>;
  dockerfile: string;
}

export function createBuildPlan(
  config: BuildConfig,
  dockerfile: string,
  inventory: DockerfileInventory,
  buildDate: string,
): BuildPlan {
  return {
    config,
    buildDate,
    undeclaredArgs: partitionExtraArgs(config, inventory).undeclared,
    architectures: config.architectures.map((architecture) => {
      const { dockerfile: _text, ...request } = createBuildRequest(config, architecture, {
        dockerfile,
        inventory,
        buildDate,
        useCache: config.cacheEnabled,
      });
      return {
        architecture,
        baseImage: config.baseImages[architecture] ?? '',
        tags: [imageTags(config, architecture).version, ...extraTags(config, architecture)],
        request,
      };
    }),
    dockerfile,
  };
}
