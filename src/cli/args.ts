/**
 * Command line definition
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS } from '../config/index';
import { DEFAULT_BUILD } from '../config/defaults';
import {
  ARCHITECTURES,
  DirtyPolicySchema,
  type Architecture,
  type ArchitectureMap,
  type CliFlags,
  type DirtyPolicy,
} from '../domain/types/build';
import { splitAssignment } from '../lib/dockerfile-parser';

interface CliOptions {
  target: string;
  repository?: string;
  branch: string;
  all?: boolean;
  from?: string;
  aarch64From?: string;
  amd64From?: string;
  armhfFrom?: string;
  i386From?: string;
  image?: string;
  version?: string;
  tagLatest?: boolean;
  tagTest?: boolean;
  push?: boolean;
  arg: string[];
  cache: boolean;
  squash?: boolean;
  git?: boolean;
  dirty: DirtyPolicy;
  name?: string;
  description?: string;
  vendor?: string;
  maintainer?: string;
  author?: string;
  url?: string;
  docUrl?: string;
  gitUrl?: string;
  type?: string;
  override?: boolean;
  externalDaemon?: boolean;
  dryRun?: boolean;
  logLevel?: string;
}

const FROM_OPTIONS = {
  aarch64: 'aarch64From',
  amd64: 'amd64From',
  armhf: 'armhfFrom',
  i386: 'i386From',
} as const satisfies Record<Architecture, keyof CliOptions>;

const collect = (value: string, previous: string[]): string[] => [...previous, value];

/**
 * Join `--arg KEY VALUE` into `--arg KEY=VALUE` so commander sees a single value
 */
export function normalizeArgPairs(argv: readonly string[]): string[] {
  const normalized: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    const key = argv[i + 1];
    const value = argv[i + 2];
    if (token === '--arg' && key !== undefined && !key.includes('=') && value !== undefined && !value.startsWith('--')) {
      normalized.push(token, `${key}=${value}`);
      i += 2;
    } else {
      normalized.push(token);
    }
  }
  return normalized;
}

/**
 * Parse repeated `KEY=VALUE` pairs; a bare key gets an empty value
 */
export function parseArgPairs(pairs: readonly string[]): Record<string, string> {
  const args: Record<string, string> = {};
  for (const pair of pairs) {
    const { key, value } = splitAssignment(pair);
    if (key) args[key] = value ?? '';
  }
  return args;
}

export interface CliProgram {
  program: Command;
  /** Flags collected by the last parse */
  flags(): CliFlags;
}

export function createCliProgram(): CliProgram {
  const program = new Command();
  const requested: Architecture[] = [];
  let parallel = false;

  program
    .name('multiarch-build')
    .description('Build, tag and push Docker images for several CPU architectures')
    .option('-t, --target <dir>', 'directory containing the Dockerfile', '.')
    .option('-r, --repository <url>', 'clone this repository into the working directory first')
    .option('-b, --branch <name>', 'branch to clone', DEFAULT_BUILD.branch)
    .option('-a, --all', 'build every supported architecture');

  for (const arch of ARCHITECTURES) {
    program.option(`--${arch}`, `build for ${arch}`);
    program.option(`--${arch}-from <image>`, `base image for ${arch}`);
    program.on(`option:${arch}`, () => {
      if (!requested.includes(arch)) requested.push(arch);
    });
  }

  program
    .option('-f, --from <image>', 'base image template, {arch} is replaced by the architecture')
    .option('-i, --image <image>', 'output image template, {arch} is replaced by the architecture')
    .option('-v, --version <version>', 'image version')
    .option('-l, --tag-latest', 'also tag the image as latest')
    .option('--tag-test', 'also tag the image as test')
    .option('-p, --push', 'push the images after building')
    .option('--arg <key=value>', 'extra build argument, repeatable', collect, [])
    .option('--no-cache', 'do not use the previous image as cache')
    .option('--squash', 'squash the image layers')
    .option('--no-squash', 'do not squash the image layers')
    .option('--parallel', 'run builds and pushes for all architectures at once')
    .option('--single', 'run builds and pushes one architecture at a time')
    .option('-g, --git', 'derive version and tags from git')
    .addOption(
      new Option('--dirty <policy>', 'version for a dirty working tree with --git')
        .choices(DirtyPolicySchema.options)
        .default('sentinel'),
    )
    .option('-n, --name <name>', 'image name label')
    .option('-d, --description <text>', 'image description label')
    .option('--vendor <vendor>', 'vendor label')
    .option('-m, --maintainer <maintainer>', 'maintainer label')
    .option('--author <author>', 'alias for --maintainer')
    .option('-u, --url <url>', 'project URL label')
    .option('--doc-url <url>', 'documentation URL label')
    .option('--git-url <url>', 'source repository URL label')
    .option('--type <type>', 'build type: addon or base')
    .option('-o, --override', 'replace labels the Dockerfile already sets')
    .option('--external-daemon', 'use the running docker daemon instead of starting one')
    .option('--dry-run', 'print the resolved build plan as JSON and exit')
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS))
    .addHelpText(
      'after',
      `

Examples:
  $ multiarch-build --amd64 --armhf -t addon -i example/{arch}-addon -v 1.0.0
  $ multiarch-build --all -t addon --git --push --parallel
  $ multiarch-build --aarch64 --aarch64-from example/base:aarch64 --dry-run`,
    )
    .on('option:parallel', () => {
      parallel = true;
    })
    .on('option:single', () => {
      parallel = false;
    });

  const flags = (): CliFlags => {
    const options = program.opts<CliOptions>();

    const baseImageOverrides: ArchitectureMap<string> = {};
    for (const arch of ARCHITECTURES) {
      const image = options[FROM_OPTIONS[arch]];
      if (image) baseImageOverrides[arch] = image;
    }

    return {
      target: options.target,
      repository: options.repository,
      branch: options.branch,
      architectures: [...requested],
      all: options.all === true,
      baseImageOverrides,
      baseImageTemplate: options.from,
      image: options.image,
      version: options.version,
      buildType: options.type,
      tagLatest: options.tagLatest === true,
      tagTest: options.tagTest === true,
      push: options.push === true,
      extraBuildArgs: parseArgPairs(options.arg),
      cache: options.cache,
      squash: options.squash,
      parallel,
      useGit: options.git === true,
      dirtyPolicy: options.dirty,
      labelOverride: options.override === true,
      externalDaemon: options.externalDaemon === true,
      dryRun: options.dryRun === true,
      logLevel: options.logLevel,
      name: options.name,
      description: options.description,
      vendor: options.vendor,
      maintainer: options.maintainer ?? options.author,
      url: options.url,
      docUrl: options.docUrl,
      gitUrl: options.gitUrl,
    };
  };

  return { program, flags };
}

/**
 * Parse user arguments (without the node executable and script path)
 */
export function parseCliArguments(args: readonly string[]): CliFlags {
  const { program, flags } = createCliProgram();
  program.exitOverride();
  program.parse(normalizeArgPairs(args), { from: 'user' });
  return flags();
}
