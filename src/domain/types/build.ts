/**
 * Build domain types
 * Single source of truth for the records that flow from the readers through
 * the resolver into the augmenter and the orchestrator.
 */

import { z } from 'zod';

export const ARCHITECTURES = ['aarch64', 'amd64', 'armhf', 'i386'] as const;

export const ArchitectureSchema = z.enum(ARCHITECTURES);

export type Architecture = z.infer<typeof ArchitectureSchema>;

export const isArchitecture = (value: string): value is Architecture =>
  ArchitectureSchema.safeParse(value).success;

export const BUILD_TYPES = ['addon', 'base'] as const;

export const BuildTypeSchema = z.enum(BUILD_TYPES);

export type BuildType = z.infer<typeof BuildTypeSchema>;

/**
 * What to do with the version when the working tree has uncommitted changes
 * - sentinel: use the literal "dirty" version
 * - keep: supply no version, leaving the CLI/manifest value in place
 * - fail: refuse to build
 */
export const DirtyPolicySchema = z.enum(['sentinel', 'keep', 'fail']);

export type DirtyPolicy = z.infer<typeof DirtyPolicySchema>;

export type ArchitectureMap<T> = Partial<Record<Architecture, T>>;

/**
 * Descriptive metadata that ends up in labels and build args
 */
export interface BuildMetadata {
  name: string;
  description: string;
  vendor: string;
  maintainer: string;
  url: string;
  docUrl: string;
  gitUrl: string;
}

/**
 * Partial values a single configuration source can supply
 */
export interface SourceValues extends Partial<BuildMetadata> {
  version?: string;
  image?: string;
  buildRef?: string;
  buildType?: string;
  supportedArchitectures?: Architecture[];
  baseImageTemplate?: string;
  baseImageOverrides?: ArchitectureMap<string>;
  squash?: boolean;
  extraBuildArgs?: Record<string, string>;
  tagLatest?: boolean;
  tagTest?: boolean;
}

/**
 * ARG names and LABEL keys already declared by a Dockerfile
 */
export interface DockerfileInventory {
  args: ReadonlySet<string>;
  labels: ReadonlySet<string>;
  fromCount: number;
}

/**
 * Options collected from the command line
 */
export interface CliFlags extends Partial<BuildMetadata> {
  target: string;
  repository?: string;
  branch: string;
  architectures: Architecture[];
  all: boolean;
  baseImageOverrides: ArchitectureMap<string>;
  baseImageTemplate?: string;
  image?: string;
  version?: string;
  buildType?: string;
  tagLatest: boolean;
  tagTest: boolean;
  push: boolean;
  extraBuildArgs: Record<string, string>;
  cache: boolean;
  squash?: boolean;
  parallel: boolean;
  useGit: boolean;
  dirtyPolicy: DirtyPolicy;
  labelOverride: boolean;
  externalDaemon: boolean;
  dryRun: boolean;
  logLevel?: string;
}

/**
 * Fully resolved and validated build configuration
 */
export interface BuildConfig extends Readonly<BuildMetadata> {
  readonly target: string;
  readonly architectures: readonly Architecture[];
  readonly supportedArchitectures: readonly Architecture[];
  readonly baseImageTemplate?: string;
  readonly baseImageOverrides: Readonly<ArchitectureMap<string>>;
  readonly baseImages: Readonly<ArchitectureMap<string>>;
  readonly outputImageTemplate: string;
  readonly version: string;
  readonly buildRef: string;
  readonly buildType: BuildType;
  readonly extraBuildArgs: Readonly<Record<string, string>>;
  readonly cacheEnabled: boolean;
  readonly squash: boolean;
  readonly parallel: boolean;
  readonly push: boolean;
  readonly tagLatest: boolean;
  readonly tagTest: boolean;
  readonly labelOverride: boolean;
}

export interface ArchitectureBuildResult {
  architecture: Architecture;
  build?: number;
  tag?: number;
  push?: number;
}

export interface OrchestrationReport {
  exitCode: number;
  cacheUsed: boolean;
  results: ArchitectureBuildResult[];
}
