/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for default values used throughout the builder.
 */

import { ARCHITECTURES, type Architecture, type BuildType } from '../domain/types/build';

/**
 * Placeholder substituted with the architecture in image templates
 */
export const ARCH_PLACEHOLDER = '{arch}';

/**
 * Supported architectures when no manifest declares any
 */
export const DEFAULT_ARCHITECTURES: readonly Architecture[] = ARCHITECTURES;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  daemon: 20000, // 20 seconds for dockerd to come up or go down
  daemonPoll: 1000, // 1 second between daemon checks
  command: 30000, // 30 seconds for short git/docker queries
  clone: 600000, // 10 minutes
} as const;

/**
 * Defaults filled into the build configuration when no source supplied a value
 */
export const DEFAULT_BUILD = {
  branch: 'master',
  buildType: 'addon' satisfies BuildType,
  buildRef: 'Unknown',
  name: 'Unknown',
  description: 'No description provided',
  vendor: 'Unknown',
  maintainer: 'Unknown',
  schemaVersion: '1.0',
} as const;

/**
 * Manifest files, in lookup order; within each group the first existing file is read
 */
export const MANIFEST_FILES: readonly (readonly string[])[] = [
  ['config.json', 'config.yaml', 'config.yml'],
  ['build.json', 'build.yaml', 'build.yml'],
];

/**
 * Cross-architecture emulation
 */
export const DEFAULT_EMULATION = {
  binfmtPath: '/proc/sys/fs/binfmt_misc',
  handlers: ['qemu-arm', 'qemu-aarch64'],
} as const;

/**
 * Version used for a dirty working tree under the sentinel policy
 */
export const DIRTY_VERSION = 'dirty';
