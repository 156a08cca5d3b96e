/**
 * Preflight checks on a resolved configuration
 *
 * Each check is a distinct fatal condition with its own exit code; they run
 * in a fixed order so the reported error does not depend on which other
 * inputs are also wrong.
 */

import type { Architecture, BuildConfig } from '../domain/types/build';
import { ExitCode } from '../domain/types/errors';
import { DockerfileError, ValidationError } from '../lib/errors';

/**
 * Everything checked before the build type has been narrowed
 */
export type PreflightInput = Omit<BuildConfig, 'buildType'> & {
  buildType: string;
  /** Number of FROM instructions in the Dockerfile */
  fromCount: number;
  /** Whether the supported set was declared by a manifest */
  supportedDeclared: boolean;
  /** Whether every supported architecture was requested */
  all: boolean;
};

export function checkArchitectures(input: PreflightInput): void {
  if (input.architectures.length === 0) {
    throw new ValidationError('You need to specify at least one architecture to build', ExitCode.NO_ARCHS);
  }
}

export function checkVersion(input: PreflightInput): void {
  if (!input.version) {
    throw new ValidationError('No version found and none specified', ExitCode.VERSION);
  }
}

export function checkSupported(input: PreflightInput): void {
  if (!input.supportedDeclared || input.all) return;

  const unsupported: Architecture[] = input.architectures.filter(
    (arch) => !input.supportedArchitectures.includes(arch),
  );
  if (unsupported.length > 0) {
    throw new ValidationError(
      `Requested to build for ${unsupported.join(', ')} but it is not supported (supported: ${input.supportedArchitectures.join(', ')})`,
      ExitCode.SUPPORTED,
      { unsupported },
    );
  }
}

export function checkFrom(input: PreflightInput): void {
  if (input.fromCount === 0) {
    throw new DockerfileError('The Dockerfile has no FROM instruction', ExitCode.DOCKERFILE);
  }
}

export function checkBaseImages(input: PreflightInput): void {
  for (const arch of input.architectures) {
    if (!input.baseImages[arch]) {
      throw new ValidationError(`No FROM image for ${arch} found`, ExitCode.NO_FROM, { arch });
    }
  }
}

export function checkImageName(input: PreflightInput): void {
  if (!input.outputImageTemplate) {
    throw new ValidationError('Image name not set', ExitCode.NO_IMAGE_NAME);
  }
}

export function checkBuildType(input: PreflightInput): void {
  if (input.buildType !== 'addon' && input.buildType !== 'base') {
    throw new ValidationError(`Invalid build type '${input.buildType}', expected addon or base`, ExitCode.INVALID_TYPE);
  }
}

const FATAL_CHECKS = [
  checkArchitectures,
  checkVersion,
  checkSupported,
  checkFrom,
  checkBaseImages,
  checkImageName,
  checkBuildType,
];

/**
 * Run every fatal check in order, throwing the first failure
 */
export function runPreflight(input: PreflightInput): void {
  for (const check of FATAL_CHECKS) {
    check(input);
  }
}
