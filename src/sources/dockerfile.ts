/**
 * Dockerfile reader
 *
 * Collects metadata defaults from ARG and LABEL declarations and records the
 * full inventory of declared ARG names and LABEL keys.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { BuildMetadata, DockerfileInventory, SourceValues } from '../domain/types/build';
import { ExitCode } from '../domain/types/errors';
import { countStages, parseDockerfile, splitAssignment } from '../lib/dockerfile-parser';
import { DockerfileError } from '../lib/errors';

type ArgField = keyof BuildMetadata | 'baseImageTemplate' | 'buildType' | 'version';

/**
 * ARG names whose default value seeds a configuration field
 */
export const METADATA_ARGS: Readonly<Record<string, ArgField>> = {
  BUILD_FROM: 'baseImageTemplate',
  BUILD_NAME: 'name',
  BUILD_DESCRIPTION: 'description',
  BUILD_URL: 'url',
  BUILD_GIT_URL: 'gitUrl',
  BUILD_VENDOR: 'vendor',
  BUILD_DOC_URL: 'docUrl',
  BUILD_MAINTAINER: 'maintainer',
  BUILD_TYPE: 'buildType',
  BUILD_VERSION: 'version',
};

/**
 * LABEL keys whose value seeds a metadata field
 */
export const METADATA_LABELS: Readonly<Record<string, keyof BuildMetadata>> = {
  'org.label-schema.name': 'name',
  'org.label-schema.description': 'description',
  'org.label-schema.url': 'url',
  'org.label-schema.vcs-url': 'gitUrl',
  'org.label-schema.vendor': 'vendor',
  'org.label-schema.usage': 'docUrl',
  maintainer: 'maintainer',
};

export interface DockerfileSource {
  path: string;
  text: string;
  values: SourceValues;
  inventory: DockerfileInventory;
}

/**
 * Extract values and inventory from Dockerfile text.
 * Throws when the Dockerfile declares more than one stage.
 */
export function inspectDockerfile(text: string): Omit<DockerfileSource, 'path' | 'text'> {
  const instructions = parseDockerfile(text);
  const args = new Set<string>();
  const labels = new Set<string>();
  const fromArgs: SourceValues = {};
  const fromLabels: SourceValues = {};
  let legacyMaintainer: string | undefined;

  for (const instruction of instructions) {
    switch (instruction.cmd) {
      case 'arg':
        for (const token of instruction.value) {
          const { key, value } = splitAssignment(token);
          args.add(key);
          const field = METADATA_ARGS[key];
          if (field && value && fromArgs[field] === undefined) {
            fromArgs[field] = value;
          }
        }
        break;

      case 'label':
        for (let i = 0; i + 1 < instruction.value.length; i += 2) {
          const key = instruction.value[i] ?? '';
          const value = instruction.value[i + 1] ?? '';
          labels.add(key);
          const field = METADATA_LABELS[key];
          if (field && value && fromLabels[field] === undefined) {
            fromLabels[field] = value;
          }
        }
        break;

      case 'maintainer':
        legacyMaintainer ??= instruction.value[0];
        break;
    }
  }

  const fromCount = countStages(instructions);
  if (fromCount > 1) {
    throw new DockerfileError('The Dockerfile seems to be multistage!', ExitCode.MULTISTAGE, { fromCount });
  }

  const values: SourceValues = { ...fromLabels, ...fromArgs };
  if (values.maintainer === undefined && legacyMaintainer) {
    values.maintainer = legacyMaintainer;
  }

  return { values, inventory: { args, labels, fromCount } };
}

export const dockerfilePath = (dir: string): string => path.join(dir, 'Dockerfile');

/**
 * Read and inspect `<dir>/Dockerfile`
 */
export async function readDockerfile(dir: string): Promise<DockerfileSource> {
  const file = dockerfilePath(dir);
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch {
    throw new DockerfileError('Dockerfile not found?', ExitCode.DOCKERFILE, { path: file });
  }

  return { path: file, text, ...inspectDockerfile(text) };
}
