/**
 * Manifest reader
 *
 * Reads the add-on configuration (`config.json`/`config.yaml`) and the build
 * configuration (`build.json`/`build.yaml`) from the target directory.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { MANIFEST_FILES } from '../config/defaults';
import {
  isArchitecture,
  type Architecture,
  type ArchitectureMap,
  type SourceValues,
} from '../domain/types/build';
import { ManifestError } from '../lib/errors';

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/**
 * Keys the builder understands; anything else in the file is ignored
 */
export const ManifestSchema = z
  .object({
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    image: z.string().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    url: z.string().optional(),
    arch: z.array(z.string()).optional(),
    build_from: z.record(z.string()).optional(),
    squash: z.boolean().optional(),
    args: z.record(scalar).optional(),
  })
  .passthrough();

export type Manifest = z.infer<typeof ManifestSchema>;

export interface ManifestSource {
  values: SourceValues;
  /** Files that were read, in precedence order */
  files: string[];
  notices: string[];
}

function knownArchitectures(names: string[], file: string, notices: string[]): Architecture[] {
  const known: Architecture[] = [];
  for (const name of names) {
    if (isArchitecture(name)) {
      if (!known.includes(name)) known.push(name);
    } else {
      notices.push(`Ignoring unknown architecture '${name}' in ${file}`);
    }
  }
  return known;
}

/**
 * Validate a decoded manifest document and map it onto source values
 */
export function parseManifest(raw: unknown, file: string): { values: SourceValues; notices: string[] } {
  const parsed = ManifestSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ManifestError(`Invalid manifest ${file}: ${issues.join('; ')}`, file);
  }

  const manifest = parsed.data;
  const notices: string[] = [];
  const values: SourceValues = {};

  if (manifest.version !== undefined) values.version = manifest.version;
  if (manifest.image !== undefined) values.image = manifest.image;
  if (manifest.name !== undefined) values.name = manifest.name;
  if (manifest.description !== undefined) values.description = manifest.description;
  if (manifest.url !== undefined) values.url = manifest.url;
  if (manifest.squash !== undefined) values.squash = manifest.squash;
  if (manifest.args !== undefined) values.extraBuildArgs = { ...manifest.args };

  if (manifest.arch !== undefined && manifest.arch.length > 0) {
    values.supportedArchitectures = knownArchitectures(manifest.arch, file, notices);
  }

  if (manifest.build_from !== undefined) {
    const overrides: ArchitectureMap<string> = {};
    for (const [arch, image] of Object.entries(manifest.build_from)) {
      if (isArchitecture(arch)) {
        overrides[arch] = image;
      } else {
        notices.push(`Ignoring build_from for unknown architecture '${arch}' in ${file}`);
      }
    }
    values.baseImageOverrides = overrides;
  }

  return { values, notices };
}

/**
 * Combine two sources; values already present in `primary` win, maps are
 * merged entry by entry.
 */
export function mergeSourceValues(primary: SourceValues, secondary: SourceValues): SourceValues {
  const merged: SourceValues = { ...secondary, ...primary };

  if (primary.baseImageOverrides || secondary.baseImageOverrides) {
    merged.baseImageOverrides = { ...secondary.baseImageOverrides, ...primary.baseImageOverrides };
  }
  if (primary.extraBuildArgs || secondary.extraBuildArgs) {
    merged.extraBuildArgs = { ...secondary.extraBuildArgs, ...primary.extraBuildArgs };
  }

  for (const [key, value] of Object.entries(merged)) {
    if (value === undefined) Reflect.deleteProperty(merged, key);
  }

  return merged;
}

async function readDocument(file: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new ManifestError(`Cannot read ${file}`, file, error instanceof Error ? error : undefined);
  }

  try {
    return file.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    throw new ManifestError(
      `Cannot parse ${file}: ${error instanceof Error ? error.message : String(error)}`,
      file,
      error instanceof Error ? error : undefined,
    );
  }
}

async function firstExisting(dir: string, candidates: readonly string[]): Promise<string | undefined> {
  for (const candidate of candidates) {
    const file = path.join(dir, candidate);
    try {
      const stat = await fs.stat(file);
      if (stat.isFile()) return file;
    } catch {
      continue;
    }
  }
  return undefined;
}

/**
 * Read every manifest present in `dir`. A directory without manifests
 * yields empty values.
 */
export async function readManifests(dir: string): Promise<ManifestSource> {
  const source: ManifestSource = { values: {}, files: [], notices: [] };

  for (const group of MANIFEST_FILES) {
    const file = await firstExisting(dir, group);
    if (!file) continue;

    const { values, notices } = parseManifest(await readDocument(file), path.basename(file));
    source.values = mergeSourceValues(source.values, values);
    source.files.push(file);
    source.notices.push(...notices);
  }

  return source;
}
