/**
 * Dockerfile Augmenter
 *
 * Appends the metadata labels (and the build-time ARGs they reference) to a
 * Dockerfile without touching what is already there.
 */

import { DEFAULT_BUILD } from '../config/defaults';
import type { BuildConfig, DockerfileInventory } from '../domain/types/build';

export interface AugmentedDockerfile {
  text: string;
  inventory: DockerfileInventory;
}

interface LabelSpec {
  key: string;
  /** Literal value, escaped on output */
  value?: (config: BuildConfig) => string;
  /** Build argument whose expansion becomes the value */
  arg?: string;
}

/**
 * Labels in the order they are written
 */
export const LABELS: readonly LabelSpec[] = [
  { key: 'org.label-schema.schema-version', value: () => DEFAULT_BUILD.schemaVersion },
  { key: 'org.label-schema.build-date', arg: 'BUILD_DATE' },
  { key: 'org.label-schema.name', value: (c) => c.name },
  { key: 'org.label-schema.description', value: (c) => c.description },
  { key: 'org.label-schema.url', value: (c) => c.url },
  { key: 'org.label-schema.vcs-url', value: (c) => c.gitUrl },
  { key: 'org.label-schema.vcs-ref', value: (c) => c.buildRef },
  { key: 'org.label-schema.vendor', value: (c) => c.vendor },
  { key: 'org.label-schema.usage', value: (c) => c.docUrl },
  { key: 'maintainer', value: (c) => c.maintainer },
  { key: 'io.hass.type', value: (c) => c.buildType },
  { key: 'org.label-schema.version', value: (c) => c.version },
  { key: 'io.hass.version', value: (c) => c.version },
  { key: 'io.hass.arch', arg: 'BUILD_ARCH' },
];

/**
 * Escape a literal for a double-quoted Dockerfile value
 */
export const escapeLabelValue = (value: string): string => value.replace(/(["\\$])/g, '\\$1');

/**
 * Append missing (or, with `labelOverride`, all) labels to the Dockerfile
 */
export function augmentDockerfile(
  config: BuildConfig,
  text: string,
  inventory: DockerfileInventory,
): AugmentedDockerfile {
  const args = new Set(inventory.args);
  const labels = new Set(inventory.labels);
  const appendedArgs: string[] = [];
  const entries: string[] = [];

  for (const label of LABELS) {
    if (!config.labelOverride && inventory.labels.has(label.key)) continue;

    let value: string;
    if (label.arg) {
      if (!args.has(label.arg)) {
        args.add(label.arg);
        appendedArgs.push(`ARG ${label.arg}`);
      }
      value = `\${${label.arg}}`;
    } else {
      value = escapeLabelValue(label.value?.(config) ?? '');
    }

    labels.add(label.key);
    entries.push(`${label.key}="${value}"`);
  }

  if (entries.length === 0) {
    return { text, inventory: { args, labels, fromCount: inventory.fromCount } };
  }

  const lines = [...appendedArgs, `LABEL \\\n    ${entries.join(' \\\n    ')}`];
  const base = text.length === 0 || text.endsWith('\n') ? text : `${text}\n`;

  return {
    text: `${base}${lines.join('\n')}\n`,
    inventory: { args, labels, fromCount: inventory.fromCount },
  };
}
