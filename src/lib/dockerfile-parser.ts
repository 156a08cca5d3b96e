/**
 * Dockerfile parsing
 *
 * Turns Dockerfile text into a flat list of instructions, one entry per
 * logical instruction (continuation lines joined), shaped like
 * `{ cmd: 'label', value: ['key', 'value', ...] }`.
 */

export interface DockerfileInstruction {
  /** Lower-cased instruction keyword */
  cmd: string;
  /**
   * Instruction arguments:
   * - arg: one token per declaration (`NAME` or `NAME=value`, unquoted)
   * - label: flattened key/value pairs
   * - from: whitespace separated tokens
   * - anything else: the raw remainder as a single entry
   */
  value: string[];
  /** 1-based line on which the instruction starts */
  line: number;
}

/**
 * Joins continuation lines into logical lines.
 * Comment lines inside a continuation are dropped, as the Docker parser does.
 */
function logicalLines(text: string): Array<{ content: string; line: number }> {
  const physical = text.split(/\r?\n/);
  const result: Array<{ content: string; line: number }> = [];
  let buffer: string[] = [];
  let startLine = 0;

  physical.forEach((raw, index) => {
    const trimmed = raw.trim();

    if (buffer.length === 0) {
      if (!trimmed || trimmed.startsWith('#')) return;
      startLine = index + 1;
    } else if (trimmed.startsWith('#')) {
      return;
    }

    if (trimmed.endsWith('\\')) {
      buffer.push(trimmed.slice(0, -1).trim());
      return;
    }

    buffer.push(trimmed);
    result.push({ content: buffer.filter(Boolean).join(' '), line: startLine });
    buffer = [];
  });

  if (buffer.length > 0) {
    result.push({ content: buffer.filter(Boolean).join(' '), line: startLine });
  }

  return result;
}

/**
 * Split on whitespace outside quotes, removing the quotes themselves.
 * Backslash escapes the next character inside double quotes and unquoted text.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let inToken = false;

  for (let i = 0; i < input.length; i++) {
    const char = input.charAt(i);

    if (quote) {
      if (char === quote) {
        quote = null;
      } else if (char === '\\' && quote === '"' && i + 1 < input.length) {
        current += input.charAt(++i);
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
    } else if (char === '\\' && i + 1 < input.length) {
      current += input.charAt(++i);
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}

/**
 * Split a `key=value` token; a token without `=` has no value
 */
export function splitAssignment(token: string): { key: string; value?: string } {
  const index = token.indexOf('=');
  if (index === -1) {
    return { key: token };
  }
  return { key: token.slice(0, index), value: token.slice(index + 1) };
}

function parseLabelValue(rest: string): string[] {
  const tokens = tokenize(rest);
  const first = tokens[0];

  // Legacy form: LABEL key value with spaces
  if (first !== undefined && !first.includes('=')) {
    return [first, tokens.slice(1).join(' ')];
  }

  return tokens.flatMap((token) => {
    const { key, value } = splitAssignment(token);
    return [key, value ?? ''];
  });
}

/**
 * Parses Dockerfile content into instruction objects
 *
 * @example
 * ```typescript
 * parseDockerfile('FROM alpine\nARG BUILD_FROM=base\nLABEL a="b c"');
 * // [
 * //   { cmd: 'from', value: ['alpine'], line: 1 },
 * //   { cmd: 'arg', value: ['BUILD_FROM=base'], line: 2 },
 * //   { cmd: 'label', value: ['a', 'b c'], line: 3 },
 * // ]
 * ```
 */
export function parseDockerfile(dockerfileContent: string): DockerfileInstruction[] {
  const instructions: DockerfileInstruction[] = [];

  for (const { content, line } of logicalLines(dockerfileContent)) {
    const match = content.match(/^([A-Za-z]+)(?:\s+(.*))?$/);
    if (!match?.[1]) continue;

    const cmd = match[1].toLowerCase();
    const rest = match[2] ?? '';

    let value: string[];
    switch (cmd) {
      case 'arg':
      case 'from':
        value = tokenize(rest);
        break;
      case 'label':
        value = parseLabelValue(rest);
        break;
      default:
        value = rest ? [rest] : [];
    }

    instructions.push({ cmd, value, line });
  }

  return instructions;
}

/**
 * Count build stages
 */
export const countStages = (instructions: DockerfileInstruction[]): number =>
  instructions.filter((instruction) => instruction.cmd === 'from').length;
