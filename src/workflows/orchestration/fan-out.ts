/**
 * Per-architecture task group
 *
 * Runs one task per architecture either concurrently or one after the
 * other. Concurrent runs always await every launched task; sequential runs
 * may stop at the first failure.
 */

import type { Architecture } from '../../domain/types/build';
import { Failure, type Result } from '../../domain/types/result';

export interface PhaseOptions {
  parallel: boolean;
  /** Sequential mode only: stop launching tasks after the first failure */
  failFast: boolean;
}

export interface PhaseOutcome<T> {
  architecture: Architecture;
  result: Result<T>;
}

const settle = async <T>(task: () => Promise<Result<T>>): Promise<Result<T>> => {
  try {
    return await task();
  } catch (error) {
    return Failure(error instanceof Error ? error.message : String(error));
  }
};

/**
 * Run `task` for every architecture. Outcomes are listed in architecture
 * order; architectures skipped after a fail-fast stop have no outcome.
 */
export async function runPhase<T>(
  architectures: readonly Architecture[],
  task: (arch: Architecture) => Promise<Result<T>>,
  { parallel, failFast }: PhaseOptions,
): Promise<PhaseOutcome<T>[]> {
  if (parallel && architectures.length > 1) {
    const results = await Promise.all(architectures.map((arch) => settle(() => task(arch))));
    return architectures.map((architecture, index) => ({
      architecture,
      result: results[index] ?? Failure<T>('Task produced no result'),
    }));
  }

  const outcomes: PhaseOutcome<T>[] = [];
  for (const architecture of architectures) {
    const result = await settle(() => task(architecture));
    outcomes.push({ architecture, result });
    if (!result.ok && failFast) break;
  }
  return outcomes;
}

/**
 * First failed outcome in architecture order
 */
export const firstFailure = <T>(outcomes: PhaseOutcome<T>[]): PhaseOutcome<T> | undefined =>
  outcomes.find((outcome) => !outcome.result.ok);
