/**
 * Tri-state probe results and the first-definite combinator.
 */

import type { Logger } from "../logging/index.js";
import { getErrorMessage } from "../errors.js";

/**
 * Outcome of one probing strategy.
 * - found: the fact is known and has a value
 * - absent: the fact is known to be missing
 * - indeterminate: this strategy could not tell; the next one should try
 */
export type ProbeResult<T> =
  | { readonly kind: "found"; readonly value: T }
  | { readonly kind: "absent" }
  | { readonly kind: "indeterminate"; readonly reason: string };

export function found<T>(value: T): ProbeResult<T> {
  return { kind: "found", value };
}

export const ABSENT = { kind: "absent" } as const satisfies ProbeResult<never>;

export function indeterminate(reason: string): ProbeResult<never> {
  return { kind: "indeterminate", reason };
}

/**
 * A named, independent way of establishing a fact.
 * Implementations should not throw; a thrown error counts as indeterminate.
 */
export interface ProbeStrategy<T> {
  readonly name: string;
  run(): Promise<ProbeResult<T>>;
}

/**
 * Result of {@link firstDefinite}: the deciding result and the strategy that produced it.
 */
export interface ResolvedProbe<T> {
  readonly result: ProbeResult<T>;
  /** Name of the deciding strategy, or null when every strategy was indeterminate */
  readonly strategy: string | null;
}

/**
 * Run strategies in order and stop at the first found or absent result.
 *
 * @param fact - Name of the fact, for logging
 */
export async function firstDefinite<T>(
  fact: string,
  strategies: readonly ProbeStrategy<T>[],
  logger: Logger
): Promise<ResolvedProbe<T>> {
  for (const strategy of strategies) {
    let result: ProbeResult<T>;
    try {
      result = await strategy.run();
    } catch (error) {
      logger.warn("Probe strategy failed", {
        fact,
        strategy: strategy.name,
        error: getErrorMessage(error),
      });
      result = indeterminate(getErrorMessage(error));
    }

    if (result.kind !== "indeterminate") {
      logger.debug("Probe decided", { fact, strategy: strategy.name, result: result.kind });
      return { result, strategy: strategy.name };
    }
    logger.debug("Probe indeterminate", { fact, strategy: strategy.name, reason: result.reason });
  }
  return { result: indeterminate("all strategies indeterminate"), strategy: null };
}

/**
 * Value of a found result, or the fallback for absent and indeterminate ones.
 */
export function valueOr<T>(result: ProbeResult<T>, fallback: T): T {
  return result.kind === "found" ? result.value : fallback;
}
