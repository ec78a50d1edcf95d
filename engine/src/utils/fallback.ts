/**
 * flakedesk Engine — Fallback Chains
 *
 * An explicit ordered list of alternative actions for one goal, tried until
 * one of them succeeds. Each alternative carries its own success predicate
 * (exit code 0 unless stated otherwise).
 *
 * Exhausting the list is reported, never thrown: the caller knows whether
 * the goal was optional.
 */

import { CommandResult } from "./command";
import { Logger } from "./logger";

export interface Alternative {
  label: string;
  run: () => Promise<CommandResult>;
  succeeded?: (result: CommandResult) => boolean;
}

export interface AlternativeAttempt {
  label: string;
  exitCode: number;
  ok: boolean;
}

export interface FallbackResult {
  ok: boolean;
  /** Label of the alternative that succeeded */
  winner?: string;
  attempts: AlternativeAttempt[];
}

const exitedZero = (result: CommandResult): boolean => result.exitCode === 0;

export async function runAlternatives(
  alternatives: Alternative[],
  options: { label: string; logger: Logger },
): Promise<FallbackResult> {
  const attempts: AlternativeAttempt[] = [];

  for (const alternative of alternatives) {
    let result: CommandResult;
    try {
      result = await alternative.run();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      options.logger.debug(
        { goal: options.label, alternative: alternative.label, error: message },
        "Alternative threw",
      );
      attempts.push({ label: alternative.label, exitCode: -1, ok: false });
      continue;
    }

    const ok = (alternative.succeeded ?? exitedZero)(result);
    attempts.push({ label: alternative.label, exitCode: result.exitCode, ok });

    if (ok) {
      options.logger.debug(
        { goal: options.label, alternative: alternative.label },
        "Alternative succeeded",
      );
      return { ok: true, winner: alternative.label, attempts };
    }
  }

  options.logger.debug(
    { goal: options.label, tried: attempts.length },
    "All alternatives exhausted",
  );
  return { ok: false, attempts };
}
