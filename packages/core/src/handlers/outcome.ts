/**
 * Tagged results for route handler execution.
 *
 * A route handler either produces a response or a fault. Faults travel as
 * values until `ErrorDispatcher.complete` turns them into responses.
 */

import { resultToResponse } from "~/app/helpers.ts";
import { toFault } from "~/errors/transformer.ts";
import type { ErrorTransformer } from "~/errors/types.ts";

export type Outcome =
  | { readonly ok: true; readonly response: Response }
  | { readonly ok: false; readonly fault: Error };

export function succeed(response: Response): Outcome {
  return { ok: true, response };
}

export function fail(fault: Error): Outcome {
  return { ok: false, fault };
}

/**
 * Run a route handler and capture its result or fault.
 *
 * Return values are converted with the same rules as route results:
 * `Response` as-is, null → 204, strings → text, bytes → octet-stream,
 * anything else → JSON.
 *
 * @example
 * ```typescript
 * const outcome = await settle(() => handler(ctx));
 * if (!outcome.ok) console.error(outcome.fault);
 * ```
 */
export async function settle(
  run: () => unknown,
  transform: ErrorTransformer = toFault,
): Promise<Outcome> {
  try {
    return succeed(resultToResponse(await run()));
  } catch (error) {
    return fail(transform(error));
  }
}
