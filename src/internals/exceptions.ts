import { DFLATTICE_VERSION } from "../version";
import JSONbig from "json-bigint";
import { ZodError } from "zod";

const SEPARATOR =
  "============================================================";

/**
 * Dumps a value attached to an exception.
 *
 * Lattice elements carry `bigint` ranges, which `JSON.stringify` rejects.
 */
function stringifyNode(input: unknown): string {
  try {
    return JSONbig.stringify(input, null, 2);
  } catch (jsonError) {
    return `[Unable to stringify object: ${jsonError}]`;
  }
}

/**
 * Internal error, typically caused by a bug in dflattice or incorrect API usage.
 */
export class InternalException {
  private constructor() {}
  static make(
    msg: string,
    {
      node = undefined,
      trace = true,
    }: Partial<{
      node: unknown;
      trace: boolean;
    }> = {},
  ): Error {
    const errorKind = "Internal dflattice Error:";
    const fullMsg = [
      errorKind,
      msg,
      ...(node === undefined ? [] : [`${SEPARATOR}\n${stringifyNode(node)}`]),
      ...(trace ? [SEPARATOR, getCurrentStackTrace(), SEPARATOR] : []),
      getVersions(),
    ].join("\n");
    return new Error(fullMsg);
  }
}

/**
 * An error caused by incorrect actions of the user, such as wrong configuration
 * or problems in the environment.
 */
export class ExecutionException {
  private constructor() {}
  static make(msg: string): Error {
    const shortMsg = ["Execution Error:", msg].join("\n");
    return new Error(shortMsg);
  }
}

/**
 * Returns backtrace of the JS script upon execution.
 */
function getCurrentStackTrace(): string {
  const stack = new Error().stack;
  return stack === undefined
    ? "No stack trace available"
    : `Backtrace: ${stack}`;
}

function getVersions(): string {
  return `Using dflattice ${DFLATTICE_VERSION}`;
}

/**
 * Throws an ExecutionException with a human-readable ZodError message.
 * @param err The ZodError to throw.
 */
export function throwZodError(
  err: unknown,
  {
    msg = undefined,
    help = undefined,
  }: Partial<{ msg: string; help: string }> = {},
): never {
  if (err instanceof ZodError) {
    const formattedErrors = err.errors
      .map((e) => {
        const path = e.path.length ? e.path.join(" > ") : "root";
        return `- ${e.message} at ${path}`;
      })
      .join("\n");
    throw ExecutionException.make(
      `${msg ? msg + "\n" : ""}${formattedErrors}${help ? "\n\n" + help : ""}`,
    );
  } else {
    throw err;
  }
}
