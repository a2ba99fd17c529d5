import {
  ExecutionException,
  InternalException,
  throwZodError,
} from "../src/internals/exceptions";
import { DFLATTICE_VERSION } from "../src/version";
import { z } from "zod";

describe("Exceptions", () => {
  it("builds internal errors with the offending value", () => {
    const err = InternalException.make("boom", {
      node: { kind: "Top" },
      trace: false,
    });
    expect(err.message).toBe(
      [
        "Internal dflattice Error:",
        "boom",
        "============================================================",
        "{",
        '  "kind": "Top"',
        "}",
        `Using dflattice ${DFLATTICE_VERSION}`,
      ].join("\n"),
    );
  });

  it("includes the backtrace by default", () => {
    expect(InternalException.make("boom").message).toContain("Backtrace: ");
  });

  it("builds execution errors", () => {
    expect(ExecutionException.make("bad input").message).toBe(
      "Execution Error:\nbad input",
    );
  });

  it("formats zod errors", () => {
    const result = z.object({ depth: z.number() }).safeParse({ depth: "x" });
    if (result.success) throw new Error("expected a validation failure");
    expect(() =>
      throwZodError(result.error, { msg: "Invalid options", help: "See docs" }),
    ).toThrow(
      "Execution Error:\nInvalid options\n- Expected number, received string at depth\n\nSee docs",
    );
  });

  it("rethrows other errors as is", () => {
    const err = new Error("plain");
    expect(() => throwZodError(err)).toThrow(err);
  });
});
