import { ConstantPayload, PrimitiveLiteral } from "./types";
import { LongRangeSet } from "../numbers";
import { z } from "zod";

const integer = (min: number, max: number) =>
  z.number().int().min(min).max(max);
const floating = z.union([z.number(), z.nan()]);

export const PrimitiveLiteralSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("boolean"), value: z.boolean() }),
  z.object({ type: z.literal("byte"), value: integer(-128, 127) }),
  z.object({ type: z.literal("short"), value: integer(-32768, 32767) }),
  z.object({ type: z.literal("char"), value: integer(0, 65535) }),
  z.object({
    type: z.literal("int"),
    value: integer(Number(LongRangeSet.INT_MIN), Number(LongRangeSet.INT_MAX)),
  }),
  z.object({
    type: z.literal("long"),
    value: z.bigint().min(LongRangeSet.LONG_MIN).max(LongRangeSet.LONG_MAX),
  }),
  z.object({ type: z.literal("float"), value: floating }),
  z.object({ type: z.literal("double"), value: floating }),
]);

const name = z.string().min(1);

export const ConstantPayloadSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("string"), value: z.string() }),
  z.object({ kind: z.literal("enum"), enumType: name, name }),
  z.object({ kind: z.literal("field"), owner: name, name, type: name }),
  z.object({ kind: z.literal("class"), typeName: name }),
  z.object({ kind: z.literal("boxed"), literal: PrimitiveLiteralSchema }),
]);

/**
 * Validates a host literal, returning `undefined` for anything that is not
 * a primitive literal.
 */
export function parsePrimitiveLiteral(
  value: unknown,
): PrimitiveLiteral | undefined {
  if (typeof value === "boolean") return { type: "boolean", value };
  if (typeof value === "bigint") return { type: "long", value };
  const parsed = PrimitiveLiteralSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export function parseConstantPayload(
  value: unknown,
): ConstantPayload | undefined {
  const parsed = ConstantPayloadSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Canonical text of a payload: equal payloads have equal keys.
 */
export function payloadKey(payload: ConstantPayload): string {
  switch (payload.kind) {
    case "string":
      return `string:${JSON.stringify(payload.value)}`;
    case "enum":
      return `enum:${payload.enumType}.${payload.name}`;
    case "field":
      return `field:${payload.owner}.${payload.name}:${payload.type}`;
    case "class":
      return `class:${payload.typeName}`;
    case "boxed":
      return `boxed:${payload.literal.type}:${literalText(payload.literal)}`;
  }
}

export function literalText(literal: PrimitiveLiteral): string {
  switch (literal.type) {
    case "float":
    case "double":
      return Object.is(literal.value, -0) ? "-0.0" : String(literal.value);
    default:
      return String(literal.value);
  }
}
