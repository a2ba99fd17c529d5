export * from "./types";
export * from "./common";
export * from "./widening";
export { DfTypes } from "./factory";
export {
  dfTypeToString,
  equals,
  getConstantValue,
  hashCode,
  isSuperType,
  join,
  meet,
  nullabilityOf,
  tryNegate,
  typeKey,
} from "./dfType";
export { meetRange, widenToWideRange } from "./integral";
export { asReference, STRING_LENGTH_FIELD } from "./reference";
export { parseConstantPayload, parsePrimitiveLiteral } from "./literals";
export { DfTypeLattice } from "./dfLattice";
