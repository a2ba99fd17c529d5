import { JoinSemilattice, MeetSemilattice } from "./common";
import { WideningLattice } from "./widening";
import { BOTTOM, DfType, TOP } from "./types";
import { DfTypes } from "./factory";
import { dfTypeToString, equals, isSuperType, join, meet } from "./dfType";
import { widenToWideRange } from "./integral";
import { WideningStrategy } from "../config";
import { AnalysisContext } from "../context";
import { Logger } from "../logger";

/**
 * The lattice of {@link DfType} elements, ready to be plugged into a
 * worklist solver.
 */
export class DfTypeLattice
  implements
    JoinSemilattice<DfType>,
    MeetSemilattice<DfType>,
    WideningLattice<DfType>
{
  private readonly logger: Logger;
  private readonly strategy: WideningStrategy;

  constructor(ctx: AnalysisContext) {
    this.logger = ctx.logger.child("lattice");
    this.strategy = ctx.config.wideningStrategy;
  }

  bottom(): DfType {
    return BOTTOM;
  }

  top(): DfType {
    return TOP;
  }

  leq(a: DfType, b: DfType): boolean {
    return isSuperType(b, a);
  }

  join(a: DfType, b: DfType): DfType {
    return join(a, b);
  }

  meet(a: DfType, b: DfType): DfType {
    return meet(a, b);
  }

  /**
   * Widens integral elements that keep growing: to the recorded wide range
   * or to the whole domain, depending on the configured strategy. Other
   * elements have finite height and widen to their join.
   */
  widen(oldState: DfType, newState: DfType): DfType {
    const joined = join(oldState, newState);
    if (joined.kind !== "Integral" || isSuperType(oldState, joined)) {
      return joined;
    }
    const domain = joined.width === "int" ? DfTypes.INT : DfTypes.LONG;
    const widened =
      this.strategy === "wide-range" && joined.wideRange !== undefined
        ? widenToWideRange(joined)
        : domain;
    if (!equals(widened, joined)) {
      this.logger.debug(
        `Widening ${dfTypeToString(oldState)} -> ${dfTypeToString(widened)}`,
      );
    }
    return widened;
  }
}
