export * from "./interval";
export * from "./rangeSet";
