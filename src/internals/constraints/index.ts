export * from "./typeConstraint";
export * from "./nominal";
