export * from "./internals/lattice";
export * from "./internals/numbers";
export * from "./internals/constraints";
export { upwardsAntichain } from "./internals/antichain";
export { LatticeConfig, Verbosity, WideningStrategy } from "./internals/config";
export { AnalysisContext, ContextOptions } from "./internals/context";
export { Logger, LogLevel, QuietLogger, DebugLogger } from "./internals/logger";
export { InternalException, ExecutionException } from "./internals/exceptions";
export { DFLATTICE_VERSION } from "./version";
