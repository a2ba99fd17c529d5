import { LatticeConfig, Verbosity, WideningStrategy } from "./config";
import { DebugLogger, Logger, QuietLogger } from "./logger";
import { throwZodError } from "./exceptions";

export interface ContextOptions {
  /** Path to a `dflattice.config.json` file. */
  config: string;
  verbosity: Verbosity;
  wideningStrategy: WideningStrategy;
  /** Collect log messages instead of printing them. */
  saveJson: boolean;
}

/**
 * Configuration and logger shared by the components of an analysis.
 */
export class AnalysisContext {
  public logger: Logger;
  public config: LatticeConfig;

  /**
   * Initializes the context, setting up configuration and appropriate logger.
   */
  constructor(options: Partial<ContextOptions> = {}) {
    try {
      this.config = new LatticeConfig({
        configPath: options.config,
        verbosity: options.verbosity,
        wideningStrategy: options.wideningStrategy,
      });
    } catch (err) {
      throwZodError(err, {
        msg: options.config
          ? `Error parsing dflattice configuration ${options.config}`
          : "Error parsing dflattice configuration",
        help: "Expected: { verbosity?: quiet|debug|default, widening?: { strategy?: wide-range|domain } }",
      });
    }

    const saveJson = options.saveJson ?? false;
    this.logger =
      this.config.verbosity === "quiet"
        ? new QuietLogger(saveJson)
        : this.config.verbosity === "debug"
          ? new DebugLogger(saveJson)
          : new Logger(undefined, saveJson);
  }
}
