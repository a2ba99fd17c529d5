import { ExecutionException } from "./exceptions";
import * as fs from "fs";
import { z } from "zod";

const VerbositySchema = z.enum(["quiet", "debug", "default"]);

const WideningStrategySchema = z.enum(["wide-range", "domain"]);

const ConfigSchema = z.object({
  verbosity: VerbositySchema.optional().default("default"),
  widening: z
    .object({
      strategy: WideningStrategySchema.optional().default("wide-range"),
    })
    .strict()
    .optional()
    .default({}),
});

export type Verbosity = z.infer<typeof VerbositySchema>;

/**
 * How integral elements are widened:
 * - `wide-range`: jump to the range recorded before the value was narrowed
 *   by conditions, or to the whole domain when there is none.
 * - `domain`: always jump to the whole domain of the width.
 */
export type WideningStrategy = z.infer<typeof WideningStrategySchema>;

/**
 * Represents content of the configuration file (dflattice.config.json).
 */
export class LatticeConfig {
  public verbosity: Verbosity;
  public wideningStrategy: WideningStrategy;

  /**
   * @throws {Error} if the configuration file cannot be read or parsed.
   * @throws {ZodError} if its content does not match the schema.
   */
  constructor({
    configPath = undefined,
    verbosity = undefined,
    wideningStrategy = undefined,
  }: Partial<{
    configPath: string;
    verbosity: Verbosity;
    wideningStrategy: WideningStrategy;
  }> = {}) {
    let configData: unknown = {};
    if (configPath) {
      try {
        const configFileContents = fs.readFileSync(configPath, "utf8");
        configData = JSON.parse(configFileContents);
      } catch (err) {
        if (err instanceof Error) {
          throw ExecutionException.make(
            `Could not load or parse config file (${configPath}): ${err.message}`,
          );
        } else {
          throw err;
        }
      }
    }
    const parsedConfig = ConfigSchema.parse(configData);
    // Constructor arguments take precedence over the file
    this.verbosity = verbosity ?? parsedConfig.verbosity;
    this.wideningStrategy =
      wideningStrategy ?? parsedConfig.widening.strategy;
  }
}
