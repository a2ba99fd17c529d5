import * as packageJson from "../package.json";

export const DFLATTICE_VERSION = packageJson.version;
