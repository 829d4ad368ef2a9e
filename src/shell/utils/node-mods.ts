/**
 * CHANGE: Central re-exports of Node built-ins shared by shell modules
 *
 * Invariant: modules declared with `export =` are re-exported as constants, never via `export *`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { exec } from "node:child_process";
export { promisify } from "node:util";

export const fs = fsNS;
export const path = pathNS;
