/**
 * Console logging gated by the `verbose` and `debug` configuration flags.
 */

import { config } from "./config.js";

const PREFIX = "[splicer]";

export function logVerbose(message: string): void {
  if (config.get("verbose") === true || config.get("debug") === true) {
    console.log(`${PREFIX} ${message}`);
  }
}

export function logDebug(message: string): void {
  if (config.get("debug") === true) {
    console.log(`${PREFIX} ${message}`);
  }
}

export function logWarning(message: string): void {
  console.warn(`${PREFIX} ${message}`);
}
