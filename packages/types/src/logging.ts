/**
 * Logger plumbing shared by the engine components.
 *
 * Components accept an optional pino logger and stay silent without one.
 */

import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger };

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Child logger tagged with the emitting component.
 */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? silentLogger()).child({ component });
}
