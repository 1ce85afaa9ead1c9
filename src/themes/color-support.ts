/**
 * Terminal color capability detection
 */

import type { ColorProbe } from '../logger/types.js';

/**
 * Anything that may report whether it is attached to a terminal
 */
export interface TerminalLike {
  isTTY?: boolean;
}

function isForced(value: string | undefined): boolean {
  if (value === undefined || value === '') return false;
  const normalized = value.trim().toLowerCase();
  return normalized !== '0' && normalized !== 'false';
}

/**
 * Decides whether ANSI colors should be emitted
 *
 * NO_COLOR and FIELDLINE_NO_COLOR disable colors; FORCE_COLOR and
 * FIELDLINE_FORCE_COLOR enable them unless set to "0" or "false"; otherwise
 * colors follow whether the stream is a TTY.
 *
 * @param stream - Destination stream (default: process.stderr)
 * @param env - Environment variables (default: process.env)
 */
export function detectColorSupport(
  stream: TerminalLike = process.stderr,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.NO_COLOR || env.FIELDLINE_NO_COLOR) {
    return false;
  }
  if (isForced(env.FORCE_COLOR) || isForced(env.FIELDLINE_FORCE_COLOR)) {
    return true;
  }
  return stream.isTTY === true;
}

/**
 * Probe used by the registry unless one is configured
 */
export const defaultColorProbe: ColorProbe = () => detectColorSupport();
