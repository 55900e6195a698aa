// src/core.ts
// Runtime configuration and the process-wide default sink.
// - Debug output: build flag first, then environment.
// - Color: per sink, 'auto' unless TICKLOG_COLOR says otherwise.

import type { ColorMode, Sink, TicklogConfig } from './types';
import { processEnv } from './format';
import type { Env } from './format';
import { ConsoleSink } from './sinks';

/* ------------------------- Build-time debug flag guard ------------------------- */

/**
 * The release bundle defines __TICKLOG_DEBUG__ as `false`, which fixes `dbg()`
 * to a no-op. Guard with typeof: unbundled sources never see the define.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
declare const __TICKLOG_DEBUG__: boolean | undefined;
export const BUILD_DEBUG: boolean | undefined = typeof __TICKLOG_DEBUG__ !== 'undefined' ? __TICKLOG_DEBUG__ : undefined;

/* ------------------------------- Env helpers ------------------------------- */

/**
 * Parse an on/off switch: `1|true|yes|on` or `0|false|no|off`.
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
function parseSwitch(s?: string): boolean | undefined {
    switch (s?.trim().toLowerCase()) {
        case '1': case 'true': case 'yes': case 'on': return true;
        case '0': case 'false': case 'no': case 'off': return false;
    }
    return undefined;
}

function parseColorMode(s?: string): ColorMode | undefined {
    const v = s?.trim().toLowerCase();
    return v === 'auto' || v === 'on' || v === 'off' ? v : undefined;
}

/**
 * Resolve whether `dbg()` is live, in the following order:
 * 1) Build flag (`__TICKLOG_DEBUG__`)
 * 2) `TICKLOG_DEBUG=<switch>`
 * 3) `DEBUG_MODE=<switch>`
 * 4) `NODE_ENV=production` → off, else on
 */
export function resolveDebug(env: Env = processEnv(), buildFlag: boolean | undefined = BUILD_DEBUG): boolean {
    if (buildFlag !== undefined) return buildFlag;
    const explicit = parseSwitch(env.TICKLOG_DEBUG) ?? parseSwitch(env.DEBUG_MODE);
    if (explicit !== undefined) return explicit;
    return env.NODE_ENV?.trim().toLowerCase() !== 'production';
}

/**
 * Effective debug switch for a logger. A build flag of `false` is final;
 * otherwise an explicit request wins over the environment.
 */
export function debugSwitch(requested?: boolean, buildFlag: boolean | undefined = BUILD_DEBUG): boolean {
    if (buildFlag === false) return false;
    return requested ?? resolveDebug(processEnv(), buildFlag);
}

/** Resolve the runtime configuration from an environment bag (default: `process.env`). */
export function resolveConfig(env: Env = processEnv()): TicklogConfig {
    return {
        debug: resolveDebug(env),
        color: parseColorMode(env.TICKLOG_COLOR) ?? 'auto',
    };
}

/* ------------------------------- Default sink ------------------------------ */

let defaultSink: Sink | undefined;

/** The shared console sink, created on first use. */
export function getDefaultSink(): Sink {
    if (!defaultSink) defaultSink = new ConsoleSink(resolveConfig().color);
    return defaultSink;
}

/** Replace the shared sink; `undefined` restores the console sink on next use. */
export function setDefaultSink(sink: Sink | undefined): void {
    defaultSink = sink;
}
