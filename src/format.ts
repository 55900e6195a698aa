/* ---------------------------------- Types ---------------------------------- */

import { AnsiColor } from './types';
import type { ColorMode } from './types';

export type Env = Record<string, string | undefined>;

/** `process.env` when running under Node, else an empty bag. */
export function processEnv(): Env {
    return typeof process !== 'undefined' ? process.env : {};
}

/**
 * Raised by `formatMessage` for a malformed template or an argument mismatch.
 * Loggers catch it and emit an error line instead.
 */
export class FormatError extends Error {
    constructor(readonly template: string, readonly reason: string) {
        super(`${reason} in "${template}"`);
        this.name = 'FormatError';
    }
}

/* ---------------------------------- ANSI ----------------------------------- */

export const CSI = '\x1b[';
export const SGR_RESET = `${CSI}0m`;

const SGR_PATTERN = /\x1b\[[0-9;]*m/g;

/** Wrap `s` in a color start and a full reset. */
export function colorize(color: AnsiColor, s: string): string {
    return `${CSI}${color}m${s}${SGR_RESET}`;
}

/** Remove every SGR sequence from `s`. */
export function stripAnsi(s: string): string {
    return s.indexOf('\x1b') === -1 ? s : s.replace(SGR_PATTERN, '');
}

/**
 * Decide whether a stream gets colors.
 * - 'on' / 'off' are final.
 * - 'auto': `NO_COLOR` disables, `FORCE_COLOR` (other than '0') enables,
 *   otherwise a TTY outside of production.
 */
export function shouldUseColor(mode: ColorMode, isTTY: boolean, env: Env = {}): boolean {
    if (mode === 'on') return true;
    if (mode === 'off') return false;
    if (env.NO_COLOR) return false;
    const force = env.FORCE_COLOR?.trim();
    if (force !== undefined && force !== '') return force !== '0';
    return isTTY && env.NODE_ENV?.trim().toLowerCase() !== 'production';
}

/* ------------------------------- Formatter --------------------------------- */

// Reused between calls; a reentrant call (an argument's toJSON that logs) takes its own.
const scratch: string[] = [];
let scratchBusy = false;

const FIXED_SPEC = /^:\.(\d{1,2})f$/;

/**
 * Substitute `args` into `template`.
 * - `{}` takes the next argument, `{:.Nf}` renders it with N fixed digits.
 * - `{{` and `}}` are literal braces.
 * - No arguments: the template is returned verbatim.
 * Throws `FormatError` on a malformed template or when the argument count differs.
 */
export function formatMessage(template: string, args: readonly unknown[]): string {
    if (args.length === 0) return template;

    const owned = !scratchBusy;
    const out = owned ? scratch : [];
    if (owned) scratchBusy = true;
    try {
        let next = 0;
        let literalStart = 0;
        for (let i = 0; i < template.length; i++) {
            const ch = template[i];
            if (ch === '{') {
                if (template[i + 1] === '{') {
                    out.push(template.slice(literalStart, i + 1));
                    literalStart = ++i + 1;
                    continue;
                }
                const close = template.indexOf('}', i);
                if (close === -1) throw new FormatError(template, 'unclosed "{"');
                if (next >= args.length) throw new FormatError(template, `missing argument ${next}`);
                out.push(template.slice(literalStart, i), renderSpec(template, template.slice(i + 1, close), args[next++]));
                i = close;
                literalStart = close + 1;
            } else if (ch === '}') {
                if (template[i + 1] !== '}') throw new FormatError(template, 'unmatched "}"');
                out.push(template.slice(literalStart, i + 1));
                literalStart = ++i + 1;
            }
        }
        if (next < args.length) throw new FormatError(template, `${args.length - next} unused argument(s)`);
        out.push(template.slice(literalStart));
        return out.join('');
    } finally {
        out.length = 0;
        if (owned) scratchBusy = false;
    }
}

function renderSpec(template: string, spec: string, value: unknown): string {
    if (spec === '') return renderArg(value);
    const fixed = FIXED_SPEC.exec(spec);
    if (!fixed) throw new FormatError(template, `unknown format spec "{${spec}}"`);
    const n = typeof value === 'bigint' ? Number(value) : value;
    if (typeof n !== 'number') throw new FormatError(template, `"{${spec}}" expects a number`);
    return n.toFixed(Number(fixed[1]));
}

/* ----------------------------- Format helpers ------------------------------ */

/** Render one argument as display text. */
export function renderArg(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'function') return `[Function ${value.name || 'anonymous'}]`;
    if (value === null) return 'null';
    if (typeof value !== 'object') return String(value);
    if (value instanceof Error) return `${value.name || 'Error'}: ${value.message}`;
    return safeJson(value);
}

function safeJson(data: unknown): string {
    const seen = new WeakSet<object>();
    try {
        return JSON.stringify(data, (_k, v: unknown) => {
            if (typeof v === 'bigint') return v.toString();
            if (v && typeof v === 'object') {
                if (seen.has(v)) return '[Circular]';
                seen.add(v);
            }
            return v;
        });
    } catch {
        try { return String(data); } catch { return '[Unserializable]'; }
    }
}
