/**
 * Logger utility for chunkwise
 *
 * Console output functions that can be silenced when the CLI prints
 * machine-readable output (json), where stdout must carry only the result.
 */

const PREFIX = '[chunkwise]';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log(), warn() and debug() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Enable debug output. Debug lines go to stderr so they never mix with the summary.
 */
export function setVerboseMode(verbose: boolean): void {
    verboseMode = verbose;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(PREFIX, ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(PREFIX, ...args);
}

/**
 * Diagnostic output, only in verbose mode and never in silent mode.
 */
export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.error(PREFIX, ...args);
    }
}
