/**
 * Console output for docslice.
 *
 * JSON output must be the only thing on stdout, so log() and warn() can be
 * silenced. debug() only prints when verbose mode is on.
 */

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

export function isSilentMode(): boolean {
    return silentMode;
}

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
        console.warn(...args);
    }
}

/**
 * Verbose diagnostics to stderr, prefixed with the tool name.
 */
export function debug(message: string): void {
    if (verboseMode && !silentMode) {
        console.error(`[docslice] ${message}`);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}
