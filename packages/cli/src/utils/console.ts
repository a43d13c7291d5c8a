/**
 * Console output for the billsort CLI. Every line a command prints goes
 * through here; the learning engine never writes to the console.
 *
 * Status lines go to stdout, except warnings and errors (stderr) and info
 * (console.info).
 */

type Stream = 'log' | 'info' | 'warn' | 'error';

const MARKER = {
    success: '✓ ',
    arrow: '→ ',
    info: 'ℹ ',
    warn: '⚠️  ',
    error: '✖ Error: ',
} as const;

function emit(stream: Stream, line: string): void {
    console[stream](line);
}

export function log(message: string): void {
    emit('log', message);
}

export function success(message: string): void {
    emit('log', MARKER.success + message);
}

export function arrow(message: string): void {
    emit('log', MARKER.arrow + message);
}

export function info(message: string): void {
    emit('info', MARKER.info + message);
}

export function warn(message: string): void {
    emit('warn', MARKER.warn + message);
}

export function error(message: string): void {
    emit('error', MARKER.error + message);
}
