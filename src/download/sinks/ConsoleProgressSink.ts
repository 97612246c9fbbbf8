/**
 * ConsoleProgressSink - One human-readable line per event for the CLI
 */

import { JobState, ProgressEvent, ProgressSink } from '../core/types';

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

export function formatBytes(bytes: number): string {
    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < UNITS.length - 1) {
        value /= 1024;
        unit++;
    }
    return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

const STATE_ICONS: Record<JobState, string> = {
    [JobState.QUEUED]: '📥',
    [JobState.RESOLVING]: '🔍',
    [JobState.DOWNLOADING]: '⬇️',
    [JobState.PAUSED]: '⏸️',
    [JobState.COMPLETED]: '✅',
    [JobState.FAILED]: '❌',
    [JobState.CANCELLED]: '🛑',
};

export function formatEvent(event: ProgressEvent): string {
    const id = event.jobId.slice(0, 8);

    if (event.type === 'progress') {
        const total = event.bytesTotal !== null ? ` / ${formatBytes(event.bytesTotal)}` : '';
        const percent = event.bytesTotal
            ? ` (${Math.floor((event.bytesReceived / event.bytesTotal) * 100)}%)`
            : '';
        return `[${id}] ${formatBytes(event.bytesReceived)}${total}${percent} at ${formatBytes(event.rate)}/s`;
    }

    const reason = event.error ? `: ${event.error.reason} (${event.error.message})` : '';
    return `${STATE_ICONS[event.state]} [${id}] ${event.state}${reason}`;
}

export class ConsoleProgressSink implements ProgressSink {
    constructor(private readonly write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)) {}

    publish(event: ProgressEvent): void {
        this.write(formatEvent(event));
    }
}
