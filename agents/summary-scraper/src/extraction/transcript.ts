import type { TranscriptEntry } from '../types';

const MAX_TIMESTAMP_LENGTH = 8;

/** `0:05`, `12:30`, `1:02:03` */
export function isTimestampLine(line: string): boolean {
    return line.includes(':')
        && line.length <= MAX_TIMESTAMP_LENGTH
        && /^[\d:]+$/.test(line);
}

/**
 * Turn transcript text of alternating timestamp / text lines into entries.
 * Lines that do not fit the pattern become entries without a timestamp.
 */
export function structureTranscript(raw: string): TranscriptEntry[] {
    const lines = raw.split('\n');
    const entries: TranscriptEntry[] = [];

    let i = 0;
    while (i < lines.length) {
        const current = lines[i].trim();

        if (isTimestampLine(current) && i + 1 < lines.length) {
            entries.push({ timestamp: current, text: lines[i + 1].trim() });
            i += 2;
            continue;
        }

        if (current && current.toLowerCase() !== 'transcript') {
            entries.push({ timestamp: '', text: current });
        }
        i += 1;
    }

    return entries;
}
