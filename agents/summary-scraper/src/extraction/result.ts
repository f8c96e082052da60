import { emptySections, ExtractionResult, ExtractionStatus, SECTION_KINDS, SectionKind, SectionMap } from '../types';
import { structureTranscript } from './transcript';

export const DEFAULT_NEXT_STEPS = [
    '1. Open the video in your normal browser and verify the summary extension is working',
    '2. Check the saved HTML and screenshots in the debug directory',
].join('\n');

/**
 * First value wins: a section that already has text is never overwritten.
 */
export function mergeSections(target: SectionMap, source: Partial<Record<SectionKind, string>>): SectionMap {
    const merged = { ...target };
    for (const kind of SECTION_KINDS) {
        const value = source[kind];
        if (value && !merged[kind]) {
            merged[kind] = value;
        }
    }
    return merged;
}

export function missingSections(sections: SectionMap): SectionKind[] {
    return SECTION_KINDS.filter(kind => !sections[kind]);
}

export function countFilled(sections: SectionMap): number {
    return SECTION_KINDS.length - missingSections(sections).length;
}

export function deriveStatus(sections: SectionMap): ExtractionStatus {
    return countFilled(sections) > 0 ? 'Success' : 'Error';
}

export function buildResult(videoUrl: string, sections: SectionMap, message?: string): ExtractionResult {
    const status = deriveStatus(sections);
    const result: ExtractionResult = {
        videoUrl,
        status,
        sections: { ...sections },
        structuredTranscript: sections.transcript ? structureTranscript(sections.transcript) : [],
    };
    if (status === 'Error') {
        result.message = message || 'Could not locate summary data';
        result.nextSteps = DEFAULT_NEXT_STEPS;
    }
    return result;
}

export function errorResult(videoUrl: string, message: string, nextSteps: string = DEFAULT_NEXT_STEPS): ExtractionResult {
    return {
        videoUrl,
        status: 'Error',
        sections: emptySections(),
        structuredTranscript: [],
        message,
        nextSteps,
    };
}
