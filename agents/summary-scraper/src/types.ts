/**
 * Core data model of the scraper.
 */

/** Logical content sections, in the left-to-right order of the extension's tabs. */
export const SECTION_KINDS = [
    'key_insights',
    'timestamped_summary',
    'top_comments',
    'transcript',
] as const;

export type SectionKind = typeof SECTION_KINDS[number];

export type SectionMap = Record<SectionKind, string>;

export interface TranscriptEntry {
    timestamp: string;
    text: string;
}

export type ExtractionStatus = 'Success' | 'Error';

export interface ExtractionResult {
    videoUrl: string;
    status: ExtractionStatus;
    sections: SectionMap;
    structuredTranscript: TranscriptEntry[];
    /** Only on Error */
    message?: string;
    nextSteps?: string;
}

/** On-disk shape: url -> the four section strings. */
export type StoredResults = Record<string, SectionMap>;

export interface NavigationOutcome {
    ready: boolean;
    url: string;
    attempts: number;
}

export type EnginePhase =
    | 'Idle'
    | 'ContentPreflighted'
    | 'TabsDiscovered'
    | 'PerTabGenerate'
    | 'PerTabExtract'
    | 'Merged'
    | 'Done';

export type TabOutcomeStatus = 'extracted' | 'empty' | 'skipped';

export interface TabOutcome {
    kind: SectionKind;
    index: number;
    status: TabOutcomeStatus;
    /** Selector that produced the text, `body` for the last-resort fallback */
    source?: string;
    chars: number;
}

export interface EngineReport {
    sections: SectionMap;
    preflighted: boolean;
    triggerClicked: boolean;
    tabCount: number;
    tabs: TabOutcome[];
    missingTabs: SectionKind[];
    phases: EnginePhase[];
    /** The iframe went away and could not be re-entered; later passes were skipped */
    surfaceLost: boolean;
}

export function emptySections(): SectionMap {
    return {
        key_insights: '',
        timestamped_summary: '',
        top_comments: '',
        transcript: '',
    };
}
