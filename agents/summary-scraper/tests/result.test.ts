import { describe, it, expect } from 'vitest';
import {
    buildResult,
    countFilled,
    DEFAULT_NEXT_STEPS,
    deriveStatus,
    errorResult,
    mergeSections,
    missingSections,
} from '../src/extraction/result';
import { emptySections } from '../src/types';

describe('result', () => {
    it('never overwrites a section that already has text', () => {
        const first = { ...emptySections(), key_insights: 'from preflight' };

        const merged = mergeSections(first, { key_insights: 'from segmenter', transcript: 'late transcript' });

        expect(merged).toEqual({
            key_insights: 'from preflight',
            timestamped_summary: '',
            top_comments: '',
            transcript: 'late transcript',
        });
        expect(first.transcript).toBe('');
    });

    it('ignores empty strings in the source', () => {
        expect(mergeSections(emptySections(), { top_comments: '' })).toEqual(emptySections());
    });

    it('lists missing sections in tab order', () => {
        const sections = { ...emptySections(), timestamped_summary: 'x' };

        expect(missingSections(sections)).toEqual(['key_insights', 'top_comments', 'transcript']);
        expect(countFilled(sections)).toBe(1);
    });

    it('is a success with at least one populated section', () => {
        expect(deriveStatus({ ...emptySections(), top_comments: 'nice' })).toBe('Success');
        expect(deriveStatus(emptySections())).toBe('Error');
    });

    it('derives the structured transcript from the transcript section', () => {
        const result = buildResult('https://example.com/watch?v=abc&t=0', {
            ...emptySections(),
            transcript: '0:01\nHello',
        });

        expect(result.status).toBe('Success');
        expect(result.structuredTranscript).toEqual([{ timestamp: '0:01', text: 'Hello' }]);
        expect(result.message).toBeUndefined();
        expect(result.nextSteps).toBeUndefined();
    });

    it('adds diagnostics when nothing was extracted', () => {
        const result = buildResult('https://example.com/watch?v=abc', emptySections());

        expect(result.status).toBe('Error');
        expect(result.message).toBe('Could not locate summary data');
        expect(result.nextSteps).toBe(DEFAULT_NEXT_STEPS);
        expect(result.structuredTranscript).toEqual([]);
    });

    it('builds error results with empty sections', () => {
        expect(errorResult('u', 'boom', 'retry later')).toEqual({
            videoUrl: 'u',
            status: 'Error',
            sections: emptySections(),
            structuredTranscript: [],
            message: 'boom',
            nextSteps: 'retry later',
        });
    });
});
