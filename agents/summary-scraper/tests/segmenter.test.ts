import { describe, it, expect } from 'vitest';
import { segmentSections } from '../src/extraction/segmenter';
import { defaultSelectors } from '../src/selectors';

const headers = defaultSelectors.sectionHeaders;

describe('segmentSections', () => {
    it('cuts each section at the next known header', () => {
        const text = 'Key Insights\nA B C\nTranscript\nX Y Z';

        expect(segmentSections(text, ['key_insights', 'transcript'], headers, 10)).toEqual({
            key_insights: 'Key Insights\nA B C',
            transcript: 'Transcript\nX Y Z',
        });
    });

    it('only fills the sections it is asked for', () => {
        const text = 'Key Insights\nA B C\nTranscript\nX Y Z';

        expect(segmentSections(text, ['transcript'], headers, 10)).toEqual({
            transcript: 'Transcript\nX Y Z',
        });
    });

    it('rejects slices at or below the length threshold', () => {
        const text = 'Key Insights\nA B C\nTranscript\nX Y Z';

        // "Key Insights\nA B C" is 18 characters
        expect(segmentSections(text, ['key_insights'], headers, 18)).toEqual({});
        expect(segmentSections(text, ['key_insights'], headers, 17)).toEqual({
            key_insights: 'Key Insights\nA B C',
        });
    });

    it('falls through to the next alias when the first slice is too short', () => {
        const text = 'Key Insights\nok\nMain Points\nthe longer of the two blocks';

        expect(segmentSections(text, ['key_insights'], headers, 20)).toEqual({
            key_insights: 'Main Points\nthe longer of the two blocks',
        });
    });

    it('returns nothing when no header is present', () => {
        expect(segmentSections('just some text without headers', ['top_comments'], headers, 5)).toEqual({});
    });
});
