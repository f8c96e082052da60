import type { SectionHeaders } from '../selectors';
import { SECTION_KINDS, SectionKind } from '../types';

/**
 * Last-resort recovery for sections the tab walk left empty: find a header
 * alias in the full page text and cut until the next known header.
 *
 * A header word in the middle of a sentence will produce a wrong cut; the
 * length threshold is the only filter.
 */
export function segmentSections(
    fullText: string,
    missing: readonly SectionKind[],
    headers: SectionHeaders,
    minContentLength: number
): Partial<Record<SectionKind, string>> {
    const found: Partial<Record<SectionKind, string>> = {};
    const allHeaders = SECTION_KINDS.flatMap(kind => headers[kind]);

    for (const kind of missing) {
        for (const header of headers[kind]) {
            const start = fullText.indexOf(header);
            if (start === -1) continue;

            let end = fullText.length;
            for (const next of allHeaders) {
                const nextStart = fullText.indexOf(next, start + header.length);
                if (nextStart !== -1 && nextStart < end) {
                    end = nextStart;
                }
            }

            const section = fullText.slice(start, end).trim();
            if (section.length > minContentLength) {
                found[kind] = section;
                break;
            }
        }
    }

    return found;
}
