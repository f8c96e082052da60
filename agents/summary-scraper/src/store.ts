import * as fs from 'fs';
import * as path from 'path';
import { getLogger, toErrorMessage } from '@digest/shared';
import { emptySections, SECTION_KINDS, SectionMap, StoredResults } from './types';

export const INPUT_PLACEHOLDER = '# Enter one YouTube URL per line\n';

/**
 * Write the commented placeholder input file. Returns false if it could not be written.
 */
export function createInputFile(file: string): boolean {
    try {
        const dir = path.dirname(file);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        fs.writeFileSync(file, INPUT_PLACEHOLDER, 'utf-8');
        getLogger().info(`Created empty input file: ${file}`);
        return true;
    } catch (e) {
        getLogger().error('Error creating input file', { file, error: toErrorMessage(e) });
        return false;
    }
}

/**
 * One URL per line; blank lines and `#` comments are ignored.
 * A missing file is created with a placeholder header and yields no URLs.
 */
export function loadUrls(file: string): string[] {
    if (!fs.existsSync(file)) {
        createInputFile(file);
        return [];
    }
    const urls = fs.readFileSync(file, 'utf-8')
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0 && !line.startsWith('#'));
    getLogger().info(`Found ${urls.length} URLs to process in ${file}`);
    return urls;
}

function toSectionMap(value: unknown): SectionMap {
    const sections = emptySections();
    if (typeof value !== 'object' || value === null) return sections;
    for (const kind of SECTION_KINDS) {
        const text: unknown = Reflect.get(value, kind);
        if (typeof text === 'string') sections[kind] = text;
    }
    return sections;
}

/**
 * URL -> sections map backed by a JSON file. Saved in full after every change
 * the caller persists, so a crash loses at most the video in flight.
 */
export class ResultStore {
    private constructor(readonly file: string, private readonly data: StoredResults) { }

    static load(file: string): ResultStore {
        const logger = getLogger();
        const data: StoredResults = {};
        if (fs.existsSync(file)) {
            try {
                const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
                if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
                    for (const [url, entry] of Object.entries(parsed)) {
                        data[url] = toSectionMap(entry);
                    }
                } else {
                    logger.warn('Results file does not contain an object, starting empty', { file });
                }
                logger.info(`Loaded existing results from ${file} with ${Object.keys(data).length} entries`);
            } catch (e) {
                logger.error('Error loading existing results', { file, error: toErrorMessage(e) });
            }
        }
        return new ResultStore(file, data);
    }

    has(url: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data, url);
    }

    get(url: string): SectionMap | undefined {
        return this.has(url) ? { ...this.data[url] } : undefined;
    }

    set(url: string, sections: SectionMap): void {
        this.data[url] = toSectionMap(sections);
    }

    get size(): number {
        return Object.keys(this.data).length;
    }

    entries(): Array<[string, SectionMap]> {
        return Object.entries(this.data).map(([url, sections]) => [url, { ...sections }]);
    }

    toJSON(): StoredResults {
        return Object.fromEntries(this.entries());
    }

    save(): boolean {
        try {
            const dir = path.dirname(this.file);
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
            fs.writeFileSync(this.file, JSON.stringify(this.data, null, 2), 'utf-8');
            getLogger().debug(`Updated results saved to ${this.file}`);
            return true;
        } catch (e) {
            getLogger().error('Error saving results', { file: this.file, error: toErrorMessage(e) });
            return false;
        }
    }
}
