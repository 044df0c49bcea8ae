// src/ast/lexer.ts

import {UnknownSectionError} from '../util/errors';

export const SECTION_KEYWORDS = [
    'rolename',
    'elementname',
    'description',
    'readme',
    'includes',
    'sysctl',
    'packages',
    'files',
    'directories',
    'symlinks',
    'services',
    'commands',
    'scripts',
    'cronjobs',
] as const;

export type SectionKeyword = (typeof SECTION_KEYWORDS)[number];

/**
 * How a physical line in the Brinefile was classified.
 */
export type LineKind = 'blank' | 'comment' | 'marker' | 'entry';

export interface BrineLine {
    index: number; // 0-based
    lineNo: number; // 1-based
    raw: string;
    kind: LineKind;
    content: string; // trimmed
}

export interface BrineSection {
    keyword: SectionKeyword;
    /** 1-based line of the `%keyword` marker. */
    line: number;
    /** Every line after the marker up to the next marker, blanks and comments included. */
    lines: BrineLine[];
}

export interface LexResult {
    /** Lines before the first marker; tolerated and ignored. */
    preamble: BrineLine[];
    sections: BrineSection[];
    /** All lines as seen in the source text. */
    lines: BrineLine[];
}

export function isSectionKeyword(value: string): value is SectionKeyword {
    const keywords: readonly string[] = SECTION_KEYWORDS;
    return keywords.includes(value);
}

/**
 * A marker needs "%" in the first column; an indented "%" line (a printf
 * format in a `%readme` code sample, say) is ordinary content.
 */
export function classifyLine(raw: string): LineKind {
    const trimmed = raw.trim();
    if (!trimmed) return 'blank';
    if (raw.startsWith('%')) return 'marker';
    if (trimmed.startsWith('#')) return 'comment';
    return 'entry';
}

/**
 * Keyword of a marker line: text after "%", trimmed and lower-cased.
 */
export function markerKeyword(line: BrineLine): string {
    return line.content.slice(1).trim().toLowerCase();
}

/**
 * Split Brinefile text into its `%section` blocks.
 *
 * - Markers are case-insensitive (`%Packages` == `%packages`).
 * - Throws UnknownSectionError on the first unrecognized marker.
 * - Content before the first marker goes to `preamble`.
 */
export function lexBrinefile(text: string): LexResult {
    const lines: BrineLine[] = text.split(/\r?\n/).map((raw, i) => ({
        index: i,
        lineNo: i + 1,
        raw,
        kind: classifyLine(raw),
        content: raw.trim(),
    }));

    const preamble: BrineLine[] = [];
    const sections: BrineSection[] = [];
    let current: BrineSection | null = null;

    for (const line of lines) {
        if (line.kind === 'marker') {
            const keyword = markerKeyword(line);
            if (!isSectionKeyword(keyword)) {
                throw new UnknownSectionError(keyword, line.lineNo);
            }
            current = {keyword, line: line.lineNo, lines: []};
            sections.push(current);
        } else if (current) {
            current.lines.push(line);
        } else {
            preamble.push(line);
        }
    }

    return {preamble, sections, lines};
}

/**
 * Entry lines of a section (blank and comment lines skipped).
 */
export function entryLines(section: BrineSection): BrineLine[] {
    return section.lines.filter((line) => line.kind === 'entry');
}
