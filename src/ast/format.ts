// src/ast/format.ts

import {lexBrinefile, type BrineLine, type BrineSection, type LexResult, type SectionKeyword} from './lexer';
import {
    formatItemLine,
    formatSymlinkLine,
    parseItemLine,
    parseKeyValueLine,
    parseSymlinkLine,
} from './modifiers';

export interface FormatOptions {
    /**
     * Reuse the dominant newline style of the input (LF vs. CRLF).
     * Defaults to true; otherwise always "\n".
     */
    preserveNewlines?: boolean;
}

export interface FormatResult {
    /** Formatted text. */
    text: string;
    /** Whether the text differs from the input. */
    changed: boolean;
    /** Lexer output the formatter worked from. */
    lex: LexResult;
}

const ITEM_SECTIONS: ReadonlySet<SectionKeyword> = new Set(['packages', 'files', 'directories', 'services']);

/**
 * Canonical re-printing of a Brinefile.
 *
 * - Markers are lower-cased and separated by exactly one blank line.
 * - Entry lines lose their indentation; modifiers are tightened
 *   ("- telnet" → "-telnet", "openssh = 1.0" → "openssh=1.0", "a -> b" → "a->b").
 * - Comments stay where they are; runs of blank lines collapse to one.
 * - `%readme` bodies are kept verbatim apart from trailing whitespace.
 *
 * Lines the interpreters would reject are re-printed trimmed, not fixed;
 * formatting never validates. Unknown markers still throw from the lexer.
 */
export function formatBrinefile(text: string, options: FormatOptions = {}): FormatResult {
    const lex = lexBrinefile(text);
    const out: string[] = [];

    out.push(...trimBlankEdges(lex.preamble.map((line) => (line.kind === 'blank' ? '' : keepOffMarkerColumn(line)))));

    for (const section of lex.sections) {
        if (out.length) out.push('');
        out.push(`%${section.keyword}`);
        out.push(...formatSectionBody(section));
    }

    const eol = options.preserveNewlines === false ? '\n' : detectPreferredEol(text);
    const formatted = out.length ? out.join(eol) + eol : '';

    return {text: formatted, changed: formatted !== text, lex};
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function formatSectionBody(section: BrineSection): string[] {
    if (section.keyword === 'readme') {
        return trimBlankEdges(section.lines.map((line) => line.raw.replace(/[ \t]+$/, '')));
    }

    const body: string[] = [];
    for (const line of section.lines) {
        if (line.kind === 'blank') {
            if (body.length && body[body.length - 1] !== '') body.push('');
            continue;
        }
        body.push(line.kind === 'entry' ? formatEntry(section.keyword, line) : line.content);
    }
    return trimBlankEdges(body);
}

function formatEntry(keyword: SectionKeyword, line: BrineLine): string {
    if (line.content.startsWith('%')) {
        return keepOffMarkerColumn(line);
    }
    if (ITEM_SECTIONS.has(keyword)) {
        return formatItemLine(parseItemLine(line.content));
    }
    if (keyword === 'symlinks') {
        const link = parseSymlinkLine(line.content);
        return link ? formatSymlinkLine(link) : line.content;
    }
    if (keyword === 'sysctl') {
        const pair = parseKeyValueLine(line.content);
        return pair ? `${pair.key}=${pair.value}` : line.content;
    }
    return line.content;
}

/**
 * Entry text, trimmed unless trimming would move a "%" into the first
 * column and turn the line into a marker.
 */
function keepOffMarkerColumn(line: BrineLine): string {
    return line.content.startsWith('%') ? line.raw.replace(/[ \t]+$/, '') : line.content;
}

function trimBlankEdges(lines: string[]): string[] {
    let start = 0;
    let end = lines.length;
    while (start < end && !lines[start]) start++;
    while (end > start && !lines[end - 1]) end--;
    return lines.slice(start, end);
}

/**
 * Detect whether the file is more likely LF or CRLF and reuse that.
 * If mixed or no clear signal, default to "\n".
 */
function detectPreferredEol(text: string): string {
    const crlfCount = (text.match(/\r\n/g) || []).length;
    const lfCount = (text.match(/(?<!\r)\n/g) || []).length;
    return crlfCount > lfCount ? '\r\n' : '\n';
}
