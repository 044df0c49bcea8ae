// test/lexer.spec.ts

import {describe, it, expect} from 'vitest';
import {classifyLine, entryLines, lexBrinefile} from '../src/ast';
import {UnknownSectionError} from '../src/util/errors';

describe('lexBrinefile', () => {
    it('splits text into sections in source order', () => {
        const text = ['%rolename', 'web.front', '', '%description', 'Front web tier'].join('\n');

        const {sections, preamble} = lexBrinefile(text);

        expect(preamble).toEqual([]);
        expect(sections.map((s) => [s.keyword, s.line])).toEqual([
            ['rolename', 1],
            ['description', 4],
        ]);
        expect(entryLines(sections[0]).map((l) => l.content)).toEqual(['web.front']);
    });

    it('treats markers case-insensitively', () => {
        const {sections} = lexBrinefile('%Packages\nnginx\n%  SERVICES\nnginx');
        expect(sections.map((s) => s.keyword)).toEqual(['packages', 'services']);
    });

    it('keeps lines before the first marker as preamble', () => {
        const {preamble, sections} = lexBrinefile('# owned by ops\n\n%rolename\nx');
        expect(preamble.map((l) => l.kind)).toEqual(['comment', 'blank']);
        expect(sections).toHaveLength(1);
    });

    it('keeps comments and blanks inside a section but not as entries', () => {
        const {sections} = lexBrinefile('%packages\n# web\nnginx\n\n  curl  ');
        const [packages] = sections;

        expect(packages.lines.map((l) => l.kind)).toEqual(['comment', 'entry', 'blank', 'entry']);
        expect(entryLines(packages).map((l) => [l.content, l.lineNo])).toEqual([
            ['nginx', 3],
            ['curl', 5],
        ]);
    });

    it('keeps indented "%" lines inside a section', () => {
        const {sections} = lexBrinefile(['%readme', '    printf("%d\\n", n);', '%rolename', 'x'].join('\n'));

        expect(sections.map((s) => s.keyword)).toEqual(['readme', 'rolename']);
        expect(sections[0].lines.map((l) => l.raw)).toEqual(['    printf("%d\\n", n);']);
    });

    it('accepts CRLF line endings', () => {
        const {sections} = lexBrinefile('%rolename\r\nweb.front\r\n');
        expect(entryLines(sections[0]).map((l) => l.raw)).toEqual(['web.front']);
    });

    it('throws UnknownSectionError with the keyword and line', () => {
        const text = ['%rolename', 'x', '%pakages', 'nginx'].join('\n');

        let caught: unknown;
        try {
            lexBrinefile(text);
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(UnknownSectionError);
        if (caught instanceof UnknownSectionError) {
            expect(caught.keyword).toBe('pakages');
            expect(caught.line).toBe(3);
            expect(caught.code).toBe('UNKNOWN_SECTION');
        }
    });
});

describe('classifyLine', () => {
    it('classifies by the first non-blank character', () => {
        expect(classifyLine('   ')).toBe('blank');
        expect(classifyLine('  # note')).toBe('comment');
        expect(classifyLine('%files')).toBe('marker');
        expect(classifyLine('/etc/motd')).toBe('entry');
    });

    it('only reads "%" in the first column as a marker', () => {
        expect(classifyLine('    %d placeholder')).toBe('entry');
    });
});
