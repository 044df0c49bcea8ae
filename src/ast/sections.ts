// src/ast/sections.ts

import type {CronJob, Executable, ItemKind, ManagedItem, Symlink} from '../schema';
import {
    EmptyIdentitySectionError,
    InvalidIdentityError,
    InvalidModeError,
    InvalidModifierCombinationError,
    MalformedCronjobError,
    MalformedSymlinkError,
    MalformedSysctlError,
} from '../util/errors';
import {entryLines, type BrineSection} from './lexer';
import {parseCronLine, parseItemLine, parseKeyValueLine, parseSymlinkLine} from './modifiers';

export const IDENTITY_RE = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/;
const MODE_RE = /^[0-7]{3,4}$/;

/**
 * `%rolename` / `%elementname`: exactly one dotted name.
 */
export function interpretIdentity(section: BrineSection): string {
    const lines = entryLines(section);
    if (lines.length === 0) {
        throw new EmptyIdentitySectionError(section.keyword, section.line);
    }
    if (lines.length > 1) {
        throw new InvalidIdentityError(
            `Section declares more than one name ("${lines[0].content}", "${lines[1].content}").`,
            section.keyword,
            lines[1].lineNo,
        );
    }

    const [line] = lines;
    if (!IDENTITY_RE.test(line.content)) {
        throw new InvalidIdentityError(`"${line.content}" is not a dotted name.`, section.keyword, line.lineNo);
    }
    return line.content;
}

/**
 * `%description`: entry lines joined with newlines. May be empty; the
 * builder decides whether that is an error.
 */
export function interpretDescription(section: BrineSection): string {
    return entryLines(section)
        .map((line) => line.content)
        .join('\n');
}

/**
 * `%readme`: raw lines, blank lines and markdown headings included.
 * Only surrounding blank lines are dropped.
 */
export function interpretReadme(section: BrineSection): string {
    const raw = section.lines.map((line) => line.raw.replace(/[ \t]+$/, ''));
    let start = 0;
    let end = raw.length;
    while (start < end && !raw[start]) start++;
    while (end > start && !raw[end - 1]) end--;
    return raw.slice(start, end).join('\n');
}

/**
 * `%includes`, and any other one-value-per-line section.
 */
export function interpretList(section: BrineSection): string[] {
    return entryLines(section).map((line) => line.content);
}

export function interpretExecutables(section: BrineSection): Executable[] {
    return entryLines(section).map((line) => ({value: line.content, line: line.lineNo}));
}

/**
 * `%packages`, `%files`, `%directories`, `%services`.
 */
export function interpretItems(section: BrineSection, kind: ItemKind): ManagedItem[] {
    const items: ManagedItem[] = [];

    for (const line of entryLines(section)) {
        const parsed = parseItemLine(line.content);

        if (parsed.type === 'conflict') {
            throw new InvalidModifierCombinationError(
                `"${line.content}" marks ${parsed.target} absent and also gives it a value.`,
                section.keyword,
                line.lineNo,
            );
        }
        if (!parsed.target) {
            throw new InvalidModifierCombinationError(
                `"${line.content}" has no ${kind} name.`,
                section.keyword,
                line.lineNo,
            );
        }

        if (parsed.type === 'absent') {
            items.push({kind, target: parsed.target, presence: 'absent', line: line.lineNo});
            continue;
        }

        if (parsed.attribute !== undefined) {
            if (kind === 'service') {
                throw new InvalidModifierCombinationError(
                    `Services do not take a value ("${line.content}").`,
                    section.keyword,
                    line.lineNo,
                );
            }
            if ((kind === 'file' || kind === 'directory') && !MODE_RE.test(parsed.attribute)) {
                throw new InvalidModeError(parsed.attribute, section.keyword, line.lineNo);
            }
        }

        items.push({
            kind,
            target: parsed.target,
            presence: 'present',
            ...(parsed.attribute !== undefined ? {attribute: parsed.attribute} : {}),
            line: line.lineNo,
        });
    }

    return items;
}

export function interpretSymlinks(section: BrineSection): Symlink[] {
    return entryLines(section).map((line) => {
        const parsed = parseSymlinkLine(line.content);
        if (!parsed) {
            throw new MalformedSymlinkError(line.content, line.lineNo);
        }
        return {...parsed, line: line.lineNo};
    });
}

/**
 * `%sysctl`: `key=value` pairs in insertion order. A repeated key keeps its
 * first position and takes the last value.
 */
export function interpretSysctl(section: BrineSection, into: Map<string, string> = new Map()): Map<string, string> {
    for (const line of entryLines(section)) {
        const pair = parseKeyValueLine(line.content);
        if (!pair) {
            throw new MalformedSysctlError(line.content, line.lineNo);
        }
        if (pair.key.startsWith('-')) {
            throw new MalformedSysctlError(line.content, line.lineNo, true);
        }
        into.set(pair.key, pair.value);
    }
    return into;
}

export function interpretCronjobs(section: BrineSection): CronJob[] {
    return entryLines(section).map((line): CronJob => {
        const parsed = parseCronLine(line.content);
        if (!parsed) {
            throw new MalformedCronjobError(line.content, line.lineNo);
        }
        return {...parsed, raw: line.content, line: line.lineNo};
    });
}
