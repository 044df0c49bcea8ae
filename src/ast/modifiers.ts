// src/ast/modifiers.ts

import type {Presence} from '../schema';

/**
 * Result of reading one `%packages` / `%files` / `%directories` / `%services`
 * line. `conflict` is the `-name=value` form, which interpreters reject; it is
 * kept as a variant so the formatter can still re-print such lines.
 */
export type ItemLine =
    | { type: 'present'; target: string; attribute?: string }
    | { type: 'absent'; target: string }
    | { type: 'conflict'; target: string; attribute: string };

function splitOnce(text: string, separator: string): [string, string] | null {
    const at = text.indexOf(separator);
    if (at === -1) return null;
    return [text.slice(0, at).trim(), text.slice(at + separator.length).trim()];
}

/**
 * `name`        → present
 * `name=value`  → present with attribute (an empty value counts as none)
 * `-name`       → absent
 * `-name=value` → conflict
 */
export function parseItemLine(text: string): ItemLine {
    const trimmed = text.trim();

    if (trimmed.startsWith('-')) {
        const rest = trimmed.slice(1).trim();
        const pair = splitOnce(rest, '=');
        if (pair) {
            return {type: 'conflict', target: pair[0], attribute: pair[1]};
        }
        return {type: 'absent', target: rest};
    }

    const pair = splitOnce(trimmed, '=');
    if (pair) {
        const [target, attribute] = pair;
        return attribute ? {type: 'present', target, attribute} : {type: 'present', target};
    }

    return {type: 'present', target: trimmed};
}

export function formatItemLine(item: ItemLine): string {
    switch (item.type) {
        case 'present':
            return item.attribute ? `${item.target}=${item.attribute}` : item.target;
        case 'absent':
            return `-${item.target}`;
        case 'conflict':
            return `-${item.target}=${item.attribute}`;
    }
}

export interface SymlinkLine {
    presence: Presence;
    linkPath: string;
    targetPath: string;
}

/**
 * `link->target`, optionally prefixed with "-" for removal.
 * Returns null unless there is exactly one "->" with text on both sides.
 */
export function parseSymlinkLine(text: string): SymlinkLine | null {
    let rest = text.trim();
    let presence: Presence = 'present';
    if (rest.startsWith('-') && !rest.startsWith('->')) {
        presence = 'absent';
        rest = rest.slice(1);
    }

    const parts = rest.split('->');
    if (parts.length !== 2) return null;

    const linkPath = parts[0].trim();
    const targetPath = parts[1].trim();
    if (!linkPath || !targetPath) return null;

    return {presence, linkPath, targetPath};
}

export function formatSymlinkLine(link: SymlinkLine): string {
    return `${link.presence === 'absent' ? '-' : ''}${link.linkPath}->${link.targetPath}`;
}

/**
 * `key=value`; null when there is no "=" or no key.
 */
export function parseKeyValueLine(text: string): { key: string; value: string } | null {
    const pair = splitOnce(text.trim(), '=');
    if (!pair || !pair[0]) return null;
    return {key: pair[0], value: pair[1]};
}

export const CRON_SPECIALS = [
    '@reboot',
    '@yearly',
    '@annually',
    '@monthly',
    '@weekly',
    '@daily',
    '@midnight',
    '@hourly',
] as const;

export type CronLine =
    | {
          type: 'schedule';
          minute: string;
          hour: string;
          dayOfMonth: string;
          month: string;
          dayOfWeek: string;
          command: string;
      }
    | { type: 'special'; special: string; command: string };

const SCHEDULE_RE = /^(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(.+)$/;
const SPECIAL_RE = /^(@[a-z]+)\s+(.+)$/i;

/**
 * Five schedule fields followed by the command, or a special such as
 * `@daily` followed by the command. The command keeps its inner spacing.
 */
export function parseCronLine(text: string): CronLine | null {
    const trimmed = text.trim();

    if (trimmed.startsWith('@')) {
        const m = trimmed.match(SPECIAL_RE);
        if (!m) return null;
        const special = m[1].toLowerCase();
        const specials: readonly string[] = CRON_SPECIALS;
        if (!specials.includes(special)) return null;
        return {type: 'special', special, command: m[2].trim()};
    }

    const m = trimmed.match(SCHEDULE_RE);
    if (!m) return null;

    return {
        type: 'schedule',
        minute: m[1],
        hour: m[2],
        dayOfMonth: m[3],
        month: m[4],
        dayOfWeek: m[5],
        command: m[6].trim(),
    };
}
