// src/schema/document.ts

/**
 * A Brinefile describes either a whole machine role or one reusable element.
 */
export type DocumentKind = 'role' | 'element';

export type ItemKind = 'package' | 'file' | 'directory' | 'service';

export type Presence = 'present' | 'absent';

export const DEFAULT_FILE_MODE = '0644';
export const DEFAULT_DIRECTORY_MODE = '0755';

interface ManagedItemBase {
   kind: ItemKind;

   /**
    * Package name, path or service name.
    */
   target: string;

   /** 1-based source line. */
   line: number;
}

export interface PresentItem extends ManagedItemBase {
   presence: 'present';

   /**
    * Version for packages, octal mode for files and directories.
    */
   attribute?: string;
}

/**
 * Removal is explicit: absent items are rendered as removed/stopped states,
 * never dropped. They cannot carry an attribute.
 */
export interface AbsentItem extends ManagedItemBase {
   presence: 'absent';
   attribute?: undefined;
}

export type ManagedItem = PresentItem | AbsentItem;

export interface Symlink {
   linkPath: string;
   targetPath: string;
   presence: Presence;
   line: number;
}

/**
 * A `%commands` entry (shell command) or a `%scripts` entry (script path).
 */
export interface Executable {
   value: string;
   line: number;
}

interface CronJobBase {
   /** Source line, trimmed. */
   raw: string;
   command: string;
   line: number;
}

export interface ScheduledCronJob extends CronJobBase {
   type: 'schedule';
   minute: string;
   hour: string;
   dayOfMonth: string;
   month: string;
   dayOfWeek: string;
}

/**
 * `@reboot`, `@daily`, ... shorthand entries.
 */
export interface SpecialCronJob extends CronJobBase {
   type: 'special';
   special: string;
}

export type CronJob = ScheduledCronJob | SpecialCronJob;

/**
 * In-memory model of one Brinefile. Built once per run and discarded after
 * the artifacts are rendered.
 */
export interface BrineDocument {
   kind: DocumentKind;

   /** Dotted identifier, e.g. "queue.mq-service". */
   name: string;

   description: string;
   readme?: string;

   /** Kept in author order; duplicates are not removed. */
   includes: string[];

   /** Insertion-ordered kernel parameters. */
   sysctl: Map<string, string>;

   packages: ManagedItem[];
   files: ManagedItem[];
   directories: ManagedItem[];
   services: ManagedItem[];
   symlinks: Symlink[];
   commands: Executable[];
   scripts: Executable[];
   cronjobs: CronJob[];
}

/**
 * Path segment used for salt:// sources and map imports,
 * e.g. "role/queue/mq-service".
 */
export function documentStatePath(doc: Pick<BrineDocument, 'kind' | 'name'>): string {
   return `${doc.kind}/${doc.name.split('.').join('/')}`;
}
