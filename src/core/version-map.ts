// src/core/version-map.ts

import fs from 'fs';
import path from 'path';
import {VERSION_MAP_STORE_FILE, type BrineDocument, type VersionMapConfig} from '../schema';
import {CorruptVersionMapError} from '../util/errors';
import {defaultLogger} from '../util/logger';
import {versionMapKey} from './manifest';

const logger = defaultLogger.child('[versions]');

export interface VersionMapFile {
   version: 1;
   /** "<document>.<package>" → pinned version. */
   entries: Record<string, string>;
   /**
    * Hand-written per-environment pins, "<env>" → key → version. Layered over
    * `entries` in that environment's block and never touched by a run.
    */
   overrides?: Record<string, Record<string, string>>;
}

export type VersionOverrides = Record<string, Record<string, string>>;

/**
 * Version map entries declared by one document: every present package
 * that carries a version.
 */
export function collectVersionMap(doc: BrineDocument): Map<string, string> {
   const entries = new Map<string, string>();
   for (const pkg of doc.packages) {
      if (pkg.presence === 'present' && pkg.attribute !== undefined) {
         entries.set(versionMapKey(doc, pkg.target), pkg.attribute);
      }
   }
   return entries;
}

function isStringRecord(value: unknown): value is Record<string, string> {
   if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
   return Object.values(value).every((v) => typeof v === 'string');
}

function isVersionMapFile(value: unknown): value is VersionMapFile {
   if (typeof value !== 'object' || value === null) return false;
   if (!('version' in value) || value.version !== 1) return false;
   if (!('entries' in value) || !isStringRecord(value.entries)) return false;
   if (!('overrides' in value) || value.overrides === undefined) return true;

   const {overrides} = value;
   if (typeof overrides !== 'object' || overrides === null || Array.isArray(overrides)) return false;
   return Object.values(overrides).every(isStringRecord);
}

function byKey<T>([a]: [string, T], [b]: [string, T]): number {
   return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * On-disk version map (`maps/versions.json`), merged additively across runs:
 * unrelated entries are preserved, matching keys are overwritten.
 *
 * Unlike a cache, an unreadable store is an error. Resetting it would drop
 * pinned versions other runs wrote.
 */
export class VersionMapStore {
   private entries = new Map<string, string>();
   private overrides: VersionOverrides = {};

   constructor(
      private readonly mapsDir: string,
      private readonly fileName: string = VERSION_MAP_STORE_FILE,
   ) { }

   get filePath(): string {
      return path.resolve(this.mapsDir, this.fileName);
   }

   load(): void {
      const filePath = this.filePath;
      if (!fs.existsSync(filePath)) {
         logger.debug(`No version map at ${filePath}, starting empty.`);
         this.entries = new Map();
         this.overrides = {};
         return;
      }

      let parsed: unknown;
      try {
         parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
      } catch (err) {
         throw new CorruptVersionMapError(filePath, err);
      }

      if (!isVersionMapFile(parsed)) {
         throw new CorruptVersionMapError(filePath);
      }

      this.entries = new Map(Object.entries(parsed.entries));
      this.overrides = parsed.overrides ?? {};
      logger.debug(`Loaded ${this.entries.size} version map entries from ${filePath}`);
   }

   merge(entries: Map<string, string>): void {
      for (const [key, version] of entries) {
         this.entries.set(key, version);
      }
   }

   get(key: string): string | undefined {
      return this.entries.get(key);
   }

   get size(): number {
      return this.entries.size;
   }

   /**
    * Entries sorted by key, so the file diff only shows real changes.
    */
   sorted(): Map<string, string> {
      return new Map([...this.entries].sort(byKey));
   }

   /**
    * Per-environment pins read from the file; kept as loaded.
    */
   getOverrides(): VersionOverrides {
      return this.overrides;
   }

   serialize(): string {
      const file: VersionMapFile = {
         version: 1,
         entries: Object.fromEntries(this.sorted()),
      };
      const envs = Object.entries(this.overrides).filter(([, pins]) => Object.keys(pins).length > 0);
      if (envs.length > 0) {
         file.overrides = Object.fromEntries(
            envs.sort(byKey).map(([env, pins]) => [env, Object.fromEntries(Object.entries(pins).sort(byKey))]),
         );
      }
      return JSON.stringify(file, null, 2) + '\n';
   }
}

/**
 * Jinja lookup imported by the manifest:
 *
 *   {% set versions = salt["grains.filter_by"]({ "<env>": { key: version } }, ...) %}
 *
 * Every environment receives the same entries, with that environment's
 * overrides from versions.json layered on top.
 */
export function renderVersionMapJinja(
   entries: Map<string, string>,
   options: Required<VersionMapConfig>,
   overrides: VersionOverrides = {},
): string {
   const q = (value: string) => JSON.stringify(value);
   const lines = ['{% set versions = salt["grains.filter_by"]({'];

   for (const env of options.environments) {
      lines.push(`    ${q(env)}: {`);
      const pinned = new Map(entries);
      for (const [key, version] of Object.entries(overrides[env] ?? {})) {
         pinned.set(key, version);
      }
      for (const [key, version] of [...pinned].sort(byKey)) {
         lines.push(`        ${q(key)}: ${q(version)},`);
      }
      lines.push('    },');
   }

   lines.push('},', `grain=${q(options.grain)},`, `default=${q(options.defaultEnvironment)})`, '%}');
   return lines.join('\n') + '\n';
}
