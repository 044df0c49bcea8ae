// src/core/manifest.ts

import {
   DEFAULT_BRINE_CONFIG,
   DEFAULT_DIRECTORY_MODE,
   DEFAULT_FILE_MODE,
   VERSION_MAP_JINJA_FILE,
   documentStatePath,
   type BrineDocument,
   type CronJob,
   type Executable,
   type ItemKind,
   type ManagedItem,
   type OwnerConfig,
   type Symlink,
} from '../schema';
import {InternalConsistencyError} from '../util/errors';
import {
   StateIdRegistry,
   sectionBanner,
   slugify,
   stanza,
   yamlQuote,
   yamlScalar,
   type StanzaConcern,
   type StanzaParam,
} from './stanzas';

export type ManifestConcern = 'header' | StanzaConcern;

export interface ManifestBlock {
   concern: ManifestConcern;
   text: string;
}

export interface ManifestOptions {
   /** Default: "files". */
   filesDir?: string;
   /** Default: "maps". */
   mapsDir?: string;
   owner?: OwnerConfig;
   /** Default: "root". */
   cronUser?: string;
}

interface RenderContext {
   doc: BrineDocument;
   prefix: string;
   statePath: string;
   filesDir: string;
   mapsDir: string;
   user: string;
   group: string;
   cronUser: string;
   ids: StateIdRegistry;
}

/**
 * Fixed rendering order; keeps manifests diff-stable across runs.
 */
export const MANIFEST_ORDER: readonly ManifestConcern[] = [
   'header',
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
];

/**
 * Key under which a versioned package is stored in the version map.
 */
export function versionMapKey(doc: Pick<BrineDocument, 'name'>, packageName: string): string {
   return `${doc.name}.${packageName}`;
}

export function hasVersionedPackages(doc: BrineDocument): boolean {
   return doc.packages.some((pkg) => pkg.presence === 'present' && pkg.attribute !== undefined);
}

/**
 * Render a validated document into manifest blocks, one per non-empty
 * concern, in MANIFEST_ORDER. Pure: the same document and options always
 * produce the same blocks.
 */
export function generateManifest(doc: BrineDocument, options: ManifestOptions = {}): ManifestBlock[] {
   const ctx: RenderContext = {
      doc,
      prefix: slugify(doc.name),
      statePath: documentStatePath(doc),
      filesDir: options.filesDir ?? DEFAULT_BRINE_CONFIG.filesDir,
      mapsDir: options.mapsDir ?? DEFAULT_BRINE_CONFIG.mapsDir,
      user: options.owner?.user ?? DEFAULT_BRINE_CONFIG.owner.user,
      group: options.owner?.group ?? DEFAULT_BRINE_CONFIG.owner.group,
      cronUser: options.cronUser ?? DEFAULT_BRINE_CONFIG.cronUser,
      ids: new StateIdRegistry(),
   };

   const blocks: ManifestBlock[] = [];
   for (const concern of MANIFEST_ORDER) {
      const text = concern === 'header' ? renderHeader(ctx) : renderConcern(concern, ctx);
      if (text) blocks.push({concern, text});
   }
   return blocks;
}

/**
 * Manifest file contents: blocks separated by one blank line.
 */
export function renderManifest(doc: BrineDocument, options: ManifestOptions = {}): string {
   return joinManifestBlocks(generateManifest(doc, options));
}

export function joinManifestBlocks(blocks: ManifestBlock[]): string {
   return blocks.map((block) => block.text).join('\n\n') + '\n';
}

// ---------------------------------------------------------------------------
// Internal: blocks
// ---------------------------------------------------------------------------

function renderHeader(ctx: RenderContext): string {
   const {doc} = ctx;
   const lines = ['#', `# ${doc.name}`, '#', ...doc.description.split('\n').map((l) => `#   ${l}`), '#'];

   if (hasVersionedPackages(doc)) {
      const importPath = `${ctx.statePath}/${ctx.mapsDir}/${VERSION_MAP_JINJA_FILE}`;
      lines.push('', `{% from "${importPath}" import versions with context %}`);
   }

   return lines.join('\n');
}

function renderConcern(concern: StanzaConcern, ctx: RenderContext): string | null {
   const chunks = renderChunks(concern, ctx);
   if (!chunks.length) return null;
   return [sectionBanner(concern), ...chunks].join('\n\n');
}

function renderChunks(concern: StanzaConcern, ctx: RenderContext): string[] {
   const {doc} = ctx;
   switch (concern) {
      case 'includes':
         return doc.includes.length ? [['include:', ...doc.includes.map((inc) => `  - ${inc}`)].join('\n')] : [];
      case 'sysctl':
         return [...doc.sysctl].map(([key, value]) => renderSysctl(key, value, ctx));
      case 'packages':
         return renderItems(doc.packages, 'package', ctx);
      case 'files':
         return renderItems(doc.files, 'file', ctx);
      case 'directories':
         return renderItems(doc.directories, 'directory', ctx);
      case 'symlinks':
         return doc.symlinks.map((link) => renderSymlink(link, ctx));
      case 'services':
         return renderItems(doc.services, 'service', ctx);
      case 'commands':
         return doc.commands.map((cmd) => renderCommand(cmd, ctx));
      case 'scripts':
         return doc.scripts.map((script) => renderScript(script, ctx));
      case 'cronjobs':
         return doc.cronjobs.map((job) => renderCronJob(job, ctx));
   }
}

function renderItems(items: ManagedItem[], expected: ItemKind, ctx: RenderContext): string[] {
   return items.map((item) => {
      if (item.kind !== expected) {
         throw new InternalConsistencyError(
            `${item.kind} "${item.target}" (line ${item.line}) is filed under ${expected} items.`,
         );
      }
      return renderManagedItem(item, ctx);
   });
}

// ---------------------------------------------------------------------------
// Internal: stanzas
// ---------------------------------------------------------------------------

function stateId(ctx: RenderContext, name: string, suffix: string, action?: string): string {
   const base = `${ctx.prefix}_${slugify(name)}_${suffix}`;
   return ctx.ids.claim(action ? `${action}_${base}` : base);
}

function ownership(ctx: RenderContext): StanzaParam[] {
   return [
      ['user', yamlScalar(ctx.user)],
      ['group', yamlScalar(ctx.group)],
   ];
}

function renderManagedItem(item: ManagedItem, ctx: RenderContext): string {
   const name = yamlScalar(item.target);

   switch (item.kind) {
      case 'package': {
         if (item.presence === 'absent') {
            return stanza(stateId(ctx, item.target, 'pkg', 'remove'), 'pkg.removed', [['name', name]]);
         }
         const params: StanzaParam[] = [['name', name]];
         if (item.attribute !== undefined) {
            const key = versionMapKey(ctx.doc, item.target).replace(/'/g, "\\'");
            params.push(['version', `{{ versions['${key}'] }}`], ['refresh', 'True']);
         }
         return stanza(stateId(ctx, item.target, 'pkg'), 'pkg.installed', params);
      }
      case 'file': {
         if (item.presence === 'absent') {
            return stanza(stateId(ctx, item.target, 'file', 'remove'), 'file.absent', [['name', name]]);
         }
         const sep = item.target.startsWith('/') ? '' : '/';
         return stanza(stateId(ctx, item.target, 'file'), 'file.managed', [
            ['name', name],
            ['source', yamlScalar(`salt://${ctx.statePath}/${ctx.filesDir}${sep}${item.target}.jinja`)],
            ['template', 'jinja'],
            ['makedirs', 'True'],
            ['mode', yamlQuote(item.attribute ?? DEFAULT_FILE_MODE)],
            ...ownership(ctx),
         ]);
      }
      case 'directory': {
         if (item.presence === 'absent') {
            return stanza(stateId(ctx, item.target, 'dir', 'remove'), 'file.absent', [['name', name]]);
         }
         return stanza(stateId(ctx, item.target, 'dir'), 'file.directory', [
            ['name', name],
            ['makedirs', 'True'],
            ['mode', yamlQuote(item.attribute ?? DEFAULT_DIRECTORY_MODE)],
            ...ownership(ctx),
         ]);
      }
      case 'service': {
         if (item.presence === 'absent') {
            return stanza(stateId(ctx, item.target, 'svc', 'stop'), 'service.dead', [
               ['name', name],
               ['enable', 'False'],
            ]);
         }
         return stanza(stateId(ctx, item.target, 'svc'), 'service.running', [
            ['name', name],
            ['enable', 'True'],
         ]);
      }
      default: {
         const unknown: never = item.kind;
         throw new InternalConsistencyError(`Unknown managed item kind "${String(unknown)}" for ${item.target}.`);
      }
   }
}

function renderSymlink(link: Symlink, ctx: RenderContext): string {
   const name = yamlScalar(link.linkPath);
   if (link.presence === 'absent') {
      return stanza(stateId(ctx, link.linkPath, 'link', 'remove'), 'file.absent', [['name', name]]);
   }
   return stanza(stateId(ctx, link.linkPath, 'link'), 'file.symlink', [
      ['name', name],
      ['target', yamlScalar(link.targetPath)],
      ['force', 'True'],
      ['makedirs', 'True'],
      ...ownership(ctx),
   ]);
}

function renderSysctl(key: string, value: string, ctx: RenderContext): string {
   return stanza(stateId(ctx, key, 'sysctl'), 'sysctl.present', [
      ['name', yamlScalar(key)],
      ['value', yamlScalar(value)],
      ['config', '/etc/sysctl.conf'],
   ]);
}

function renderCommand(cmd: Executable, ctx: RenderContext): string {
   const title = cmd.value.split(/\s+/)[0];
   return stanza(stateId(ctx, title, 'cmd', 'run'), 'cmd.run', [['name', yamlScalar(cmd.value)]]);
}

function renderScript(script: Executable, ctx: RenderContext): string {
   return stanza(stateId(ctx, script.value, 'script', 'run'), 'cmd.script', [['name', yamlScalar(script.value)]]);
}

function renderCronJob(job: CronJob, ctx: RenderContext): string {
   const params: StanzaParam[] = [
      ['name', yamlScalar(job.command)],
      ['user', yamlScalar(ctx.cronUser)],
   ];

   if (job.type === 'special') {
      params.push(['special', yamlQuote(job.special)]);
   } else {
      params.push(
         ['minute', yamlQuote(job.minute)],
         ['hour', yamlQuote(job.hour)],
         ['daymonth', yamlQuote(job.dayOfMonth)],
         ['month', yamlQuote(job.month)],
         ['dayweek', yamlQuote(job.dayOfWeek)],
      );
   }

   return stanza(stateId(ctx, job.command, 'cronjob'), 'cron.present', params);
}
