// src/core/artifacts.ts

import path from 'path';
import pluralize from 'pluralize';
import {VERSION_MAP_JINJA_FILE, type BrineDocument, type ResolvedBrineConfig} from '../schema';
import {ensureDirSync, resolveProjectPath, toProjectRelativePath, writeFileAtomicSync} from '../util/fs-utils';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {generateManifest, joinManifestBlocks, type ManifestBlock} from './manifest';
import {renderReadme} from './readme';
import {collectVersionMap, renderVersionMapJinja, VersionMapStore} from './version-map';

const writeLogger = defaultLogger.child('[write]');

export type ArtifactKind = 'manifest' | 'readme' | 'version-store' | 'version-map' | 'source';

export interface ArtifactFile {
   kind: ArtifactKind;
   /** Absolute path. */
   path: string;
   contents: string;
}

/**
 * Everything a run is about to write, computed before anything touches disk.
 */
export interface ArtifactPlan {
   /** Absolute directory the artifacts are relative to. */
   root: string;
   /** Directories to create (absolute), e.g. files/ and maps/. */
   directories: string[];
   files: ArtifactFile[];
   manifest: ManifestBlock[];
   /** Version map entries declared by this document (before merging). */
   versions: Map<string, string>;
}

export interface PlanContext {
   root: string;
   config: ResolvedBrineConfig;
}

/**
 * Render every artifact for a document.
 *
 * Reads the previous version map (if any) so it can be merged, but writes
 * nothing; a plan that throws leaves the directory untouched.
 */
export function planArtifacts(doc: BrineDocument, ctx: PlanContext): ArtifactPlan {
   const {root, config} = ctx;

   const manifest = generateManifest(doc, {
      filesDir: config.filesDir,
      mapsDir: config.mapsDir,
      owner: config.owner,
      cronUser: config.cronUser,
   });

   const files: ArtifactFile[] = [
      {
         kind: 'manifest',
         path: resolveProjectPath(root, config.manifestFile),
         contents: joinManifestBlocks(manifest),
      },
      {
         kind: 'readme',
         path: resolveProjectPath(root, config.readmeFile),
         contents: renderReadme(doc),
      },
   ];

   const directories = [resolveProjectPath(root, config.filesDir)];

   const versions = collectVersionMap(doc);
   if (versions.size > 0) {
      const mapsDir = resolveProjectPath(root, config.mapsDir);
      const store = new VersionMapStore(mapsDir);
      store.load();
      store.merge(versions);

      directories.push(mapsDir);
      files.push(
         {kind: 'version-store', path: store.filePath, contents: store.serialize()},
         {
            kind: 'version-map',
            path: path.join(mapsDir, VERSION_MAP_JINJA_FILE),
            contents: renderVersionMapJinja(store.sorted(), config.versionMap, store.getOverrides()),
         },
      );
   }

   return {root, directories, files, manifest, versions};
}

/**
 * Create the planned directories and replace every planned file.
 *
 * Each file is written atomically (temp file + rename). The version map
 * store and its Jinja rendering are two renames, not one; a crash between
 * them leaves the Jinja file one run behind until the next run.
 */
export function writeArtifacts(plan: ArtifactPlan, logger: Logger = writeLogger): void {
   for (const dir of plan.directories) {
      ensureDirSync(dir);
      logger.debug(`ensured ${toProjectRelativePath(plan.root, dir)}/`);
   }

   for (const file of plan.files) {
      writeFileAtomicSync(file.path, file.contents);
      logger.debug(`wrote ${toProjectRelativePath(plan.root, file.path)}`);
   }

   logger.info(`wrote ${pluralize('file', plan.files.length, true)}`);
}
