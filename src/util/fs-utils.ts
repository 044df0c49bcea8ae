// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the path it was given.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * Read a file as UTF-8, returning null if it doesn't exist.
 * Other read errors (permissions, EISDIR, ...) are thrown.
 */
export function readFileIfExistsSync(filePath: string): string | null {
   try {
      return fs.readFileSync(filePath, 'utf8');
   } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
         return null;
      }
      throw err;
   }
}

/**
 * Write a UTF-8 file through a temp file in the same directory followed by
 * a rename, so readers never see a half-written file.
 */
export function writeFileAtomicSync(filePath: string, contents: string): void {
   const dir = path.dirname(filePath);
   ensureDirSync(dir);

   const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
   fs.writeFileSync(tmpPath, contents, 'utf8');
   try {
      fs.renameSync(tmpPath, filePath);
   } catch (err) {
      fs.rmSync(tmpPath, { force: true });
      throw err;
   }
}

/**
 * Resolve an absolute path from projectRoot + relative path,
 * and assert it stays within the project root.
 *
 * Throws if the resolved path escapes the project root.
 */
export function resolveProjectPath(projectRoot: string, relPath: string): string {
   const absRoot = path.resolve(projectRoot);
   const absTarget = path.resolve(absRoot, relPath);

   const rootWithSep = absRoot.endsWith(path.sep) ? absRoot : absRoot + path.sep;
   if (!absTarget.startsWith(rootWithSep) && absTarget !== absRoot) {
      throw new Error(
         `Attempted to resolve path outside project root: ` +
         `root="${absRoot}", target="${absTarget}"`,
      );
   }

   return absTarget;
}

/**
 * Convert an absolute path back to a project-relative POSIX path,
 * for log output.
 */
export function toProjectRelativePath(projectRoot: string, absolutePath: string): string {
   return toPosixPath(path.relative(path.resolve(projectRoot), path.resolve(absolutePath)));
}
