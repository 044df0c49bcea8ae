// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { pathToFileURL } from 'url';
import { transform } from 'esbuild';

import { resolveBrineConfig, type BrineConfig, type ResolvedBrineConfig } from '../schema';
import { ConfigNotFoundError, InvalidConfigError } from '../util/errors';
import { defaultLogger } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

export const CONFIG_CANDIDATES = [
   'brine.config.ts',
   'brine.config.mts',
   'brine.config.mjs',
   'brine.config.js',
   'brine.config.cjs',
];

export interface LoadBrineConfigOptions {
   /**
    * Optional explicit config file path (absolute or relative to cwd).
    * If not provided, we look for brine.config.* in cwd; none is fine.
    */
   configPath?: string;
}

export interface LoadBrineConfigResult {
   /**
    * Configuration with defaults applied.
    */
   config: ResolvedBrineConfig;

   /**
    * Absolute path of the config file used, or null for pure defaults.
    */
   configPath: string | null;

   /**
    * Absolute directory the Brinefile and every artifact path are resolved against.
    */
   root: string;
}

/**
 * Load brine configuration for the given working directory.
 *
 * - An explicit `configPath` must exist.
 * - Otherwise the first brine.config.* found in cwd is used.
 * - Without a config file every default applies.
 */
export async function loadBrineConfig(
   cwd: string,
   options: LoadBrineConfigOptions = {},
): Promise<LoadBrineConfigResult> {
   const root = path.resolve(cwd);

   let configPath: string | null;
   if (options.configPath) {
      configPath = path.resolve(root, options.configPath);
      if (!fs.existsSync(configPath)) {
         throw new ConfigNotFoundError(configPath);
      }
   } else {
      configPath = findConfigPath(root);
   }

   if (!configPath) {
      logger.debug(`No brine.config.* in ${root}, using defaults`);
      return { config: resolveBrineConfig(), configPath: null, root };
   }

   const userConfig = validateConfig(configPath, await importConfig(configPath));
   logger.debug(`Loaded config from ${configPath}`);

   return { config: resolveBrineConfig(userConfig), configPath, root };
}

export function findConfigPath(dir: string): string | null {
   for (const file of CONFIG_CANDIDATES) {
      const full = path.join(dir, file);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return null;
}

/**
 * Import a config module from the given path.
 * - For .ts/.mts we transpile with esbuild to ESM and load from a temp file.
 * - For .js/.mjs/.cjs we import directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();

   const modulePath = ext === '.ts' || ext === '.mts' ? await transpileTsConfig(configPath) : configPath;

   const mod: unknown = await import(pathToFileURL(modulePath).href);
   if (typeof mod === 'object' && mod !== null && 'default' in mod) {
      return mod.default;
   }
   return mod;
}

/**
 * Transpile a TS config file to ESM with esbuild, returning the compiled file.
 * We cache based on (path + mtime) so changes invalidate the temp.
 */
async function transpileTsConfig(configPath: string): Promise<string> {
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = ensureDirSync(path.join(os.tmpdir(), 'brine-config'));
   const tmpFile = path.join(tmpDir, `${hash}.mjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader: 'ts',
         format: 'esm',
         sourcemap: 'inline',
         target: 'node20',
         sourcefile: configPath,
      });

      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   return tmpFile;
}

// ---------------------------------------------------------------------------
// Internal: shape checks
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(configPath: string, obj: Record<string, unknown>, key: string, where = ''): string | undefined {
   const value = obj[key];
   if (value === undefined) return undefined;
   if (typeof value !== 'string' || !value) {
      throw new InvalidConfigError(configPath, `"${where}${key}" must be a non-empty string.`);
   }
   return value;
}

/**
 * Check the exported object field by field and copy it into a BrineConfig.
 */
export function validateConfig(configPath: string, value: unknown): BrineConfig {
   if (!isRecord(value)) {
      throw new InvalidConfigError(configPath, 'the module must export a config object.');
   }

   const config: BrineConfig = {
      sourceFile: optionalString(configPath, value, 'sourceFile'),
      manifestFile: optionalString(configPath, value, 'manifestFile'),
      readmeFile: optionalString(configPath, value, 'readmeFile'),
      filesDir: optionalString(configPath, value, 'filesDir'),
      mapsDir: optionalString(configPath, value, 'mapsDir'),
      cronUser: optionalString(configPath, value, 'cronUser'),
   };

   const { owner, versionMap, format } = value;

   if (owner !== undefined) {
      if (!isRecord(owner)) throw new InvalidConfigError(configPath, '"owner" must be an object.');
      config.owner = {
         user: optionalString(configPath, owner, 'user', 'owner.'),
         group: optionalString(configPath, owner, 'group', 'owner.'),
      };
   }

   if (versionMap !== undefined) {
      if (!isRecord(versionMap)) throw new InvalidConfigError(configPath, '"versionMap" must be an object.');
      let environments: string[] | undefined;
      if (versionMap.environments !== undefined) {
         const raw = versionMap.environments;
         if (!Array.isArray(raw) || !raw.every((env) => typeof env === 'string' && env.length > 0)) {
            throw new InvalidConfigError(configPath, '"versionMap.environments" must be a list of names.');
         }
         environments = raw.map((env) => String(env));
      }
      config.versionMap = {
         environments,
         grain: optionalString(configPath, versionMap, 'grain', 'versionMap.'),
         defaultEnvironment: optionalString(configPath, versionMap, 'defaultEnvironment', 'versionMap.'),
      };
   }

   if (format !== undefined) {
      if (!isRecord(format)) throw new InvalidConfigError(configPath, '"format" must be an object.');
      const { enabled } = format;
      if (enabled !== undefined && typeof enabled !== 'boolean') {
         throw new InvalidConfigError(configPath, '"format.enabled" must be a boolean.');
      }
      config.format = { enabled };
   }

   return config;
}
