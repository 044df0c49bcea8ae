// src/core/runner.ts

import path from 'path';
import pluralize from 'pluralize';
import {formatBrinefile, parseBrinefile} from '../ast';
import type {BrineDocument, ResolvedBrineConfig} from '../schema';
import {SourceNotFoundError} from '../util/errors';
import {readFileIfExistsSync} from '../util/fs-utils';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {planArtifacts, writeArtifacts, type ArtifactPlan} from './artifacts';
import {loadBrineConfig} from './config-loader';

const checkLogger = defaultLogger.child('[check]');
const runLogger = defaultLogger.child('[runner]');

export interface RunOptions {
    /**
     * Optional logger override.
     */
    logger?: Logger;

    /**
     * Optional overrides (e.g. allow CLI to point at a different Brinefile or config).
     */
    sourceFile?: string;
    configPath?: string;

    /**
     * If true, format the Brinefile even if config.format.enabled is false.
     */
    format?: boolean;
}

export interface LoadedSource {
    config: ResolvedBrineConfig;
    root: string;
    sourcePath: string;
    text: string;
}

export interface RunResult {
    document: BrineDocument;
    plan: ArtifactPlan;
}

/**
 * Resolve config and read the Brinefile text.
 */
export async function loadSource(cwd: string, options: RunOptions = {}): Promise<LoadedSource> {
    const {config, root} = await loadBrineConfig(cwd, {configPath: options.configPath});
    const sourcePath = path.resolve(root, options.sourceFile ?? config.sourceFile);

    const text = readFileIfExistsSync(sourcePath);
    if (text === null) {
        throw new SourceNotFoundError(sourcePath);
    }

    return {config, root, sourcePath, text};
}

/**
 * One-line summary such as
 * "role queue.mq-service: 3 packages, 1 file, 1 service".
 */
export function describeDocument(doc: BrineDocument): string {
    const counts: [string, number][] = [
        ['include', doc.includes.length],
        ['sysctl setting', doc.sysctl.size],
        ['package', doc.packages.length],
        ['file', doc.files.length],
        ['directory', doc.directories.length],
        ['symlink', doc.symlinks.length],
        ['service', doc.services.length],
        ['command', doc.commands.length],
        ['script', doc.scripts.length],
        ['cronjob', doc.cronjobs.length],
    ];

    const parts = counts.filter(([, n]) => n > 0).map(([word, n]) => pluralize(word, n, true));
    return `${doc.kind} ${doc.name}: ${parts.length ? parts.join(', ') : 'nothing to manage'}`;
}

/**
 * Parse and validate the Brinefile without writing anything.
 */
export async function checkOnce(cwd: string, options: RunOptions = {}): Promise<BrineDocument> {
    const logger = options.logger ?? checkLogger;
    const {sourcePath, text} = await loadSource(cwd, options);

    const document = parseBrinefile(text);
    logger.info(`${path.basename(sourcePath)} is valid (${describeDocument(document)})`);
    return document;
}

/**
 * Compile the Brinefile in `cwd` and write its artifacts.
 *
 * Everything (parse, validation, version map merge) is computed before the
 * first write, so a failing run leaves the directory as it was.
 */
export async function runOnce(cwd: string, options: RunOptions = {}): Promise<RunResult> {
    const logger = options.logger ?? runLogger;
    const {config, root, sourcePath, text} = await loadSource(cwd, options);

    const document = parseBrinefile(text);
    logger.debug(describeDocument(document));

    const plan = planArtifacts(document, {root, config});

    if (options.format || config.format.enabled) {
        const formatted = formatBrinefile(text);
        if (formatted.changed) {
            plan.files.push({kind: 'source', path: sourcePath, contents: formatted.text});
        }
    }

    writeArtifacts(plan, logger);

    if (plan.versions.size > 0) {
        logger.info(`pinned ${pluralize('package version', plan.versions.size, true)}`);
    }

    return {document, plan};
}
