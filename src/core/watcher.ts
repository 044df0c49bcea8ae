// src/core/watcher.ts

import path from 'path';
import chokidar, { type FSWatcher } from 'chokidar';
import { runOnce, type RunOptions } from './runner';
import { loadBrineConfig } from './config-loader';
import { defaultLogger, type Logger } from '../util/logger';

const watchLogger = defaultLogger.child('[watch]');

export interface WatchOptions extends RunOptions {
    /**
     * Debounce delay in milliseconds between detected changes
     * and a re-run.
     *
     * Default: 150 ms
     */
    debounceMs?: number;

    /**
     * Optional logger; falls back to defaultLogger.child('[watch]').
     */
    logger?: Logger;
}

/**
 * Watch the Brinefile and brine.config.* and regenerate on every change.
 *
 * Runs never overlap: a change that lands mid-run schedules exactly one
 * follow-up run. A failing run is logged and the watcher keeps going.
 */
export async function watchBrinefile(cwd: string, options: WatchOptions = {}): Promise<FSWatcher> {
    const logger = options.logger ?? watchLogger;
    const root = path.resolve(cwd);

    const { config } = await loadBrineConfig(root, { configPath: options.configPath });
    const sourcePath = path.resolve(root, options.sourceFile ?? config.sourceFile);
    const configPath = options.configPath ? path.resolve(root, options.configPath) : undefined;

    const debounceMs = options.debounceMs ?? 150;

    logger.info(`Watching ${sourcePath}`);

    let timer: NodeJS.Timeout | undefined;
    let running = false;
    let pending = false;

    async function run() {
        if (running) {
            pending = true;
            return;
        }
        running = true;
        try {
            logger.info('Change detected → regenerating...');
            await runOnce(root, options);
        } catch (err) {
            logger.error(err);
        } finally {
            running = false;
            if (pending) {
                pending = false;
                scheduleRun();
            }
        }
    }

    function scheduleRun() {
        if (timer) clearTimeout(timer);
        timer = setTimeout(() => {
            void run();
        }, debounceMs);
    }

    function isInteresting(filePath: string): boolean {
        const abs = path.resolve(root, filePath);
        if (abs === sourcePath) return true;
        if (configPath) return abs === configPath;
        return path.dirname(abs) === root && path.basename(abs).startsWith('brine.config.');
    }

    // The Brinefile may live below the root (--file roles/web.brine)
    const dirs = [...new Set([root, path.dirname(sourcePath)])];

    const watcher = chokidar.watch(dirs, {
        ignoreInitial: true,
        persistent: true,
        depth: 0,
    });

    watcher
        .on('all', (event, filePath) => {
            if (!isInteresting(filePath)) return;
            logger.debug(`Event ${event} on ${filePath}`);
            scheduleRun();
        })
        .on('error', (error) => {
            logger.error('Watcher error:', error);
        });

    // Initial run
    scheduleRun();

    return watcher;
}
