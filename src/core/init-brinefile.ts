// src/core/init-brinefile.ts

import fs from 'fs';
import path from 'path';
import {loadBrineConfig} from './config-loader';
import {InvalidIdentityError} from '../util/errors';
import {writeFileAtomicSync} from '../util/fs-utils';
import {defaultLogger} from '../util/logger';
import {IDENTITY_RE} from '../ast';
import type {DocumentKind} from '../schema';

const logger = defaultLogger.child('[init]');

export interface InitBrinefileOptions {
    /**
     * Declare an %elementname instead of a %rolename.
     */
    element?: boolean;

    /**
     * Dotted state name. Default: the directory name.
     */
    name?: string;

    /**
     * Overwrite an existing Brinefile.
     */
    force?: boolean;

    configPath?: string;
}

export interface InitBrinefileResult {
    sourcePath: string;
    created: boolean;
}

/**
 * Starter Brinefile. Every section but the identity and description is
 * present and empty so the file documents what is available.
 */
export function renderStarterBrinefile(kind: DocumentKind, name: string): string {
    return `# Brinefile for ${name}
# Run "brine" in this directory to regenerate the Salt state.

%${kind === 'role' ? 'rolename' : 'elementname'}
${name}

%description
Describe what this ${kind} sets up.

%packages
# nginx
# nginx=1.24.0   pin a version (per-environment pins: "overrides" in maps/versions.json)
# -telnet        remove a package

%files
# /etc/motd      template in files/etc/motd.jinja
# /etc/app.conf=0600

%directories

%symlinks
# /usr/local/bin/app->/opt/app/bin/app

%services

%commands

%scripts

%cronjobs
# */5 * * * * /usr/local/bin/cleanup
`;
}

/**
 * Write a starter Brinefile into `cwd`.
 *
 * Leaves an existing Brinefile alone unless `force` is set.
 */
export async function initBrinefile(cwd: string, options: InitBrinefileOptions = {}): Promise<InitBrinefileResult> {
    const {config, root} = await loadBrineConfig(cwd, {configPath: options.configPath});
    const sourcePath = path.resolve(root, config.sourceFile);

    const kind: DocumentKind = options.element ? 'element' : 'role';
    const section = kind === 'role' ? 'rolename' : 'elementname';
    const name = options.name ?? path.basename(root);
    if (!IDENTITY_RE.test(name)) {
        throw new InvalidIdentityError(`"${name}" is not a valid state name.`, section, 1);
    }

    const exists = fs.existsSync(sourcePath);
    if (exists && !options.force) {
        logger.info(`Brinefile already exists at ${sourcePath} (use --force to overwrite).`);
        return {sourcePath, created: false};
    }

    writeFileAtomicSync(sourcePath, renderStarterBrinefile(kind, name));
    logger.info(`${exists ? 'Overwrote' : 'Created'} ${sourcePath}`);

    return {sourcePath, created: true};
}
