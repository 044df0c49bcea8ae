// test/runner.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {checkOnce, describeDocument, runOnce} from '../src/core/runner';
import {joinManifestBlocks} from '../src/core/manifest';
import {parseBrinefile} from '../src/ast';
import {
    BrineError,
    CorruptVersionMapError,
    InvalidModifierCombinationError,
    SourceNotFoundError,
} from '../src/util/errors';
import {Logger, type LogSink} from '../src/util/logger';

const QUEUE = [
    '%rolename',
    'queue.mq-service',
    '',
    '%description',
    'Sets up queue',
    '',
    '%packages',
    'nagios-plugins-check_rabbitmq',
    'openssh=6.6p1-6.3',
    '-telnet',
    '',
].join('\n');

function captureLogger(level: 'info' | 'silent' = 'silent') {
    const lines: string[] = [];
    const push = (line: string) => {
        lines.push(line);
    };
    const sink: LogSink = {error: push, warn: push, info: push, debug: push};
    return {lines, logger: new Logger({level, sink, color: false})};
}

describe('runOnce', () => {
    let dir: string;

    const read = (rel: string) => fs.readFileSync(path.join(dir, rel), 'utf8');
    const write = (rel: string, text: string) => {
        fs.mkdirSync(path.dirname(path.join(dir, rel)), {recursive: true});
        fs.writeFileSync(path.join(dir, rel), text, 'utf8');
    };

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'brine-run-'));
    });

    afterEach(() => {
        fs.rmSync(dir, {recursive: true, force: true});
    });

    it('writes manifest, README, files/ and the version map', async () => {
        write('Brinefile', QUEUE);

        const {document, plan} = await runOnce(dir, {logger: captureLogger().logger});

        expect(fs.readdirSync(dir).sort()).toEqual(['Brinefile', 'README.md', 'files', 'init.sls', 'maps']);
        expect(fs.readdirSync(path.join(dir, 'files'))).toEqual([]);
        expect(fs.readdirSync(path.join(dir, 'maps')).sort()).toEqual(['versions.json', 'versions.map.jinja']);

        expect(read('init.sls')).toBe(joinManifestBlocks(plan.manifest));
        expect(read('README.md').startsWith('# queue.mq-service\n\n_Role_\n\nSets up queue\n\n')).toBe(true);
        expect(JSON.parse(read('maps/versions.json'))).toEqual({
            version: 1,
            entries: {'queue.mq-service.openssh': '6.6p1-6.3'},
        });
        expect(read('maps/versions.map.jinja')).toContain('    "prod": {\n        "queue.mq-service.openssh": "6.6p1-6.3",\n    },');
        expect(document.name).toBe('queue.mq-service');
    });

    it('skips maps/ when no package is versioned', async () => {
        write('Brinefile', '%elementname\nbase.ntp\n%description\nTime sync\n%packages\nchrony\n');

        await runOnce(dir, {logger: captureLogger().logger});

        expect(fs.readdirSync(dir).sort()).toEqual(['Brinefile', 'README.md', 'files', 'init.sls']);
    });

    it('preserves unrelated version map entries when a package is added', async () => {
        write('maps/versions.json', JSON.stringify({version: 1, entries: {'base.web.nginx': '1.24.0'}}));
        write('Brinefile', QUEUE);
        await runOnce(dir, {logger: captureLogger().logger});

        write('Brinefile', QUEUE + 'curl=8.0.1\n');
        await runOnce(dir, {logger: captureLogger().logger});

        expect(read('maps/versions.json')).toBe(
            [
                '{',
                '  "version": 1,',
                '  "entries": {',
                '    "base.web.nginx": "1.24.0",',
                '    "queue.mq-service.curl": "8.0.1",',
                '    "queue.mq-service.openssh": "6.6p1-6.3"',
                '  }',
                '}',
                '',
            ].join('\n'),
        );
    });

    it('renders hand-written environment overrides and keeps them on re-run', async () => {
        write('Brinefile', QUEUE);
        await runOnce(dir, {logger: captureLogger().logger});

        const stored = JSON.parse(read('maps/versions.json'));
        write(
            'maps/versions.json',
            JSON.stringify({...stored, overrides: {dev: {'queue.mq-service.openssh': '2.0-dev'}}}),
        );
        await runOnce(dir, {logger: captureLogger().logger});

        const jinja = read('maps/versions.map.jinja');
        expect(jinja).toContain('    "dev": {\n        "queue.mq-service.openssh": "2.0-dev",\n    },');
        expect(jinja).toContain('    "prod": {\n        "queue.mq-service.openssh": "6.6p1-6.3",\n    },');
        expect(JSON.parse(read('maps/versions.json'))).toEqual({
            version: 1,
            entries: {'queue.mq-service.openssh': '6.6p1-6.3'},
            overrides: {dev: {'queue.mq-service.openssh': '2.0-dev'}},
        });
    });

    it('writes nothing when the Brinefile is invalid', async () => {
        write('Brinefile', QUEUE + '-nmap=7.0\n');

        await expect(runOnce(dir, {logger: captureLogger().logger})).rejects.toBeInstanceOf(
            InvalidModifierCombinationError,
        );
        expect(fs.readdirSync(dir)).toEqual(['Brinefile']);
    });

    it('writes nothing when the version map is corrupt', async () => {
        write('Brinefile', QUEUE);
        write('maps/versions.json', '{ not json');

        await expect(runOnce(dir, {logger: captureLogger().logger})).rejects.toBeInstanceOf(CorruptVersionMapError);
        expect(fs.readdirSync(dir).sort()).toEqual(['Brinefile', 'maps']);
        expect(read('maps/versions.json')).toBe('{ not json');
    });

    it('reports a missing Brinefile', async () => {
        const err = await runOnce(dir, {logger: captureLogger().logger}).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(SourceNotFoundError);
        expect(err instanceof BrineError && err.toCliOutput()).toBe(
            `Error: Brinefile not found: ${path.join(dir, 'Brinefile')}\n` +
                '  Suggestion: Run "brine init" to create one, or pass --file.',
        );
    });

    it('honours a custom source file', async () => {
        write('roles/queue.brine', QUEUE);

        await runOnce(dir, {sourceFile: 'roles/queue.brine', logger: captureLogger().logger});

        expect(fs.existsSync(path.join(dir, 'init.sls'))).toBe(true);
    });

    it('formats the Brinefile after a successful compile when asked', async () => {
        write('Brinefile', '%ROLENAME\nqueue.mq-service\n%description\nSets up queue\n%packages\n  openssh = 6.6p1-6.3\n');

        const {plan} = await runOnce(dir, {format: true, logger: captureLogger().logger});

        expect(read('Brinefile')).toBe(
            '%rolename\nqueue.mq-service\n\n%description\nSets up queue\n\n%packages\nopenssh=6.6p1-6.3\n',
        );
        expect(plan.files.map((f) => f.kind)).toEqual(['manifest', 'readme', 'version-store', 'version-map', 'source']);
    });

    it('logs a summary of written files', async () => {
        write('Brinefile', QUEUE);
        const {lines, logger} = captureLogger('info');

        await runOnce(dir, {logger});

        expect(lines).toEqual(['wrote 4 files', 'pinned 1 package version']);
    });
});

describe('checkOnce', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'brine-check-'));
    });

    afterEach(() => {
        fs.rmSync(dir, {recursive: true, force: true});
    });

    it('validates without writing', async () => {
        fs.writeFileSync(path.join(dir, 'Brinefile'), QUEUE, 'utf8');
        const {lines, logger} = captureLogger('info');

        const doc = await checkOnce(dir, {logger});

        expect(doc.packages).toHaveLength(3);
        expect(lines).toEqual(['Brinefile is valid (role queue.mq-service: 3 packages)']);
        expect(fs.readdirSync(dir)).toEqual(['Brinefile']);
    });
});

describe('describeDocument', () => {
    it('counts what the document manages', () => {
        const doc = parseBrinefile('%elementname\nbase.ntp\n%description\nx\n%packages\nchrony\n%services\nchronyd\n');
        expect(describeDocument(doc)).toBe('element base.ntp: 1 package, 1 service');
    });

    it('says so when there is nothing to manage', () => {
        const doc = parseBrinefile('%rolename\nbare\n%description\nx\n');
        expect(describeDocument(doc)).toBe('role bare: nothing to manage');
    });
});
