// test/manifest.spec.ts

import {describe, it, expect} from 'vitest';
import {parseBrinefile} from '../src/ast';
import {generateManifest, renderManifest} from '../src/core/manifest';
import {StateIdRegistry, slugify, yamlScalar} from '../src/core/stanzas';
import {InternalConsistencyError} from '../src/util/errors';

const src = (...lines: string[]) => lines.join('\n');

const QUEUE = src(
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
);

const SSH = src(
    '%elementname',
    'base.ssh',
    '%description',
    'SSH server',
    '%includes',
    'base.users',
    '%sysctl',
    'net.ipv4.ip_forward=1',
    '%files',
    '/etc/ssh/sshd_config=0640',
    '/etc/motd',
    '-/etc/old.conf',
    '%directories',
    '/var/lib/app',
    '%symlinks',
    '/usr/local/bin/ssh-wrapper->/opt/ssh/bin/wrapper',
    '%services',
    'sshd',
    '-telnetd',
    '%commands',
    'systemctl daemon-reload',
    '%scripts',
    'salt://scripts/setup.sh',
    '%cronjobs',
    '*/5 * * * * /usr/local/bin/cleanup --all',
    '@daily /usr/local/bin/rotate',
);

describe('renderManifest', () => {
    it('renders the queue.mq-service role', () => {
        const expected = [
            '#',
            '# queue.mq-service',
            '#',
            '#   Sets up queue',
            '#',
            '',
            '{% from "role/queue/mq-service/maps/versions.map.jinja" import versions with context %}',
            '',
            '##',
            '##  PACKAGES',
            '##    https://docs.saltproject.io/en/latest/ref/states/all/salt.states.pkg.html',
            '',
            'queue_mq_service_nagios_plugins_check_rabbitmq_pkg:',
            '  pkg.installed:',
            '    - name: nagios-plugins-check_rabbitmq',
            '',
            'queue_mq_service_openssh_pkg:',
            '  pkg.installed:',
            '    - name: openssh',
            "    - version: {{ versions['queue.mq-service.openssh'] }}",
            '    - refresh: True',
            '',
            'remove_queue_mq_service_telnet_pkg:',
            '  pkg.removed:',
            '    - name: telnet',
            '',
        ].join('\n');

        expect(renderManifest(parseBrinefile(QUEUE))).toBe(expected);
    });

    it('is byte-identical across runs', () => {
        const doc = parseBrinefile(SSH);
        expect(renderManifest(doc)).toBe(renderManifest(doc));
    });

    it('emits concerns in fixed order and skips empty ones', () => {
        const blocks = generateManifest(parseBrinefile(SSH));
        expect(blocks.map((b) => b.concern)).toEqual([
            'header',
            'includes',
            'sysctl',
            'files',
            'directories',
            'symlinks',
            'services',
            'commands',
            'scripts',
            'cronjobs',
        ]);
    });

    it('leaves out the version map import without versioned packages', () => {
        const [header] = generateManifest(parseBrinefile(SSH));
        expect(header.text).toBe(['#', '# base.ssh', '#', '#   SSH server', '#'].join('\n'));
    });

    it('renders includes and sysctl settings', () => {
        const blocks = generateManifest(parseBrinefile(SSH));
        const text = (concern: string) => blocks.find((b) => b.concern === concern)?.text;

        expect(text('includes')).toBe(
            [
                '##',
                '##  INCLUDES',
                '##    https://docs.saltproject.io/en/latest/ref/states/include.html',
                '',
                'include:',
                '  - base.users',
            ].join('\n'),
        );
        expect(text('sysctl')).toContain(
            [
                'base_ssh_net_ipv4_ip_forward_sysctl:',
                '  sysctl.present:',
                '    - name: net.ipv4.ip_forward',
                "    - value: '1'",
                '    - config: /etc/sysctl.conf',
            ].join('\n'),
        );
    });

    it('renders managed files with their mode, defaulting to 0644', () => {
        const manifest = renderManifest(parseBrinefile(SSH));

        expect(manifest).toContain(
            [
                'base_ssh_etc_ssh_sshd_config_file:',
                '  file.managed:',
                '    - name: /etc/ssh/sshd_config',
                '    - source: salt://element/base/ssh/files/etc/ssh/sshd_config.jinja',
                '    - template: jinja',
                '    - makedirs: True',
                "    - mode: '0640'",
                '    - user: root',
                '    - group: root',
            ].join('\n'),
        );
        expect(manifest).toContain(
            [
                'base_ssh_etc_motd_file:',
                '  file.managed:',
                '    - name: /etc/motd',
                '    - source: salt://element/base/ssh/files/etc/motd.jinja',
                '    - template: jinja',
                '    - makedirs: True',
                "    - mode: '0644'",
            ].join('\n'),
        );
        expect(manifest).toContain(['remove_base_ssh_etc_old_conf_file:', '  file.absent:', '    - name: /etc/old.conf'].join('\n'));
    });

    it('renders directories, symlinks and services', () => {
        const manifest = renderManifest(parseBrinefile(SSH), {owner: {user: 'app', group: 'app'}});

        expect(manifest).toContain(
            [
                'base_ssh_var_lib_app_dir:',
                '  file.directory:',
                '    - name: /var/lib/app',
                '    - makedirs: True',
                "    - mode: '0755'",
                '    - user: app',
                '    - group: app',
            ].join('\n'),
        );
        expect(manifest).toContain(
            [
                'base_ssh_usr_local_bin_ssh_wrapper_link:',
                '  file.symlink:',
                '    - name: /usr/local/bin/ssh-wrapper',
                '    - target: /opt/ssh/bin/wrapper',
                '    - force: True',
                '    - makedirs: True',
                '    - user: app',
                '    - group: app',
            ].join('\n'),
        );
        expect(manifest).toContain(
            ['base_ssh_sshd_svc:', '  service.running:', '    - name: sshd', '    - enable: True'].join('\n'),
        );
        expect(manifest).toContain(
            ['stop_base_ssh_telnetd_svc:', '  service.dead:', '    - name: telnetd', '    - enable: False'].join('\n'),
        );
    });

    it('renders commands, scripts and cronjobs', () => {
        const manifest = renderManifest(parseBrinefile(SSH), {cronUser: 'backup'});

        expect(manifest).toContain(
            ['run_base_ssh_systemctl_cmd:', '  cmd.run:', '    - name: systemctl daemon-reload'].join('\n'),
        );
        expect(manifest).toContain(
            ['run_base_ssh_salt_scripts_setup_sh_script:', '  cmd.script:', '    - name: salt://scripts/setup.sh'].join(
                '\n',
            ),
        );
        expect(manifest).toContain(
            [
                'base_ssh_usr_local_bin_cleanup_all_cronjob:',
                '  cron.present:',
                '    - name: /usr/local/bin/cleanup --all',
                '    - user: backup',
                "    - minute: '*/5'",
                "    - hour: '*'",
                "    - daymonth: '*'",
                "    - month: '*'",
                "    - dayweek: '*'",
            ].join('\n'),
        );
        expect(manifest).toContain(
            [
                'base_ssh_usr_local_bin_rotate_cronjob:',
                '  cron.present:',
                '    - name: /usr/local/bin/rotate',
                '    - user: backup',
                "    - special: '@daily'",
            ].join('\n'),
        );
    });

    it('quotes service names and sysctl values that would load as booleans or numbers', () => {
        const manifest = renderManifest(
            parseBrinefile(src('%rolename', 'app', '%description', 'x', '%sysctl', 'kernel.sysrq=1.10', '%services', 'on')),
        );

        expect(manifest).toContain(
            ['app_kernel_sysrq_sysctl:', '  sysctl.present:', '    - name: kernel.sysrq', "    - value: '1.10'"].join('\n'),
        );
        expect(manifest).toContain(['app_on_svc:', '  service.running:', "    - name: 'on'", '    - enable: True'].join('\n'));
    });

    it('suffixes state IDs that would collide', () => {
        const doc = parseBrinefile(
            src('%rolename', 'app', '%description', 'x', '%commands', 'systemctl restart a', 'systemctl restart b'),
        );
        const [, commands] = generateManifest(doc);

        expect(commands.text.split('\n').filter((line) => line.endsWith(':') && !line.startsWith(' '))).toEqual([
            'run_app_systemctl_cmd:',
            'run_app_systemctl_cmd_2:',
        ]);
    });

    it('refuses items filed under the wrong kind', () => {
        const doc = parseBrinefile(QUEUE);
        const broken = {...doc, packages: [{kind: 'file' as const, target: '/etc/motd', presence: 'present' as const, line: 1}]};

        expect(() => generateManifest(broken)).toThrow(InternalConsistencyError);
    });
});

describe('stanza helpers', () => {
    it('slugifies names for state IDs', () => {
        expect(slugify('queue.mq-service')).toBe('queue_mq_service');
        expect(slugify('/etc//ssh/')).toBe('etc_ssh');
        expect(slugify('***')).toBe('item');
    });

    it('quotes only scalars YAML would misread', () => {
        expect(yamlScalar('/etc/motd')).toBe('/etc/motd');
        expect(yamlScalar('salt://a/b')).toBe('salt://a/b');
        expect(yamlScalar('echo key: value')).toBe("'echo key: value'");
        expect(yamlScalar("it's")).toBe("'it''s'");
        expect(yamlScalar('*')).toBe("'*'");
    });

    it('quotes words and numbers a YAML 1.1 loader would not keep as strings', () => {
        for (const value of ['true', 'yes', 'on', 'Off', 'y', 'null', '~', '1', '1.10', '-3', '1e5', '0x1F', '0o17', '.inf', '.NaN']) {
            expect(yamlScalar(value)).toBe(`'${value}'`);
        }
        expect(yamlScalar('6.6p1-6.3')).toBe('6.6p1-6.3');
        expect(yamlScalar('online')).toBe('online');
    });

    it('keeps handing out fresh suffixes', () => {
        const ids = new StateIdRegistry();
        expect(['a', 'a_2', 'a', 'a'].map((id) => ids.claim(id))).toEqual(['a', 'a_2', 'a_3', 'a_4']);
    });
});
