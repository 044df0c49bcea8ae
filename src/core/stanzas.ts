// src/core/stanzas.ts

/**
 * Salt state documentation linked from each manifest section banner.
 */
export const DOC_URLS = {
   includes: 'https://docs.saltproject.io/en/latest/ref/states/include.html',
   sysctl: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.sysctl.html',
   packages: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.pkg.html',
   files: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.file.html',
   directories: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.file.html',
   symlinks: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.file.html',
   services: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.service.html',
   commands: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.cmd.html',
   scripts: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.cmd.html',
   cronjobs: 'https://docs.saltproject.io/en/latest/ref/states/all/salt.states.cron.html',
} as const;

export type StanzaConcern = keyof typeof DOC_URLS;

export type StanzaParam = [key: string, value: string];

/**
 * Collapse every run of non-alphanumerics to "_" so names and paths can be
 * used inside state IDs.
 */
export function slugify(value: string): string {
   const slug = value.replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
   return slug || 'item';
}

const PLAIN_SCALAR = /^[A-Za-z0-9_/.][A-Za-z0-9_ /.:@%+=,~-]*$/;

// Plain scalars a YAML 1.1 loader (Salt's) turns into booleans or null.
const YAML11_KEYWORD = /^(y|n|yes|no|true|false|on|off|null|~)$/i;

// Ints, floats, hex/octal/binary, sexagesimal, exponents, .inf and .nan.
const YAML11_NUMBER =
   /^([-+]?(\d[\d_]*)?\.?\d[\d_]*([eE][-+]?\d+)?|[-+]?0[xX][\da-fA-F_]+|[-+]?0[oO]?[0-7_]+|[-+]?0[bB][01_]+|[-+]?\d[\d_]*(:[0-5]?\d)+(\.[\d_]*)?|[-+]?\.(inf|Inf|INF)|\.(nan|NaN|NAN))$/;

/**
 * Render a YAML scalar, single-quoting anything a YAML 1.1 loader would not
 * read back as the same string.
 */
export function yamlScalar(value: string): string {
   if (
      PLAIN_SCALAR.test(value) &&
      !/[ :]$/.test(value) &&
      !value.includes(': ') &&
      !YAML11_KEYWORD.test(value) &&
      !YAML11_NUMBER.test(value)
   ) {
      return value;
   }
   return yamlQuote(value);
}

export function yamlQuote(value: string): string {
   return `'${value.replace(/'/g, "''")}'`;
}

/**
 * ##
 * ##  PACKAGES
 * ##    https://...
 */
export function sectionBanner(concern: StanzaConcern): string {
   return ['##', `##  ${concern.toUpperCase()}`, `##    ${DOC_URLS[concern]}`].join('\n');
}

/**
 * One state declaration:
 *
 *   <id>:
 *     <fn>:
 *       - key: value
 */
export function stanza(id: string, fn: string, params: StanzaParam[]): string {
   return [`${id}:`, `  ${fn}:`, ...params.map(([key, value]) => `    - ${key}: ${value}`)].join('\n');
}

/**
 * Hands out state IDs, suffixing repeats with _2, _3, ... in call order so
 * the same document always yields the same IDs.
 */
export class StateIdRegistry {
   private readonly seen = new Map<string, number>();

   claim(id: string): string {
      const count = (this.seen.get(id) ?? 0) + 1;
      this.seen.set(id, count);
      if (count === 1) return id;

      const next = `${id}_${count}`;
      // The suffixed form could itself be a real ID; keep probing.
      return this.seen.has(next) ? this.claim(id) : this.claim(next);
   }
}
