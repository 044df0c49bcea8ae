// src/schema/config.ts

export interface OwnerConfig {
    /** Default: "root". */
    user?: string;
    /** Default: "root". */
    group?: string;
}

export interface VersionMapConfig {
    /**
     * Environments rendered into versions.map.jinja. Every environment gets
     * the same pinned versions unless maps/versions.json lists per-environment
     * pins under "overrides" (e.g. {"dev": {"web.front.nginx": "1.25.0"}}).
     *
     * Default: ["dev", "devint", "qa", "staging", "prod"]
     */
    environments?: string[];

    /**
     * Grain that selects the environment. Default: "environment".
     */
    grain?: string;

    /**
     * Environment used when the grain is unset. Default: "prod".
     */
    defaultEnvironment?: string;
}

export interface FormatConfig {
    /**
     * Rewrite the Brinefile in canonical form after every successful run.
     * `brine fmt` always formats, regardless of this flag.
     */
    enabled?: boolean;
}

/**
 * Root configuration object, exported from `brine.config.ts`
 * (or .mts/.mjs/.js/.cjs) next to the Brinefile.
 *
 * Every field is optional; a directory without a config file uses
 * the defaults below.
 */
export interface BrineConfig {
    /**
     * Source file name. Default: "Brinefile".
     */
    sourceFile?: string;

    /**
     * Generated manifest. Default: "init.sls".
     */
    manifestFile?: string;

    /**
     * Generated README. Default: "README.md".
     */
    readmeFile?: string;

    /**
     * Placeholder directory for managed file payloads. Default: "files".
     */
    filesDir?: string;

    /**
     * Directory holding the version map. Default: "maps".
     */
    mapsDir?: string;

    /**
     * Owner of managed files, directories and symlinks.
     */
    owner?: OwnerConfig;

    /**
     * User that owns generated cron entries. Default: "root".
     */
    cronUser?: string;

    versionMap?: VersionMapConfig;

    format?: FormatConfig;
}

/**
 * BrineConfig with every default applied.
 */
export interface ResolvedBrineConfig {
    sourceFile: string;
    manifestFile: string;
    readmeFile: string;
    filesDir: string;
    mapsDir: string;
    owner: Required<OwnerConfig>;
    cronUser: string;
    versionMap: Required<VersionMapConfig>;
    format: Required<FormatConfig>;
}

export const DEFAULT_BRINE_CONFIG: ResolvedBrineConfig = {
    sourceFile: 'Brinefile',
    manifestFile: 'init.sls',
    readmeFile: 'README.md',
    filesDir: 'files',
    mapsDir: 'maps',
    owner: {user: 'root', group: 'root'},
    cronUser: 'root',
    versionMap: {
        environments: ['dev', 'devint', 'qa', 'staging', 'prod'],
        grain: 'environment',
        defaultEnvironment: 'prod',
    },
    format: {enabled: false},
};

/**
 * Apply defaults to a (possibly empty) user config.
 */
export function resolveBrineConfig(config: BrineConfig = {}): ResolvedBrineConfig {
    const d = DEFAULT_BRINE_CONFIG;
    return {
        sourceFile: config.sourceFile ?? d.sourceFile,
        manifestFile: config.manifestFile ?? d.manifestFile,
        readmeFile: config.readmeFile ?? d.readmeFile,
        filesDir: config.filesDir ?? d.filesDir,
        mapsDir: config.mapsDir ?? d.mapsDir,
        owner: {
            user: config.owner?.user ?? d.owner.user,
            group: config.owner?.group ?? d.owner.group,
        },
        cronUser: config.cronUser ?? d.cronUser,
        versionMap: {
            environments: config.versionMap?.environments ?? [...d.versionMap.environments],
            grain: config.versionMap?.grain ?? d.versionMap.grain,
            defaultEnvironment: config.versionMap?.defaultEnvironment ?? d.versionMap.defaultEnvironment,
        },
        format: {enabled: config.format?.enabled ?? d.format.enabled},
    };
}
