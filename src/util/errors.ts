// src/util/errors.ts

/**
 * Brine error hierarchy.
 *
 *   BrineError (base)
 *   ├── ParseError (lexer + section interpreters)
 *   │   ├── UnknownSectionError
 *   │   ├── InvalidModifierCombinationError
 *   │   ├── InvalidModeError
 *   │   ├── MalformedSymlinkError
 *   │   ├── MalformedSysctlError
 *   │   ├── MalformedCronjobError
 *   │   ├── EmptyIdentitySectionError
 *   │   ├── InvalidIdentityError
 *   │   └── ConflictingIdentityError
 *   ├── ValidationError (document builder)
 *   │   ├── MissingIdentityError
 *   │   └── MissingDescriptionError
 *   ├── IoError (artifact planning / config)
 *   │   ├── SourceNotFoundError
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   └── CorruptVersionMapError
 *   └── InternalConsistencyError
 */

export interface BrineErrorOptions {
    /** Section keyword the error belongs to, without the leading "%". */
    section?: string;
    /** 1-based source line. */
    line?: number;
    /** How to fix the error, printed by the CLI. */
    suggestion?: string;
    cause?: unknown;
}

export class BrineError extends Error {
    readonly code: string;
    readonly section?: string;
    readonly line?: number;
    readonly suggestion?: string;

    constructor(message: string, code: string, options: BrineErrorOptions = {}) {
        super(message, {cause: options.cause});
        this.name = 'BrineError';
        this.code = code;
        this.section = options.section;
        this.line = options.line;
        this.suggestion = options.suggestion;
    }

    /**
     * Location prefix such as "%packages (line 12)".
     */
    get location(): string | undefined {
        if (this.section && this.line) return `%${this.section} (line ${this.line})`;
        if (this.section) return `%${this.section}`;
        if (this.line) return `line ${this.line}`;
        return undefined;
    }

    toCliOutput(): string {
        const where = this.location;
        const lines = [`Error: ${where ? `${where}: ` : ''}${this.message}`];
        if (this.suggestion) {
            lines.push(`  Suggestion: ${this.suggestion}`);
        }
        return lines.join('\n');
    }
}

// ---------------------------------------------------------------------------
// Parse errors
// ---------------------------------------------------------------------------

export class ParseError extends BrineError {
    constructor(message: string, code: string, options: BrineErrorOptions = {}) {
        super(message, code, options);
        this.name = 'ParseError';
    }
}

export class UnknownSectionError extends ParseError {
    readonly keyword: string;

    constructor(keyword: string, line: number) {
        super(`Unknown section "%${keyword}".`, 'UNKNOWN_SECTION', {
            line,
            suggestion: 'Check the spelling of the section marker.',
        });
        this.name = 'UnknownSectionError';
        this.keyword = keyword;
    }
}

export class InvalidModifierCombinationError extends ParseError {
    constructor(message: string, section: string, line: number) {
        super(message, 'INVALID_MODIFIER_COMBINATION', {
            section,
            line,
            suggestion: 'Use "-name" to remove an item, or "name=value" to pin it, not both.',
        });
        this.name = 'InvalidModifierCombinationError';
    }
}

export class InvalidModeError extends ParseError {
    constructor(mode: string, section: string, line: number) {
        super(`"${mode}" is not an octal file mode.`, 'INVALID_MODE', {
            section,
            line,
            suggestion: 'Use three or four octal digits, e.g. "/etc/motd=0644".',
        });
        this.name = 'InvalidModeError';
    }
}

export class MalformedSymlinkError extends ParseError {
    constructor(text: string, line: number) {
        super(`"${text}" is not a symlink declaration.`, 'MALFORMED_SYMLINK', {
            section: 'symlinks',
            line,
            suggestion: 'Use "linkname->targetname" to point your link to its target.',
        });
        this.name = 'MalformedSymlinkError';
    }
}

export class MalformedSysctlError extends ParseError {
    constructor(text: string, line: number, removal = false) {
        super(removal ? `"${text}" tries to remove a sysctl setting.` : `"${text}" does not have a value.`, 'MALFORMED_SYSCTL', {
            section: 'sysctl',
            line,
            suggestion: removal
                ? 'sysctl has no removal form; set the value you want instead.'
                : 'Use "setting=value".',
        });
        this.name = 'MalformedSysctlError';
    }
}

export class MalformedCronjobError extends ParseError {
    constructor(text: string, line: number) {
        super(`"${text}" is not a crontab line.`, 'MALFORMED_CRONJOB', {
            section: 'cronjobs',
            line,
            suggestion: 'Use "minute hour day month weekday command" or "@daily command".',
        });
        this.name = 'MalformedCronjobError';
    }
}

export class EmptyIdentitySectionError extends ParseError {
    constructor(section: string, line: number) {
        super('Section has no name.', 'EMPTY_IDENTITY_SECTION', {section, line});
        this.name = 'EmptyIdentitySectionError';
    }
}

export class InvalidIdentityError extends ParseError {
    constructor(message: string, section: string, line: number) {
        super(message, 'INVALID_IDENTITY', {
            section,
            line,
            suggestion: 'Use a single dotted name such as "queue.mq-service".',
        });
        this.name = 'InvalidIdentityError';
    }
}

export class ConflictingIdentityError extends ParseError {
    constructor(section: string, line: number) {
        super('A Brinefile declares exactly one %rolename or %elementname.', 'CONFLICTING_IDENTITY', {
            section,
            line,
        });
        this.name = 'ConflictingIdentityError';
    }
}

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

export class ValidationError extends BrineError {
    constructor(message: string, code: string, options: BrineErrorOptions = {}) {
        super(message, code, options);
        this.name = 'ValidationError';
    }
}

export class MissingIdentityError extends ValidationError {
    constructor() {
        super('Brinefile is missing required section. Choose one of: %rolename, %elementname', 'MISSING_IDENTITY');
        this.name = 'MissingIdentityError';
    }
}

export class MissingDescriptionError extends ValidationError {
    constructor(line?: number) {
        super('Brinefile is missing required section %description', 'MISSING_DESCRIPTION', {
            section: 'description',
            line,
        });
        this.name = 'MissingDescriptionError';
    }
}

// ---------------------------------------------------------------------------
// I/O errors
// ---------------------------------------------------------------------------

export class IoError extends BrineError {
    constructor(message: string, code: string, options: BrineErrorOptions = {}) {
        super(message, code, options);
        this.name = 'IoError';
    }
}

export class SourceNotFoundError extends IoError {
    constructor(sourcePath: string) {
        super(`Brinefile not found: ${sourcePath}`, 'SOURCE_NOT_FOUND', {
            suggestion: 'Run "brine init" to create one, or pass --file.',
        });
        this.name = 'SourceNotFoundError';
    }
}

export class ConfigNotFoundError extends IoError {
    constructor(configPath: string) {
        super(`Config file not found: ${configPath}`, 'CONFIG_NOT_FOUND');
        this.name = 'ConfigNotFoundError';
    }
}

export class InvalidConfigError extends IoError {
    constructor(configPath: string, problem: string) {
        super(`Invalid config ${configPath}: ${problem}`, 'INVALID_CONFIG');
        this.name = 'InvalidConfigError';
    }
}

export class CorruptVersionMapError extends IoError {
    constructor(filePath: string, cause?: unknown) {
        super(`Version map ${filePath} is not a valid version map.`, 'CORRUPT_VERSION_MAP', {
            suggestion: 'Fix or remove the file; brine will not overwrite entries it cannot read.',
            cause,
        });
        this.name = 'CorruptVersionMapError';
    }
}

// ---------------------------------------------------------------------------

export class InternalConsistencyError extends BrineError {
    constructor(message: string) {
        super(message, 'INTERNAL_CONSISTENCY');
        this.name = 'InternalConsistencyError';
    }
}
