// src/ast/builder.ts

import type {BrineDocument, DocumentKind} from '../schema';
import {
    ConflictingIdentityError,
    MissingDescriptionError,
    MissingIdentityError,
} from '../util/errors';
import {lexBrinefile, type BrineSection} from './lexer';
import {
    interpretCronjobs,
    interpretDescription,
    interpretExecutables,
    interpretIdentity,
    interpretItems,
    interpretList,
    interpretReadme,
    interpretSymlinks,
    interpretSysctl,
} from './sections';

interface Identity {
    kind: DocumentKind;
    name: string;
}

type DocumentBody = Omit<BrineDocument, 'kind' | 'name' | 'description'>;

function isIdentitySection(section: BrineSection): boolean {
    return section.keyword === 'rolename' || section.keyword === 'elementname';
}

/**
 * Fold lexed sections into a validated BrineDocument.
 *
 * Sections of the same type may repeat; their entries are appended in
 * source order. Fails fast on the first error.
 */
export function buildDocument(sections: BrineSection[]): BrineDocument {
    let identity: Identity | null = null;
    const descriptionParts: string[] = [];
    let descriptionLine: number | undefined;
    const readmeParts: string[] = [];

    const body: DocumentBody = {
        includes: [],
        sysctl: new Map(),
        packages: [],
        files: [],
        directories: [],
        services: [],
        symlinks: [],
        commands: [],
        scripts: [],
        cronjobs: [],
    };

    for (const section of sections) {
        switch (section.keyword) {
            case 'rolename':
            case 'elementname': {
                if (identity) {
                    throw new ConflictingIdentityError(section.keyword, section.line);
                }
                identity = {
                    kind: section.keyword === 'rolename' ? 'role' : 'element',
                    name: interpretIdentity(section),
                };
                break;
            }
            case 'description': {
                descriptionLine ??= section.line;
                const text = interpretDescription(section);
                if (text) descriptionParts.push(text);
                break;
            }
            case 'readme': {
                const text = interpretReadme(section);
                if (text) readmeParts.push(text);
                break;
            }
            case 'includes':
                body.includes.push(...interpretList(section));
                break;
            case 'sysctl':
                interpretSysctl(section, body.sysctl);
                break;
            case 'packages':
                body.packages.push(...interpretItems(section, 'package'));
                break;
            case 'files':
                body.files.push(...interpretItems(section, 'file'));
                break;
            case 'directories':
                body.directories.push(...interpretItems(section, 'directory'));
                break;
            case 'services':
                body.services.push(...interpretItems(section, 'service'));
                break;
            case 'symlinks':
                body.symlinks.push(...interpretSymlinks(section));
                break;
            case 'commands':
                body.commands.push(...interpretExecutables(section));
                break;
            case 'scripts':
                body.scripts.push(...interpretExecutables(section));
                break;
            case 'cronjobs':
                body.cronjobs.push(...interpretCronjobs(section));
                break;
        }
    }

    // Whole-document validation.
    const identitySections = sections.filter(isIdentitySection);
    if (identitySections.length > 1) {
        const second = identitySections[1];
        throw new ConflictingIdentityError(second.keyword, second.line);
    }
    if (!identity) {
        throw new MissingIdentityError();
    }

    const description = descriptionParts.join('\n');
    if (!description.trim()) {
        throw new MissingDescriptionError(descriptionLine);
    }

    return {
        kind: identity.kind,
        name: identity.name,
        description,
        ...(readmeParts.length ? {readme: readmeParts.join('\n\n')} : {}),
        ...body,
    };
}

/**
 * Lex + build in one step.
 */
export function parseBrinefile(text: string): BrineDocument {
    return buildDocument(lexBrinefile(text).sections);
}
