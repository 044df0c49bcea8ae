// src/core/readme.ts

import type {BrineDocument} from '../schema';

/**
 * README.md for a role or element: a header naming it, then the description
 * and the `%readme` text verbatim.
 */
export function renderReadme(doc: BrineDocument): string {
   const label = doc.kind === 'role' ? 'Role' : 'Element';
   const parts = [`# ${doc.name}`, `_${label}_`, doc.description];

   if (doc.readme) {
      parts.push(doc.readme);
   }

   parts.push('_Generated from the Brinefile by brine. Edit the Brinefile and re-run brine instead of this file._');
   return parts.join('\n\n') + '\n';
}
