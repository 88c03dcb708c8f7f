/**
 * Pattern Compiler
 *
 * Turns path templates into anchored matchers plus a map from variable
 * name to its index in the template split on '/'.
 */

export const VARIABLE_MARKER = ':';

/** One or more letters, digits, hyphens or periods */
export const VARIABLE_SEGMENT = '[a-zA-Z0-9.-]+';

export interface CompiledPattern {
  template: string;
  regex: RegExp;

  /** Variable name -> segment index, counting the empty segment before a leading '/' */
  variables: ReadonlyMap<string, number>;
}

const escapeRegex = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function normalizeTemplate(template: string): string {
  return template.startsWith('/') ? template : `/${template}`;
}

/**
 * Regex source without anchors. Empty segments emit nothing but still count.
 */
function buildSource(template: string): { source: string; variables: Map<string, number> } {
  const variables = new Map<string, number>();
  let source = '';

  template.split('/').forEach((part, index) => {
    if (part.length === 0) {
      return;
    }

    if (part.startsWith(VARIABLE_MARKER)) {
      // Duplicate names: last one wins
      variables.set(part.slice(VARIABLE_MARKER.length), index);
      source += `/${VARIABLE_SEGMENT}`;
    } else {
      source += `/${escapeRegex(part)}`;
    }
  });

  return { source, variables };
}

/**
 * Compile a route template. Matches the whole path.
 */
export function compileTemplate(template: string): CompiledPattern {
  const normalized = normalizeTemplate(template);

  // Root also answers the empty fragment a group leaves behind
  if (normalized === '/') {
    return { template, regex: /^\/?$/, variables: new Map() };
  }

  const { source, variables } = buildSource(normalized);
  return { template, regex: new RegExp(`^${source}$`), variables };
}

/**
 * Compile a group prefix. Matches a leading part of the path that ends
 * at a '/' or at the end of the path.
 */
export function compilePrefix(prefix: string): CompiledPattern {
  const normalized = normalizeTemplate(prefix).replace(/\/+$/, '');
  const { source, variables } = buildSource(normalized);
  return { template: prefix, regex: new RegExp(`^${source}(?=/|$)`), variables };
}
