/**
 * Operands of a combiner expression.
 *
 * A literal token is classified once, when the scanner flushes it:
 * - contains "*"         -> wildcard over tag names
 * - wrapped in { }       -> tracks of an existing playlist
 * - wrapped in [ ]       -> BPM / rating selector resolved by the prescanner
 * - anything else        -> plain tag
 */

export type Selector =
  | { kind: 'tag'; tag: string }
  | { kind: 'wildcard'; pattern: RegExp; literal: string }
  | { kind: 'playlist'; name: string; literal: string }
  | { kind: 'numeric'; literal: string };

const REGEX_SPECIAL = /[.+?^${}()|[\]\\]/g;

export function wildcardPattern(literal: string): RegExp {
  return new RegExp(
    literal
      .split('*')
      .map(part => part.replace(REGEX_SPECIAL, '\\$&'))
      .join('.*')
  );
}

export function classifySelector(token: string): Selector {
  if (token.includes('*')) {
    return { kind: 'wildcard', pattern: wildcardPattern(token), literal: token };
  }
  if (token.startsWith('{') && token.endsWith('}')) {
    return { kind: 'playlist', name: token.slice(1, -1), literal: token };
  }
  if (token.startsWith('[') && token.endsWith(']')) {
    return { kind: 'numeric', literal: token };
  }
  return { kind: 'tag', tag: token };
}

/**
 * Key under which a selector's tracks are registered in the tag index
 */
export function selectorKey(selector: Selector): string {
  return selector.kind === 'tag' ? selector.tag : selector.literal;
}

/**
 * Key under which a playlist selector is registered, e.g. "{My Favorites}"
 */
export function playlistSelectorKey(name: string): string {
  return `{${name}}`;
}
