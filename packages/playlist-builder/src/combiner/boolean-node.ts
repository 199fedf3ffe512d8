/**
 * Boolean expression evaluation over sets of track ids.
 *
 * Operators:
 *   &  intersection
 *   |  union
 *   ~  difference (left-hand side minus right-hand side)
 *   ( ) grouping
 *
 * There is no precedence: operators within one parenthesis level are applied
 * in the order they were scanned, so "A & B | C" is "(A & B) | C".
 * Parenthesize to group differently.
 *
 * Each parenthesis level is a node in an arena; nodes refer to their parent
 * by index.
 */

import type { TagTrackIndex } from '../types';
import { MalformedExpressionError } from '../errors';
import { classifySelector, selectorKey, type Selector } from './selectors';

export type SetOperator = '&' | '|' | '~';

type SetOperation = (a: Set<string>, b: Set<string>) => Set<string>;

const OPERATIONS: Record<SetOperator, SetOperation> = {
  '&': (a, b) => new Set([...a].filter(id => b.has(id))),
  '|': (a, b) => new Set([...a, ...b]),
  '~': (a, b) => new Set([...a].filter(id => !b.has(id)))
};

export function isSetOperator(char: string): char is SetOperator {
  return char === '&' || char === '|' || char === '~';
}

export type SelectorResolver = (selector: Selector) => Set<string>;

interface BooleanNode {
  parent: number | null;
  operators: SetOperator[];
  selectors: Selector[];
  trackSets: Set<string>[];
}

/**
 * Resolves selectors against a tag index. Playlist and BPM / rating
 * selectors are expected to be registered in the index under their literal.
 */
export function createIndexResolver(index: TagTrackIndex): SelectorResolver {
  const idsFor = (key: string): Set<string> => new Set(index.get(key)?.keys() ?? []);

  return (selector) => {
    switch (selector.kind) {
      case 'wildcard': {
        const ids = new Set<string>();
        for (const [tag, tracks] of index) {
          if (!selector.pattern.test(tag)) continue;
          for (const id of tracks.keys()) ids.add(id);
        }
        return ids;
      }
      case 'playlist':
      case 'numeric':
        return idsFor(selector.literal);
      case 'tag':
        return idsFor(selector.tag);
    }
  };
}

export class BooleanExpression {
  private nodes: BooleanNode[] = [];

  constructor(
    readonly expression: string,
    private resolve: SelectorResolver
  ) {}

  /**
   * Scan the expression once, reducing each parenthesis level as it closes
   */
  evaluate(): Set<string> {
    this.nodes = [];
    let current = this.createNode(null);
    let token = '';

    for (const char of this.expression) {
      if (char === '(') {
        current = this.createNode(current);
      } else if (isSetOperator(char)) {
        token = this.flushToken(token, current);
        this.node(current).operators.push(char);
      } else if (char === ')') {
        token = this.flushToken(token, current);
        const parent = this.node(current).parent;
        if (parent === null) {
          throw new MalformedExpressionError('Unbalanced ")"', this.expression);
        }
        const tracks = this.reduce(current);
        this.node(parent).trackSets.push(tracks);
        current = parent;
      } else {
        token += char;
      }
    }
    this.flushToken(token, current);

    if (this.node(current).parent !== null) {
      throw new MalformedExpressionError('Unclosed "("', this.expression);
    }

    return this.reduce(current);
  }

  private createNode(parent: number | null): number {
    this.nodes.push({ parent, operators: [], selectors: [], trackSets: [] });
    return this.nodes.length - 1;
  }

  private node(index: number): BooleanNode {
    const node = this.nodes[index];
    if (!node) {
      throw new MalformedExpressionError(`No expression node at ${index}`, this.expression);
    }
    return node;
  }

  /**
   * Add a trimmed, non-empty literal to the node and reset the buffer
   */
  private flushToken(token: string, index: number): string {
    const literal = token.trim();
    if (literal) {
      this.node(index).selectors.push(classifySelector(literal));
    }
    return '';
  }

  private reduce(index: number): Set<string> {
    const node = this.node(index);
    const operands = node.selectors.length + node.trackSets.length;

    if (node.operators.length + 1 !== operands) {
      throw new MalformedExpressionError(
        `Invalid boolean expression: track sets: ${node.trackSets.length}, ` +
          `tags: [${node.selectors.map(selectorKey).join(', ')}], ` +
          `operators: [${node.operators.join(', ')}]`,
        this.expression
      );
    }

    let operator = node.operators.shift();
    while (operator !== undefined) {
      const left = this.takeOperand(node);
      const right = this.takeOperand(node);
      node.trackSets.unshift(OPERATIONS[operator](left, right));
      operator = node.operators.shift();
    }

    return node.trackSets[0] ?? this.takeOperand(node);
  }

  /**
   * Reduced sets are consumed before pending selectors
   */
  private takeOperand(node: BooleanNode): Set<string> {
    const tracks = node.trackSets.shift();
    if (tracks) return tracks;

    const selector = node.selectors.shift();
    return selector ? this.resolve(selector) : new Set();
  }
}

export function evaluateExpression(expression: string, resolve: SelectorResolver): Set<string> {
  return new BooleanExpression(expression, resolve).evaluate();
}
