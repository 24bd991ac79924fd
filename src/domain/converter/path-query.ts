import type { DocumentValue } from '../document.js';
import { isMapping, isSequence } from '../document.js';
import type { DefinitionLocation } from '../errors.js';
import { PathSyntaxError } from '../errors.js';

/**
 * One step of a compiled path.
 *
 * - `field`: key access into a mapping (`a.b`, `a[b]`, `a.'b.c'`)
 * - `index`: position in a sequence (`a[0]`)
 * - `wildcard`: every child of a mapping or sequence (`a.*`, `a[*]`)
 * - `union`: a parenthesised group of alternatives (`(a.b)|(a.c)`)
 */
export type PathNode =
  | { readonly kind: 'field'; readonly name: string }
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'wildcard' }
  | { readonly kind: 'union'; readonly alternatives: readonly PathExpr[] };

export type PathExpr = readonly PathNode[];

const ID_CHAR = /[A-Za-z0-9_@-]/;
const WHITESPACE = /\s/;
const DIGITS = /^\d+$/;

/**
 * Recursive-descent parser for the field path language.
 *
 *   union    := sequence ('|' sequence)*
 *   sequence := '$' ('.' segment)? step* | segment step*
 *   step     := '.' segment | '[' bracket ']'
 *   segment  := '*' | identifier | quoted | '(' union ')'
 *   bracket  := '*' | digits | identifier | quoted
 */
class PathParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly location: DefinitionLocation,
  ) {}

  parse(): PathExpr[] {
    const alternatives = this.parseUnion();
    this.skipWhitespace();
    const rest = this.peek();
    if (rest !== undefined) {
      this.fail(`unexpected character '${rest}'`);
    }
    return alternatives;
  }

  private parseUnion(): PathExpr[] {
    const alternatives = [this.parseSequence()];
    this.skipWhitespace();
    while (this.peek() === '|') {
      this.pos++;
      alternatives.push(this.parseSequence());
      this.skipWhitespace();
    }
    return alternatives;
  }

  private parseSequence(): PathExpr {
    this.skipWhitespace();
    const nodes: PathNode[] = [];

    if (this.peek() === '$') {
      this.pos++;
    } else {
      nodes.push(this.parseSegment());
    }

    for (;;) {
      this.skipWhitespace();
      const c = this.peek();
      if (c === '.') {
        this.pos++;
        nodes.push(this.parseSegment());
      } else if (c === '[') {
        nodes.push(this.parseBracket());
      } else {
        return nodes;
      }
    }
  }

  private parseSegment(): PathNode {
    this.skipWhitespace();
    const c = this.peek();

    if (c === undefined) {
      this.fail('expected a field name but reached the end of the expression');
    }
    if (c === '*') {
      this.pos++;
      return { kind: 'wildcard' };
    }
    if (c === '(') {
      const open = this.pos;
      this.pos++;
      const alternatives = this.parseUnion();
      this.skipWhitespace();
      if (this.peek() !== ')') {
        this.fail(`unbalanced '(' opened at position ${open}`);
      }
      this.pos++;
      return { kind: 'union', alternatives };
    }
    if (c === '"' || c === "'") {
      return { kind: 'field', name: this.parseQuoted() };
    }
    if (ID_CHAR.test(c)) {
      return { kind: 'field', name: this.parseIdentifier() };
    }
    return this.fail(`unexpected character '${c}'`);
  }

  private parseBracket(): PathNode {
    const open = this.pos;
    this.pos++; // '['
    this.skipWhitespace();

    const c = this.peek();
    let node: PathNode;
    if (c === undefined) {
      return this.fail(`unbalanced '[' opened at position ${open}`);
    } else if (c === '*') {
      this.pos++;
      node = { kind: 'wildcard' };
    } else if (c === '"' || c === "'") {
      node = { kind: 'field', name: this.parseQuoted() };
    } else if (ID_CHAR.test(c)) {
      const name = this.parseIdentifier();
      node = DIGITS.test(name)
        ? { kind: 'index', index: Number.parseInt(name, 10) }
        : { kind: 'field', name };
    } else {
      return this.fail(`unexpected character '${c}'`);
    }

    this.skipWhitespace();
    if (this.peek() !== ']') {
      this.fail(`unbalanced '[' opened at position ${open}`);
    }
    this.pos++;
    return node;
  }

  private parseIdentifier(): string {
    const start = this.pos;
    while (this.pos < this.source.length && ID_CHAR.test(this.source.charAt(this.pos))) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  private parseQuoted(): string {
    const start = this.pos;
    const quote = this.source.charAt(this.pos);
    this.pos++;

    let name = '';
    for (;;) {
      const c = this.peek();
      if (c === undefined) {
        this.fail('unterminated quoted field name', start);
      }
      if (c === '\\') {
        const escaped = this.source[this.pos + 1];
        if (escaped === undefined) {
          this.fail('unterminated quoted field name', start);
        }
        name += escaped;
        this.pos += 2;
        continue;
      }
      this.pos++;
      if (c === quote) return name;
      name += c;
    }
  }

  private peek(): string | undefined {
    return this.source[this.pos];
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && WHITESPACE.test(this.source.charAt(this.pos))) {
      this.pos++;
    }
  }

  private fail(reason: string, at: number = this.pos): never {
    throw new PathSyntaxError(this.source, at, reason, this.location);
  }
}

function hasKey(mapping: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(mapping, key);
}

function step(values: readonly DocumentValue[], node: PathNode): DocumentValue[] {
  const out: DocumentValue[] = [];

  for (const value of values) {
    switch (node.kind) {
      case 'field': {
        if (isMapping(value) && hasKey(value, node.name)) {
          const child = value[node.name];
          if (child !== undefined) out.push(child);
        }
        break;
      }
      case 'index': {
        if (isSequence(value)) {
          const child = value[node.index];
          if (child !== undefined) out.push(child);
        }
        break;
      }
      case 'wildcard': {
        if (isSequence(value)) {
          out.push(...value);
        } else if (isMapping(value)) {
          out.push(...Object.values(value));
        }
        break;
      }
      case 'union': {
        for (const alternative of node.alternatives) {
          out.push(...run(alternative, [value]));
        }
        break;
      }
    }
  }

  return out;
}

function run(expr: PathExpr, start: readonly DocumentValue[]): DocumentValue[] {
  let current: DocumentValue[] = [...start];
  for (const node of expr) {
    if (current.length === 0) break;
    current = step(current, node);
  }
  return current;
}

/**
 * Compiled field path query.
 *
 * Built once when the definitions are loaded and evaluated for every
 * notification. A query is the union of its alternatives: results come
 * back in the order the alternatives were declared and, within one
 * alternative, in document order. Nulls are treated as absent.
 */
export class PathQuery {
  private constructor(
    readonly expressions: readonly string[],
    private readonly alternatives: readonly PathExpr[],
  ) {}

  /**
   * Compile one expression or an ordered list of alternatives.
   *
   * @throws PathSyntaxError on the first expression that does not parse.
   */
  static compile(
    expressions: string | readonly string[],
    location: DefinitionLocation = {},
  ): PathQuery {
    const list = typeof expressions === 'string' ? [expressions] : [...expressions];
    if (list.length === 0) {
      throw new PathSyntaxError('', 0, 'no field path given', location);
    }

    const alternatives = list.flatMap((expression) => new PathParser(expression, location).parse());
    return new PathQuery(list, alternatives);
  }

  /** All non-null values the query finds in `document`. */
  evaluate(document: DocumentValue): DocumentValue[] {
    return this.alternatives
      .flatMap((alternative) => run(alternative, [document]))
      .filter((value) => value !== null);
  }

  /** First non-null value, or `undefined` when every alternative misses. */
  first(document: DocumentValue): DocumentValue | undefined {
    for (const alternative of this.alternatives) {
      const hit = run(alternative, [document]).find((value) => value !== null);
      if (hit !== undefined) return hit;
    }
    return undefined;
  }

  toString(): string {
    return this.expressions.length === 1
      ? (this.expressions[0] ?? '')
      : this.expressions.map((expression) => `(${expression})`).join('|');
  }
}
