/**
 * Template Engine
 *
 * Small template engine with expression interpolation, control flow,
 * partials, and template inheritance.
 *
 * ## Syntax
 *
 * - `{{ book.title }}`, `{{ name | upper }}`, `{{ note | default('none') }}`:
 *   output is HTML-escaped unless the value is SafeHtml or the `safe`
 *   filter is applied.
 * - `{% if cond %}...{% elif other %}...{% else %}...{% endif %}`
 * - `{% for item in items %}...{% else %}(empty){% endfor %}`; inside a
 *   loop `loop.index`, `loop.index1`, `loop.first`, `loop.last` and
 *   `loop.length` are available. Blocks nest freely.
 * - `{% include "partials/flash" %}` (registered partial or file)
 * - `{% raw %}...{% endraw %}` is emitted untouched.
 *
 * ## Template Inheritance
 *
 * A child template starts with `{% extends "layout" %}` and overrides the
 * parent's `{% block name %}...{% endblock %}` sections. `{{ super }}`
 * inside a child block inserts the parent's block content.
 *
 * ```html
 * {% extends "layout" %}
 * {% block title %}Books{% endblock %}
 * {% block content %}<h1>Books</h1>{{ super }}{% endblock %}
 * ```
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SafeHtml, escape } from './html.ts';

export interface TemplateOptions {
  viewsPath?: string;
  extension?: string;
  cache?: boolean;
  maxInheritanceDepth?: number;
  /** Values available to every render; the render context wins on conflicts */
  globals?: TemplateContext;
}

export interface TemplateContext {
  [key: string]: unknown;
}

interface TemplateBlock {
  name: string;
  content: string;
  hasSuper: boolean;
}

interface ParsedTemplate {
  extends: string | null;
  blocks: Map<string, TemplateBlock>;
}

type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'expr'; expression: string }
  | { type: 'if'; branches: Array<{ condition: string | null; body: TemplateNode[] }> }
  | {
      type: 'for';
      item: string;
      index: string | null;
      array: string;
      body: TemplateNode[];
      empty: TemplateNode[];
    };

type Token =
  | { kind: 'text'; value: string }
  | { kind: 'expr'; value: string }
  | { kind: 'tag'; name: string; args: string };

const DEFAULT_OPTIONS: Required<TemplateOptions> = {
  viewsPath: './views',
  extension: '.html',
  cache: true,
  maxInheritanceDepth: 10,
  globals: {},
};

const EXTENDS_REGEX = /\{%\s*extends\s+['"](.+?)['"]\s*%\}/;
const BLOCK_REGEX = /\{%\s*block\s+(\w+)\s*%\}([\s\S]*?)\{%\s*endblock\s*%\}/g;
const INCLUDE_REGEX = /\{%\s*include\s+['"](.+?)['"]\s*%\}/g;
const SUPER_REGEX = /\{\{\s*super\s*\}\}/g;
const TOKEN_REGEX = /\{\{\s*([\s\S]+?)\s*\}\}|\{%\s*([\s\S]+?)\s*%\}/g;

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * Template engine
 */
export class TemplateEngine {
  private options: Required<TemplateOptions>;
  private compiled = new Map<string, TemplateNode[]>();
  private templateCache = new Map<string, string>();
  private partials = new Map<string, string>();
  private layouts = new Map<string, string>();

  constructor(options: TemplateOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Render a template file with inheritance and includes
   */
  async render(name: string, context: TemplateContext = {}): Promise<string> {
    const template = await this.loadTemplate(name);
    return await this.renderStringAsync(template, context);
  }

  /**
   * Render a template string. Only registered layouts and partials are
   * available; nothing is read from disk.
   */
  renderString(template: string, context: TemplateContext = {}): string {
    const expanded = this.expandIncludesSync(template);
    return this.evaluate(this.compile(expanded), this.withGlobals(context));
  }

  /**
   * Render a template string, loading parents and partials from disk
   */
  async renderStringAsync(template: string, context: TemplateContext = {}): Promise<string> {
    const resolved = await this.resolveInheritance(template);
    const expanded = await this.expandIncludes(resolved);
    return this.evaluate(this.compile(expanded), this.withGlobals(context));
  }

  registerPartial(name: string, template: string): void {
    this.partials.set(name, template);
  }

  registerLayout(name: string, template: string): void {
    this.layouts.set(name, template);
  }

  private withGlobals(context: TemplateContext): TemplateContext {
    return { ...this.options.globals, ...context };
  }

  private async loadTemplate(name: string): Promise<string> {
    const path = join(this.options.viewsPath, `${name}${this.options.extension}`);

    const cached = this.options.cache ? this.templateCache.get(path) : undefined;
    if (cached !== undefined) {
      return cached;
    }

    const content = await readFile(path, 'utf8');

    if (this.options.cache) {
      this.templateCache.set(path, content);
    }

    return content;
  }

  // ==========================================================================
  // Inheritance and includes
  // ==========================================================================

  /**
   * Walk up the `extends` chain, carrying the overriding blocks of every
   * descendant, and fill the root layout's blocks with them.
   */
  private async resolveInheritance(
    template: string,
    overrides: Map<string, TemplateBlock> = new Map(),
    depth = 0
  ): Promise<string> {
    if (depth > this.options.maxInheritanceDepth) {
      throw new TemplateError(
        `Maximum template inheritance depth (${this.options.maxInheritanceDepth}) exceeded. ` +
          'Check for circular inheritance.'
      );
    }

    const parsed = this.parseTemplate(template);
    const merged = new Map<string, TemplateBlock>(overrides);

    for (const [name, block] of parsed.blocks) {
      const child = overrides.get(name);
      if (!child) {
        merged.set(name, block);
      } else if (child.hasSuper) {
        merged.set(name, {
          ...child,
          content: child.content.replace(SUPER_REGEX, () => block.content),
          hasSuper: block.hasSuper,
        });
      }
    }

    if (!parsed.extends) {
      return this.processBlocks(template, merged);
    }

    const parentName = parsed.extends;
    const parentTemplate =
      this.layouts.get(parentName) ??
      (await this.loadTemplate(parentName).catch((error: unknown) => {
        throw new TemplateError(`Parent template not found: ${parentName} (${String(error)})`);
      }));

    return await this.resolveInheritance(parentTemplate, merged, depth + 1);
  }

  private parseTemplate(template: string): ParsedTemplate {
    const extendsMatch = template.match(EXTENDS_REGEX);
    const content = template.replace(EXTENDS_REGEX, '');

    const blocks = new Map<string, TemplateBlock>();
    for (const match of content.matchAll(BLOCK_REGEX)) {
      const [, name, body] = match;
      blocks.set(name, {
        name,
        content: body.trim(),
        hasSuper: /\{\{\s*super\s*\}\}/.test(body),
      });
    }

    return {
      extends: extendsMatch ? extendsMatch[1] : null,
      blocks,
    };
  }

  /**
   * Replace block tags with resolved content (or their defaults)
   */
  private processBlocks(template: string, resolvedBlocks: Map<string, TemplateBlock>): string {
    return template
      .replace(EXTENDS_REGEX, '')
      .replace(BLOCK_REGEX, (_match, name: string, defaultContent: string) => {
        return resolvedBlocks.get(name)?.content ?? defaultContent.trim();
      });
  }

  private async expandIncludes(template: string, depth = 0): Promise<string> {
    if (depth > this.options.maxInheritanceDepth) {
      throw new TemplateError('Maximum include depth exceeded. Check for recursive includes.');
    }

    const names = [...new Set([...template.matchAll(INCLUDE_REGEX)].map((m) => m[1]))];
    if (names.length === 0) return template;

    const sources = new Map<string, string>();
    for (const name of names) {
      const source =
        this.partials.get(name) ??
        (await this.loadTemplate(name).catch((error: unknown) => {
          throw new TemplateError(`Partial not found: ${name} (${String(error)})`);
        }));
      sources.set(name, await this.expandIncludes(source, depth + 1));
    }

    return template.replace(INCLUDE_REGEX, (_match, name: string) => sources.get(name) ?? '');
  }

  private expandIncludesSync(template: string, depth = 0): string {
    if (depth > this.options.maxInheritanceDepth) {
      throw new TemplateError('Maximum include depth exceeded. Check for recursive includes.');
    }

    return template.replace(INCLUDE_REGEX, (_match, name: string) => {
      const partial = this.partials.get(name);
      if (partial === undefined) {
        throw new TemplateError(`Partial not found: ${name}`);
      }
      return this.expandIncludesSync(partial, depth + 1);
    });
  }

  // ==========================================================================
  // Compilation
  // ==========================================================================

  private compile(template: string): TemplateNode[] {
    const cached = this.options.cache ? this.compiled.get(template) : undefined;
    if (cached) return cached;

    const tokens = this.tokenize(template);
    const parser = new Parser(tokens);
    const nodes = parser.parseDocument();

    if (this.options.cache) {
      this.compiled.set(template, nodes);
    }
    return nodes;
  }

  private tokenize(template: string): Token[] {
    const tokens: Token[] = [];
    let lastIndex = 0;
    const regex = new RegExp(TOKEN_REGEX.source, 'g');
    let match: RegExpExecArray | null;

    while ((match = regex.exec(template)) !== null) {
      if (match.index > lastIndex) {
        tokens.push({ kind: 'text', value: template.slice(lastIndex, match.index) });
      }
      lastIndex = regex.lastIndex;

      if (match[1] !== undefined) {
        tokens.push({ kind: 'expr', value: match[1] });
        continue;
      }

      const tag = /^(\w+)\s*([\s\S]*)$/.exec(match[2]);
      if (!tag) {
        throw new TemplateError(`Malformed tag: {% ${match[2]} %}`);
      }

      if (tag[1] === 'raw') {
        const end = /\{%\s*endraw\s*%\}/g;
        end.lastIndex = lastIndex;
        const endMatch = end.exec(template);
        if (!endMatch) {
          throw new TemplateError('Unclosed {% raw %} block');
        }
        tokens.push({ kind: 'text', value: template.slice(lastIndex, endMatch.index) });
        lastIndex = end.lastIndex;
        regex.lastIndex = lastIndex;
        continue;
      }

      tokens.push({ kind: 'tag', name: tag[1], args: tag[2].trim() });
    }

    if (lastIndex < template.length) {
      tokens.push({ kind: 'text', value: template.slice(lastIndex) });
    }

    return tokens;
  }

  // ==========================================================================
  // Evaluation
  // ==========================================================================

  private evaluate(nodes: TemplateNode[], context: TemplateContext): string {
    let result = '';

    for (const node of nodes) {
      switch (node.type) {
        case 'text':
          result += node.value;
          break;
        case 'expr': {
          const value = this.evaluateExpression(node.expression, context);
          result += isSafeExpression(node.expression) ? String(value ?? '') : escape(value);
          break;
        }
        case 'if': {
          const branch = node.branches.find(
            (b) => b.condition === null || this.evaluateCondition(b.condition, context)
          );
          if (branch) {
            result += this.evaluate(branch.body, context);
          }
          break;
        }
        case 'for':
          result += this.evaluateLoop(node, context);
          break;
      }
    }

    return result;
  }

  private evaluateLoop(
    node: Extract<TemplateNode, { type: 'for' }>,
    context: TemplateContext
  ): string {
    const array = this.evaluateExpression(node.array, context);
    if (!Array.isArray(array) || array.length === 0) {
      return this.evaluate(node.empty, context);
    }

    return array
      .map((item: unknown, idx: number) => {
        const loopContext: TemplateContext = {
          ...context,
          [node.item]: item,
          loop: {
            index: idx,
            index1: idx + 1,
            first: idx === 0,
            last: idx === array.length - 1,
            length: array.length,
          },
        };

        if (node.index) {
          loopContext[node.index] = idx;
        }

        return this.evaluate(node.body, loopContext);
      })
      .join('');
  }

  /**
   * Evaluate a condition: `or`, then `and`, then `not`, then comparisons,
   * then truthiness (empty arrays and empty strings are false).
   */
  private evaluateCondition(condition: string, context: TemplateContext): boolean {
    const trimmed = condition.trim();

    if (/\s+or\s+/.test(trimmed)) {
      return trimmed.split(/\s+or\s+/).some((p) => this.evaluateCondition(p, context));
    }

    if (/\s+and\s+/.test(trimmed)) {
      return trimmed.split(/\s+and\s+/).every((p) => this.evaluateCondition(p, context));
    }

    if (trimmed.startsWith('not ')) {
      return !this.evaluateCondition(trimmed.slice(4), context);
    }

    const match = trimmed.match(/^(.+?)\s*(==|!=|>=|<=|>|<)\s*(.+)$/);
    if (match) {
      const [, left, operator, right] = match;
      const leftValue = this.evaluateExpression(left.trim(), context);
      const rightValue = this.evaluateExpression(right.trim(), context);

      switch (operator) {
        case '==':
          return looseEquals(leftValue, rightValue);
        case '!=':
          return !looseEquals(leftValue, rightValue);
        case '>':
          return Number(leftValue) > Number(rightValue);
        case '<':
          return Number(leftValue) < Number(rightValue);
        case '>=':
          return Number(leftValue) >= Number(rightValue);
        case '<=':
          return Number(leftValue) <= Number(rightValue);
      }
    }

    const value = this.evaluateExpression(trimmed, context);
    return Array.isArray(value) ? value.length > 0 : Boolean(value);
  }

  /**
   * Evaluate `operand | filter | filter(args)`
   */
  private evaluateExpression(expression: string, context: TemplateContext): unknown {
    const [head, ...filters] = splitFilters(expression);

    let value = this.evaluateOperand(head, context);
    for (const filter of filters) {
      value = this.applyFilter(value, filter);
    }

    return value;
  }

  /**
   * A literal (string, number, boolean, null) or a dotted variable path
   */
  private evaluateOperand(value: string, context: TemplateContext): unknown {
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      return value.slice(1, -1);
    }

    if (/^-?\d+(\.\d+)?$/.test(value)) {
      return parseFloat(value);
    }

    if (value === 'true') return true;
    if (value === 'false') return false;
    if (value === 'null' || value === 'none') return null;

    return getValueByPath(context, value);
  }

  private applyFilter(value: unknown, filter: string): unknown {
    const filterMatch = filter.match(/^(\w+)(?:\((.*)\))?$/);
    if (!filterMatch) return value;

    const [, filterName, argsStr] = filterMatch;
    const args = argsStr ? parseFilterArgs(argsStr) : [];

    switch (filterName) {
      case 'upper':
        return String(value ?? '').toUpperCase();
      case 'lower':
        return String(value ?? '').toLowerCase();
      case 'capitalize': {
        const str = String(value ?? '');
        return str.charAt(0).toUpperCase() + str.slice(1).toLowerCase();
      }
      case 'title':
        return String(value ?? '').replace(/\b\w/g, (c) => c.toUpperCase());
      case 'trim':
        return String(value ?? '').trim();
      case 'truncate': {
        const length = Number(args[0]) || 50;
        const ending = args[1] ?? '...';
        const str = String(value ?? '');
        return str.length > length ? str.slice(0, length - ending.length) + ending : str;
      }
      case 'join':
        return Array.isArray(value) ? value.join(args[0] ?? ', ') : String(value ?? '');
      case 'length':
        return Array.isArray(value) ? value.length : String(value ?? '').length;
      case 'int':
        return parseInt(String(value), 10);
      case 'string':
        return String(value ?? '');
      case 'default':
        return value === undefined || value === null || value === '' ? (args[0] ?? '') : value;
      case 'safe':
        return value;
      case 'escape':
        return new SafeHtml(escape(value));
      case 'urlencode':
        return encodeURIComponent(String(value ?? ''));
      default:
        throw new TemplateError(`Unknown filter: ${filterName}`);
    }
  }
}

/**
 * Recursive-descent parser over the token stream
 */
class Parser {
  private pos = 0;

  constructor(private tokens: Token[]) {}

  parseDocument(): TemplateNode[] {
    const { nodes, stop } = this.parseUntil([]);
    if (stop) {
      throw new TemplateError(`Unexpected {% ${stop.name} %}`);
    }
    return nodes;
  }

  /**
   * Parse nodes until one of the `stops` tags (returned, consumed) or EOF
   */
  private parseUntil(stops: string[]): { nodes: TemplateNode[]; stop: Extract<Token, { kind: 'tag' }> | null } {
    const nodes: TemplateNode[] = [];

    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos++];

      if (token.kind === 'text') {
        nodes.push({ type: 'text', value: token.value });
      } else if (token.kind === 'expr') {
        nodes.push({ type: 'expr', expression: token.value });
      } else if (stops.includes(token.name)) {
        return { nodes, stop: token };
      } else if (token.name === 'if') {
        nodes.push(this.parseIf(token.args));
      } else if (token.name === 'for') {
        nodes.push(this.parseFor(token.args));
      } else {
        throw new TemplateError(`Unexpected {% ${token.name} %}`);
      }
    }

    return { nodes, stop: null };
  }

  private parseIf(condition: string): TemplateNode {
    const branches: Array<{ condition: string | null; body: TemplateNode[] }> = [];
    let current: string | null = condition;

    for (;;) {
      const { nodes, stop } = this.parseUntil(['elif', 'else', 'endif']);
      if (!stop) {
        throw new TemplateError(`Unclosed {% if ${condition} %}`);
      }
      branches.push({ condition: current, body: nodes });

      if (stop.name === 'endif') break;

      if (current === null) {
        throw new TemplateError(`{% ${stop.name} %} after {% else %}`);
      }

      if (stop.name === 'elif') {
        current = stop.args;
      } else if (stop.args.startsWith('if ')) {
        current = stop.args.slice(3).trim();
      } else {
        current = null;
      }
    }

    return { type: 'if', branches };
  }

  private parseFor(args: string): TemplateNode {
    const header = args.match(/^(\w+)(?:\s*,\s*(\w+))?\s+in\s+(.+)$/);
    if (!header) {
      throw new TemplateError(`Malformed {% for ${args} %}`);
    }
    const [, item, index, array] = header;

    const body = this.parseUntil(['else', 'endfor']);
    if (!body.stop) {
      throw new TemplateError(`Unclosed {% for ${args} %}`);
    }

    let empty: TemplateNode[] = [];
    if (body.stop.name === 'else') {
      const rest = this.parseUntil(['endfor']);
      if (!rest.stop) {
        throw new TemplateError(`Unclosed {% for ${args} %}`);
      }
      empty = rest.nodes;
    }

    return { type: 'for', item, index: index ?? null, array: array.trim(), body: body.nodes, empty };
  }
}

function isSafeExpression(expression: string): boolean {
  return splitFilters(expression).slice(1).includes('safe');
}

/**
 * Split on `|` outside of quotes and parentheses
 */
function splitFilters(expression: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;
  let depth = 0;

  for (const char of expression) {
    if (quote) {
      if (char === quote) quote = null;
      current += char;
    } else if (char === '"' || char === "'") {
      quote = char;
      current += char;
    } else if (char === '(') {
      depth++;
      current += char;
    } else if (char === ')') {
      depth--;
      current += char;
    } else if (char === '|' && depth === 0) {
      parts.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  parts.push(current.trim());
  return parts;
}

function parseFilterArgs(argsStr: string): string[] {
  const args: string[] = [];
  let current = '';
  let inString = false;
  let stringChar = '';

  for (const char of argsStr) {
    if (inString) {
      if (char === stringChar) {
        inString = false;
        args.push(current);
        current = '';
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      inString = true;
      stringChar = char;
    } else if (char === ',') {
      if (current.trim()) {
        args.push(current.trim());
      }
      current = '';
    } else {
      current += char;
    }
  }

  if (current.trim()) {
    args.push(current.trim());
  }

  return args;
}

function getValueByPath(obj: TemplateContext, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split('.')) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, part);
  }

  return current;
}

function looseEquals(left: unknown, right: unknown): boolean {
  if (typeof left === 'number' || typeof right === 'number') {
    return Number(left) === Number(right);
  }
  return String(left ?? '') === String(right ?? '') && (left === null) === (right === null);
}
