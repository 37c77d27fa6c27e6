import { load, type CheerioAPI, type Cheerio } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

export type QueryResult =
  | { ok: true; matches: ElementHandle[] }
  | { ok: false; error: string };

/**
 * Read-only view of one element of a parsed page. Queries never throw: an
 * absent element is an empty match list, an unusable selector is an error
 * result.
 */
export interface ElementHandle {
  /**
   * Text of the element and its descendants as a browser would lay it out:
   * block elements and `<br>` break lines, source whitespace collapses, blank
   * lines are dropped.
   */
  text(): string;
  /** Text of the element's own child text nodes, whitespace-collapsed. */
  ownText(): string;
  attr(name: string): string | null;
  find(selector: string): QueryResult;
  findByOwnText(predicate: (text: string) => boolean): QueryResult;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt',
  'fieldset', 'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3',
  'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main', 'nav', 'ol', 'p', 'pre',
  'section', 'table', 'tr', 'ul',
]);
const HIDDEN_TAGS = new Set(['script', 'style', 'noscript', 'template']);

function layoutText(nodes: readonly AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data.replace(/\s+/g, ' '));
    } else if (isTag(node)) {
      if (HIDDEN_TAGS.has(node.name)) continue;
      if (node.name === 'br') {
        out.push('\n');
        continue;
      }
      const block = BLOCK_TAGS.has(node.name);
      if (block) out.push('\n');
      layoutText(node.children, out);
      if (block) out.push('\n');
    } else if (hasChildren(node)) {
      layoutText(node.children, out);
    }
  }
}

function renderedText(nodes: readonly AnyNode[]): string {
  const out: string[] = [];
  layoutText(nodes, out);
  return out
    .join('')
    .split('\n')
    .map((line) => line.replace(/ +/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

class CheerioElement implements ElementHandle {
  constructor(
    private readonly $: CheerioAPI,
    private readonly node: Cheerio<AnyNode>
  ) {}

  text(): string {
    return renderedText(this.node.toArray());
  }

  ownText(): string {
    const parts = this.node
      .contents()
      .toArray()
      .filter(isText)
      .map((child) => child.data);
    return collapse(parts.join(' '));
  }

  attr(name: string): string | null {
    return this.node.attr(name) ?? null;
  }

  find(selector: string): QueryResult {
    try {
      return { ok: true, matches: this.wrap(this.node.find(selector)) };
    } catch (error) {
      return {
        ok: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  findByOwnText(predicate: (text: string) => boolean): QueryResult {
    const matches = this.wrap(this.node.find('*')).filter((el) =>
      predicate(el.ownText())
    );
    return { ok: true, matches };
  }

  private wrap(selection: Cheerio<AnyNode>): ElementHandle[] {
    return selection
      .toArray()
      .map((el) => new CheerioElement(this.$, this.$(el)));
  }
}

export interface ParsedPage {
  root: ElementHandle;
  title: string;
  size: number;
  select(selector: string): QueryResult;
}

export function parsePage(html: string): ParsedPage {
  const $ = load(html);
  const root = new CheerioElement($, $.root());
  return {
    root,
    title: $('title').first().text().trim(),
    size: html.length,
    select: (selector) => root.find(selector),
  };
}

/** Parses an HTML fragment and returns its first top-level element. */
export function parseElement(html: string): ElementHandle {
  const $ = load(html, null, false);
  const first = $.root().children().first();
  return new CheerioElement($, first.length ? first : $.root());
}
