import { MarkupError } from "./errors";
import { attrsToString, escapeHtml } from "./html";
import {
  containerKey,
  type Alignment,
  type Attributes,
  type Container,
  type ContainerEnd,
  type IrEvent,
  type OrderedListNumbering,
} from "./ir";
import { Peekable } from "./span";
import { createLogger } from "./utils/logger";

const logger = createLogger({ file: "writer" });

const BLOCK_OTHER_TAGS = new Set(["caption", "figure", "figcaption"]);

const NUMBERING_TYPES: Record<OrderedListNumbering, string | null> = {
  decimal: null,
  "alpha-lower": "a",
  "alpha-upper": "A",
  "roman-lower": "i",
  "roman-upper": "I",
};

const ALIGN_STYLES: Record<Alignment, string | null> = {
  unspecified: null,
  left: "text-align: left;",
  center: "text-align: center;",
  right: "text-align: right;",
};

type Footnote = { number: number; html: string; defined: boolean };

export type SplitHtml = { summary: string; rest: string };

export type WriteOptions = {
  /** Text of the paragraph that separates the summary from the rest. */
  moreMarker?: string | null;
};

/**
 * Stateful IR to HTML writer for one document. Holds the list tightness
 * stack, the table head/body mode and the footnote registry, and redirects
 * output into per-footnote buffers while a definition is open.
 */
export class HtmlWriter {
  private main = "";
  private target: string | null = null;
  private readonly footnotes = new Map<string, Footnote>();
  private readonly tightness: boolean[] = [];
  private readonly openContainers: string[] = [];
  private tableMode: "head" | "body" | null = null;
  private splitAt: number | null = null;

  write(event: IrEvent): void {
    switch (event.type) {
      case "start":
        this.startContainer(event.container, event.attributes.clone());
        this.openContainers.push(containerKey(event.container));
        break;
      case "end":
        this.checkEnd(event.container);
        this.endContainer(event.container);
        break;
      case "str":
        this.out(escapeHtml(event.text));
        break;
      case "image": {
        const attrs = event.attributes.clone().set("alt", event.alt).set("src", event.destination);
        this.out(`<img${attrsToString(attrs)}>`);
        break;
      }
      case "code-block":
        this.newline();
        this.out(`<pre${attrsToString(event.attributes)}><code>${escapeHtml(event.code)}</code></pre>\n`);
        break;
      case "math": {
        const cls = event.kind === "display" ? "math display" : "math";
        const attrs = event.attributes.clone().set("class", cls);
        this.out(`<span${attrsToString(attrs)}>${escapeHtml(event.source)}</span>`);
        break;
      }
      case "html-inline":
        if (event.attributes.isEmpty()) {
          this.out(event.content);
        } else {
          this.out(`<span${attrsToString(event.attributes)}>${event.content}</span>`);
        }
        break;
      case "html-block":
        this.newline();
        if (event.attributes.isEmpty()) {
          this.out(event.content);
          this.newline();
        } else {
          this.out(`<div${attrsToString(event.attributes)}>${event.content}</div>\n`);
        }
        break;
      case "tag":
        this.newline();
        this.out(`<${event.tag}${attrsToString(event.attributes)}>\n`);
        break;
      case "footnote-reference": {
        const n = this.footnote(event.label).number;
        this.out(`<sup class="footnote-reference"><a role="doc-noteref" href="#fn-${n}">${n}</a></sup>`);
        break;
      }
    }
  }

  /** Marks the current end of the main output as the summary boundary. */
  markSplit(): void {
    if (this.target === null && this.splitAt === null) this.splitAt = this.main.length;
  }

  /** True when only sections are open, so a split leaves no element torn. */
  atTopLevel(): boolean {
    return this.target === null && this.openContainers.every((key) => key === "section");
  }

  /** Main output written so far, without the footnote section. */
  body(): string {
    this.checkClosed();
    return this.main;
  }

  finish(): SplitHtml {
    this.checkClosed();
    this.target = null;
    if (this.footnotes.size > 0) {
      this.newline();
      this.out('<hr>\n<aside class="footnotes" role="doc-endnotes">\n<ol>\n');
      const sorted = [...this.footnotes.entries()].sort((a, b) => a[1].number - b[1].number);
      for (const [label, fn] of sorted) {
        if (fn.defined) {
          this.out(fn.html);
        } else {
          logger.warn(`footnote [^${label}] is referenced but never defined`);
          this.out(`<li class="footnote-definition" id="fn-${fn.number}" role="doc-footnote"></li>\n`);
        }
      }
      this.out("</ol>\n</aside>\n");
    }
    if (this.splitAt === null) return { summary: this.main, rest: "" };
    return { summary: this.main.slice(0, this.splitAt), rest: this.main.slice(this.splitAt) };
  }

  private footnote(label: string): Footnote {
    let fn = this.footnotes.get(label);
    if (!fn) {
      fn = { number: this.footnotes.size + 1, html: "", defined: false };
      this.footnotes.set(label, fn);
    }
    return fn;
  }

  private buffer(): string {
    if (this.target === null) return this.main;
    const fn = this.footnotes.get(this.target);
    if (!fn) throw new MarkupError(`footnote [^${this.target}] was never registered`, this.target);
    return fn.html;
  }

  private out(text: string): void {
    if (this.target === null) {
      this.main += text;
      return;
    }
    const fn = this.footnotes.get(this.target);
    if (!fn) throw new MarkupError(`footnote [^${this.target}] was never registered`, this.target);
    fn.html += text;
  }

  private newline(): void {
    const buf = this.buffer();
    if (buf.length > 0 && !buf.endsWith("\n")) this.out("\n");
  }

  private tight(): boolean {
    return this.tightness.length > 0 && this.tightness[this.tightness.length - 1];
  }

  private block(tag: string, attrs: Attributes): void {
    this.newline();
    this.out(`<${tag}${attrsToString(attrs)}>`);
  }

  private closeBlock(tag: string): void {
    this.newline();
    this.out(`</${tag}>\n`);
  }

  private cellTag(head: boolean): string {
    return head || this.tableMode === "head" ? "th" : "td";
  }

  private startContainer(container: Container, attrs: Attributes): void {
    switch (container.type) {
      case "blockquote":
        this.block("blockquote", attrs);
        break;
      case "description-list":
        this.block("dl", attrs);
        break;
      case "description-term":
        this.block("dt", attrs);
        break;
      case "description-details":
        this.block("dd", attrs);
        break;
      case "section":
        if (container.id !== "") attrs.set("id", container.id);
        this.block("section", attrs);
        break;
      case "heading": {
        const parent = this.openContainers[this.openContainers.length - 1];
        if (parent !== "section" && container.id !== "") attrs.set("id", container.id);
        this.block(`h${container.level}`, attrs);
        this.out(`<a href="#${escapeHtml(container.id)}">`);
        break;
      }
      case "div":
        this.block("div", attrs);
        break;
      case "paragraph":
        if (!this.tight()) this.block("p", attrs);
        break;
      case "link":
        attrs.set("href", container.destination);
        this.out(`<a${attrsToString(attrs)}>`);
        break;
      case "list": {
        this.tightness.push(container.tight);
        const kind = container.kind;
        if (kind.type === "ordered") {
          const type = NUMBERING_TYPES[kind.numbering];
          if (type !== null) attrs.set("type", type);
          if (kind.start !== 1) attrs.set("start", String(kind.start));
          this.block("ol", attrs);
        } else {
          if (kind.type === "task") attrs.set("class", "task-list");
          this.block("ul", attrs);
        }
        break;
      }
      case "list-item":
        this.block("li", attrs);
        break;
      case "task-list-item":
        attrs.set("class", container.checked ? "checked" : "unchecked");
        attrs.set("data-checked", container.checked ? "true" : "false");
        this.block("li", attrs);
        break;
      case "table":
        this.block("table", attrs);
        break;
      case "table-head":
        this.tableMode = "head";
        this.block("thead", attrs);
        break;
      case "table-body":
        this.tableMode = "body";
        this.block("tbody", attrs);
        break;
      case "table-row":
        this.block("tr", attrs);
        break;
      case "table-cell": {
        const style = ALIGN_STYLES[container.alignment];
        if (style !== null) attrs.set("style", style);
        this.block(this.cellTag(container.head), attrs);
        break;
      }
      case "footnote": {
        const fn = this.footnote(container.label);
        if (fn.defined) {
          logger.warn(`footnote [^${container.label}] is defined more than once`);
        }
        fn.defined = true;
        this.target = container.label;
        attrs.set("class", "footnote-definition");
        attrs.set("id", `fn-${fn.number}`);
        attrs.set("role", "doc-footnote");
        this.block("li", attrs);
        break;
      }
      case "other":
        if (BLOCK_OTHER_TAGS.has(container.tag)) {
          this.block(container.tag, attrs);
        } else {
          this.out(`<${container.tag}${attrsToString(attrs)}>`);
        }
        break;
    }
  }

  private checkClosed(): void {
    if (this.openContainers.length > 0) {
      throw new MarkupError(`unclosed container: ${this.openContainers[this.openContainers.length - 1]}`);
    }
  }

  private checkEnd(container: ContainerEnd): void {
    const key = containerKey(container);
    const top = this.openContainers.pop();
    if (top !== key) {
      throw new MarkupError(`end of ${key} does not close the innermost container (${top ?? "none"})`);
    }
  }

  private endContainer(container: ContainerEnd): void {
    switch (container.type) {
      case "blockquote":
        this.closeBlock("blockquote");
        break;
      case "description-list":
        this.closeBlock("dl");
        break;
      case "description-term":
        this.out("</dt>\n");
        break;
      case "description-details":
        this.closeBlock("dd");
        break;
      case "section":
        this.closeBlock("section");
        break;
      case "heading":
        this.out(`</a></h${container.level}>\n`);
        break;
      case "div":
        this.closeBlock("div");
        break;
      case "paragraph":
        if (!this.tight()) this.out("</p>\n");
        break;
      case "link":
        this.out("</a>");
        break;
      case "list":
        if (this.tightness.pop() === undefined) throw new MarkupError("list end without an open list");
        this.closeBlock(container.kind.type === "ordered" ? "ol" : "ul");
        break;
      case "list-item":
      case "task-list-item":
        this.out("</li>\n");
        break;
      case "table":
        this.tableMode = null;
        this.closeBlock("table");
        break;
      case "table-head":
        this.tableMode = null;
        this.closeBlock("thead");
        break;
      case "table-body":
        this.closeBlock("tbody");
        break;
      case "table-row":
        this.closeBlock("tr");
        break;
      case "table-cell":
        this.out(`</${this.cellTag(container.head)}>\n`);
        break;
      case "footnote":
        this.closeBlock("li");
        this.target = null;
        break;
      case "other":
        if (BLOCK_OTHER_TAGS.has(container.tag)) {
          this.out(`</${container.tag}>\n`);
        } else {
          this.out(`</${container.tag}>`);
        }
        break;
    }
  }
}

function isMarkerParagraph(event: IrEvent, rest: Peekable<IrEvent>, marker: string): boolean {
  if (event.type !== "start" || event.container.type !== "paragraph") return false;
  const text = rest.peek(0);
  const close = rest.peek(1);
  return (
    text !== undefined &&
    text.type === "str" &&
    text.text === marker &&
    close !== undefined &&
    close.type === "end" &&
    close.container.type === "paragraph"
  );
}

/**
 * Writes a whole event stream. A top-level or section-level paragraph
 * holding only `moreMarker` is dropped and splits the output into summary
 * and rest.
 */
export function writeHtml(events: Iterable<IrEvent>, options: WriteOptions = {}): SplitHtml {
  const marker = options.moreMarker ?? null;
  const writer = new HtmlWriter();
  const iter = new Peekable(events[Symbol.iterator]());
  for (const ev of iter) {
    if (marker !== null && writer.atTopLevel() && isMarkerParagraph(ev, iter, marker)) {
      iter.next();
      iter.next();
      writer.markSplit();
      continue;
    }
    writer.write(ev);
  }
  return writer.finish();
}

export function renderHtml(events: Iterable<IrEvent>): string {
  const { summary, rest } = writeHtml(events);
  return summary + rest;
}

/** Writes a fragment such as a title; footnote references stay, definitions do not. */
export function renderFragment(events: Iterable<IrEvent>): string {
  const writer = new HtmlWriter();
  for (const ev of events) writer.write(ev);
  return writer.body();
}
