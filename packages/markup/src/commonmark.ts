import MarkdownIt from "markdown-it";
import footnote from "markdown-it-footnote";
import { Attributes, end, start, str, type Alignment, type IrEvent, type ListKind } from "./ir";
import { collectText } from "./span";
import { slugify } from "./slug";

export type Token = ReturnType<MarkdownIt["parse"]>[number];

function metaOf(token: Token): Record<string, unknown> {
  const meta: unknown = token.meta;
  if (typeof meta !== "object" || meta === null) return {};
  return Object.fromEntries(Object.entries(meta));
}

function setMeta(token: Token, values: Record<string, unknown>): void {
  token.meta = { ...metaOf(token), ...values };
}

function tokenText(token: Token): string | null {
  switch (token.type) {
    case "text":
    case "code_inline":
      return token.content;
    case "softbreak":
    case "hardbreak":
      return " ";
    case "image":
      return collectText(token.children ?? [], tokenText);
    default:
      return null;
  }
}

const HEADING_ATTRS_RE = /\s*\{([^{}]*)\}\s*$/;
const ATTR_PART_RE = /^(?:#[^\s#.]+|\.[^\s#.]+|[A-Za-z_:][\w:.-]*=\S*)$/;

/** Parses `#id .class key=value` parts; null when any part is not an attribute. */
export function parseAttributeList(text: string): Attributes | null {
  const parts = text.trim().split(/\s+/).filter((p) => p.length > 0);
  if (parts.length === 0 || !parts.every((p) => ATTR_PART_RE.test(p))) return null;
  const attrs = new Attributes();
  const classes: string[] = [];
  for (const part of parts) {
    if (part.startsWith("#")) {
      attrs.set("id", part.slice(1));
    } else if (part.startsWith(".")) {
      classes.push(part.slice(1));
    } else {
      const eq = part.indexOf("=");
      attrs.set(part.slice(0, eq), part.slice(eq + 1).replace(/^["“”']|["“”']$/g, ""));
    }
  }
  if (classes.length > 0) attrs.set("class", classes.join(" "));
  return attrs;
}

/**
 * Reads a trailing `{#id .class key=value}` block off each heading and gives
 * every heading an id, derived from its text when none is given.
 */
export function headingAttributes(md: MarkdownIt): void {
  md.core.ruler.push("heading_attributes", (state) => {
    const used = new Set<string>();
    const tokens = state.tokens;
    for (let i = 0; i + 1 < tokens.length; i++) {
      const open = tokens[i];
      const inline = tokens[i + 1];
      if (open.type !== "heading_open" || inline.type !== "inline") continue;
      const children = inline.children ?? [];
      const last = children[children.length - 1];
      if (last && last.type === "text") {
        const m = HEADING_ATTRS_RE.exec(last.content);
        const attrs = m ? parseAttributeList(m[1]) : null;
        if (m && attrs) {
          last.content = last.content.slice(0, m.index);
          if (last.content === "") children.pop();
          for (const [k, v] of attrs) open.attrSet(k, v);
        }
      }
      const id = open.attrGet("id") ?? slugify(collectText(children, tokenText), used);
      open.attrSet("id", id);
      used.add(id);
    }
  });
}

const TASK_MARKER_RE = /^\[([ xX])\](?:\s+|$)/;

/**
 * Turns items starting with `[ ]` or `[x]` into task items. The list itself
 * becomes a task list only when its first item is one.
 */
export function taskLists(md: MarkdownIt): void {
  md.core.ruler.push("task_lists", (state) => {
    const tokens = state.tokens;
    for (let i = 2; i < tokens.length; i++) {
      const item = tokens[i - 2];
      const inline = tokens[i];
      if (item.type !== "list_item_open" || tokens[i - 1].type !== "paragraph_open") continue;
      if (inline.type !== "inline") continue;
      const first = (inline.children ?? [])[0];
      if (!first || first.type !== "text") continue;
      const m = TASK_MARKER_RE.exec(first.content);
      if (!m) continue;
      first.content = first.content.slice(m[0].length);
      setMeta(item, { task: true, checked: m[1] !== " " });
      for (let j = i - 3; j >= 0; j--) {
        const t = tokens[j];
        if (t.level === item.level - 1 && t.nesting === 1 && t.type.endsWith("_list_open")) {
          if (tokens[j + 1] === item) setMeta(t, { task: true });
          break;
        }
      }
    }
  });
}

/** Records on each list open whether markdown-it laid the list out tight. */
export function listTightness(md: MarkdownIt): void {
  md.core.ruler.push("list_tightness", (state) => {
    const tokens = state.tokens;
    for (let i = 0; i < tokens.length; i++) {
      const open = tokens[i];
      if (open.type !== "bullet_list_open" && open.type !== "ordered_list_open") continue;
      const closeType = open.type.replace(/_open$/, "_close");
      let tight = true;
      for (let j = i + 1; j < tokens.length; j++) {
        const t = tokens[j];
        if (t.type === closeType && t.level === open.level) break;
        if (t.type === "paragraph_open" && t.level === open.level + 2) {
          tight = t.hidden;
          break;
        }
      }
      setMeta(open, { tight });
    }
  });
}

export function createMarkdownIt(): MarkdownIt {
  return new MarkdownIt({ html: true, linkify: false, typographer: true })
    .use(footnote)
    .use(headingAttributes)
    .use(taskLists)
    .use(listTightness);
}

/** The block token stream with the children of inline tokens spliced in place. */
export function* commonMarkTokens(tokens: readonly Token[]): Generator<Token, void, undefined> {
  for (const token of tokens) {
    if (token.type === "inline") {
      yield* token.children ?? [];
    } else {
      yield token;
    }
  }
}

function attributesOf(token: Token, ...omit: string[]): Attributes {
  const attrs = new Attributes();
  for (const [k, v] of token.attrs ?? []) {
    if (!omit.includes(k)) attrs.set(k, v);
  }
  return attrs;
}

function alignmentOf(token: Token): Alignment {
  const m = /text-align:\s*(left|center|right)/.exec(token.attrGet("style") ?? "");
  if (!m) return "unspecified";
  const value = m[1];
  return value === "left" || value === "center" || value === "right" ? value : "unspecified";
}

function footnoteLabel(token: Token): string {
  const meta = metaOf(token);
  if (typeof meta.label === "string") return meta.label;
  return `inline-${String(meta.id)}`;
}

type TableState = { alignments: Alignment[]; cell: number; inHead: boolean; bodyOpen: boolean };

/**
 * Translates flattened markdown-it tokens into IR events. Sections are
 * synthesized from the levels of top-level headings: such a heading closes
 * every open section at its level or deeper before opening its own. A
 * heading inside a blockquote or list item stands alone.
 */
export function* commonMarkToIr(tokens: Iterator<Token>): Generator<IrEvent, void, undefined> {
  const sections: number[] = [];
  const lists: ListKind[] = [];
  const items: ("list-item" | "task-list-item")[] = [];
  let table: TableState | null = null;

  for (;;) {
    const r = tokens.next();
    if (r.done) break;
    const token = r.value;
    switch (token.type) {
      case "heading_open": {
        const level = Number(token.tag.slice(1));
        const id = token.attrGet("id") ?? "";
        if (token.level > 0) {
          yield start({ type: "heading", level, id }, attributesOf(token, "id"));
          break;
        }
        while (sections.length > 0 && sections[sections.length - 1] >= level) {
          sections.pop();
          yield end({ type: "section" });
        }
        sections.push(level);
        yield start({ type: "section", id });
        yield start({ type: "heading", level, id }, attributesOf(token, "id"));
        break;
      }
      case "heading_close":
        yield end({ type: "heading", level: Number(token.tag.slice(1)) });
        break;
      case "paragraph_open":
        yield start({ type: "paragraph" }, attributesOf(token));
        break;
      case "paragraph_close":
        yield end({ type: "paragraph" });
        break;
      case "blockquote_open":
        yield start({ type: "blockquote" }, attributesOf(token));
        break;
      case "blockquote_close":
        yield end({ type: "blockquote" });
        break;
      case "bullet_list_open":
      case "ordered_list_open": {
        const meta = metaOf(token);
        const kind: ListKind =
          token.type === "ordered_list_open"
            ? { type: "ordered", numbering: "decimal", start: Number(token.attrGet("start") ?? "1") }
            : meta.task === true
              ? { type: "task" }
              : { type: "unordered" };
        lists.push(kind);
        yield start({ type: "list", kind, tight: meta.tight !== false }, attributesOf(token, "start"));
        break;
      }
      case "bullet_list_close":
      case "ordered_list_close": {
        const kind = lists.pop();
        if (kind) yield end({ type: "list", kind });
        break;
      }
      case "list_item_open": {
        const meta = metaOf(token);
        if (meta.task === true) {
          items.push("task-list-item");
          yield start({ type: "task-list-item", checked: meta.checked === true });
        } else {
          items.push("list-item");
          yield start({ type: "list-item" });
        }
        break;
      }
      case "list_item_close": {
        const kind = items.pop();
        if (kind) yield end({ type: kind });
        break;
      }
      case "table_open":
        table = { alignments: [], cell: 0, inHead: false, bodyOpen: false };
        yield start({ type: "table" }, attributesOf(token));
        break;
      case "thead_open":
        if (table) table.inHead = true;
        yield start({ type: "table-head" });
        break;
      case "thead_close":
        yield end({ type: "table-head" });
        if (table) {
          table.inHead = false;
          table.bodyOpen = true;
        }
        yield start({ type: "table-body" });
        break;
      case "tr_open":
        if (table) table.cell = 0;
        yield start({ type: "table-row" });
        break;
      case "tr_close":
        yield end({ type: "table-row" });
        break;
      case "th_open":
      case "td_open": {
        const head = table?.inHead ?? false;
        let alignment: Alignment = alignmentOf(token);
        if (table) {
          if (head) table.alignments[table.cell] = alignment;
          alignment = table.alignments[table.cell] ?? alignment;
        }
        yield start({ type: "table-cell", alignment, head });
        break;
      }
      case "th_close":
      case "td_close":
        yield end({ type: "table-cell", head: table?.inHead ?? false });
        if (table) table.cell++;
        break;
      case "table_close":
        if (table && !table.bodyOpen) yield start({ type: "table-body" });
        table = null;
        yield end({ type: "table-body" });
        yield end({ type: "table" });
        break;
      case "fence":
      case "code_block": {
        const language = token.type === "fence" ? (token.info.trim().split(/\s+/)[0] ?? "") : "";
        yield { type: "code-block", language, code: token.content, attributes: attributesOf(token) };
        break;
      }
      case "html_block":
        yield { type: "html-block", content: token.content, attributes: new Attributes() };
        break;
      case "html_inline":
        yield { type: "html-inline", content: token.content, attributes: new Attributes() };
        break;
      case "hr":
        yield { type: "tag", tag: "hr", attributes: attributesOf(token) };
        break;
      case "text":
        yield str(token.content);
        break;
      case "softbreak":
        yield str("\n");
        break;
      case "hardbreak":
        yield { type: "html-inline", content: "<br />", attributes: new Attributes() };
        break;
      case "code_inline":
        yield start({ type: "other", tag: "code" });
        yield str(token.content);
        yield end({ type: "other", tag: "code" });
        break;
      case "em_open":
        yield start({ type: "other", tag: "em" });
        break;
      case "em_close":
        yield end({ type: "other", tag: "em" });
        break;
      case "strong_open":
        yield start({ type: "other", tag: "strong" });
        break;
      case "strong_close":
        yield end({ type: "other", tag: "strong" });
        break;
      case "s_open":
        yield start({ type: "other", tag: "del" });
        break;
      case "s_close":
        yield end({ type: "other", tag: "del" });
        break;
      case "link_open":
        yield start({ type: "link", destination: token.attrGet("href") ?? "" }, attributesOf(token, "href"));
        break;
      case "link_close":
        yield end({ type: "link" });
        break;
      case "image":
        yield {
          type: "image",
          destination: token.attrGet("src") ?? "",
          alt: collectText(token.children ?? [], tokenText),
          attributes: attributesOf(token, "src", "alt"),
        };
        break;
      case "footnote_ref":
        yield { type: "footnote-reference", label: footnoteLabel(token) };
        break;
      case "footnote_block_open":
        while (sections.length > 0) {
          sections.pop();
          yield end({ type: "section" });
        }
        break;
      case "footnote_open":
        yield start({ type: "footnote", label: footnoteLabel(token) });
        break;
      case "footnote_close":
        yield end({ type: "footnote" });
        break;
      default:
        break;
    }
  }

  while (sections.length > 0) {
    sections.pop();
    yield end({ type: "section" });
  }
}

/** Parses CommonMark source into a lazy IR event stream. */
export function parseCommonMark(source: string, md: MarkdownIt): Generator<IrEvent, void, undefined> {
  return commonMarkToIr(commonMarkTokens(md.parse(source, {})));
}
