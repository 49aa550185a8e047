import { parse } from "@djot/djot";
import {
  Attributes,
  end,
  endOf,
  start,
  str,
  type Alignment,
  type Container,
  type IrEvent,
  type ListKind,
  type OrderedListNumbering,
} from "./ir";
import { collectText, containerSpan } from "./span";
import { slugify } from "./slug";

/**
 * Structural view of the djot AST: only the fields read here. Every node of
 * `@djot/djot` is assignable to it.
 */
export type DjotNode = {
  tag: string;
  children?: readonly DjotNode[];
  text?: string;
  level?: number;
  lang?: string;
  format?: string;
  destination?: string;
  reference?: string;
  label?: string;
  alias?: string;
  checkbox?: string;
  head?: boolean;
  align?: string;
  tight?: boolean;
  start?: number;
  style?: string;
  type?: string;
  attributes?: Readonly<Record<string, string>>;
  autoAttributes?: Readonly<Record<string, string>>;
};

export type DjotDoc = {
  children: readonly DjotNode[];
  references?: Readonly<Record<string, DjotNode>>;
  autoReferences?: Readonly<Record<string, DjotNode>>;
  footnotes?: Readonly<Record<string, DjotNode>>;
};

export type DjotEvent =
  | { type: "enter"; node: DjotNode }
  | { type: "exit"; node: DjotNode }
  | { type: "leaf"; node: DjotNode };

export function parseDjotDocument(source: string): DjotDoc {
  return parse(source);
}

/**
 * Depth-first walk of the document body followed by the footnote
 * definitions, as enter/exit/leaf events.
 */
export function* djotEvents(doc: DjotDoc): Generator<DjotEvent, void, undefined> {
  const roots = [...doc.children, ...Object.values(doc.footnotes ?? {})];
  const stack: { nodes: readonly DjotNode[]; index: number; parent: DjotNode | null }[] = [
    { nodes: roots, index: 0, parent: null },
  ];
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.index >= frame.nodes.length) {
      stack.pop();
      if (frame.parent) yield { type: "exit", node: frame.parent };
      continue;
    }
    const node = frame.nodes[frame.index++];
    if (node.children) {
      yield { type: "enter", node };
      stack.push({ nodes: node.children, index: 0, parent: node });
    } else {
      yield { type: "leaf", node };
    }
  }
}

function djotStep(ev: DjotEvent): "open" | "close" | "leaf" {
  if (ev.type === "enter") return "open";
  if (ev.type === "exit") return "close";
  return "leaf";
}

const SMART_PUNCTUATION: Record<string, string> = {
  left_single_quote: "‘",
  right_single_quote: "’",
  left_double_quote: "“",
  right_double_quote: "”",
  ellipses: "…",
  em_dash: "—",
  en_dash: "–",
};

function smartText(node: DjotNode): string {
  const t = node.type ?? "";
  return SMART_PUNCTUATION[t] ?? node.text ?? "";
}

/** Text of a leaf for alt text and similar plain-text uses. */
function djotText(ev: DjotEvent): string | null {
  if (ev.type !== "leaf") {
    if (ev.node.tag === "double_quoted") return ev.type === "enter" ? "“" : "”";
    if (ev.node.tag === "single_quoted") return ev.type === "enter" ? "‘" : "’";
    return null;
  }
  const node = ev.node;
  switch (node.tag) {
    case "str":
    case "verbatim":
    case "url":
    case "email":
      return node.text ?? "";
    case "smart_punctuation":
      return smartText(node);
    case "symb":
      return `:${node.alias ?? ""}:`;
    case "non_breaking_space":
      return " ";
    case "soft_break":
      return " ";
    default:
      return null;
  }
}

function attributesOf(node: DjotNode, ...omit: string[]): Attributes {
  const attrs = Attributes.from(node.attributes);
  for (const key of omit) attrs.delete(key);
  return attrs;
}

function numberingOf(style: string | undefined): OrderedListNumbering {
  const marker = (style ?? "1.").replace(/^\(/, "").charAt(0);
  switch (marker) {
    case "a":
      return "alpha-lower";
    case "A":
      return "alpha-upper";
    case "i":
      return "roman-lower";
    case "I":
      return "roman-upper";
    default:
      return "decimal";
  }
}

function alignmentOf(align: string | undefined): Alignment {
  if (align === "left" || align === "center" || align === "right") return align;
  return "unspecified";
}

function isHtmlFormat(format: string | undefined): boolean {
  return (format ?? "").toLowerCase() === "html";
}

function plainText(node: DjotNode): string {
  if (node.children) return node.children.map(plainText).join("");
  return node.text ?? "";
}

type TableState = { section: "none" | "head" | "body" };

/**
 * Translates the djot event walk into IR events. Reference links are
 * resolved against the explicit and automatic reference tables of `doc`.
 */
export function* djotToIr(
  events: Iterator<DjotEvent>,
  doc: DjotDoc,
): Generator<IrEvent, void, undefined> {
  const tables: TableState[] = [];
  const usedIds = new Set<string>();
  const sectionIds: string[] = [];
  let headingOwnedBySection = false;

  const resolve = (node: DjotNode): { destination: string; attributes: Attributes } => {
    const attrs = attributesOf(node);
    if (node.destination !== undefined) return { destination: node.destination, attributes: attrs };
    const label = node.reference ?? "";
    const ref = doc.references?.[label] ?? doc.autoReferences?.[label];
    if (!ref) return { destination: "", attributes: attrs };
    const merged = attributesOf(ref).merge(attrs);
    return { destination: ref.destination ?? "", attributes: merged };
  };

  const sectionId = (node: DjotNode): string => {
    const heading = node.children?.find((c) => c.tag === "heading");
    const id =
      node.attributes?.id ??
      heading?.attributes?.id ??
      node.autoAttributes?.id ??
      heading?.autoAttributes?.id ??
      slugify(heading ? plainText(heading) : "", usedIds);
    usedIds.add(id);
    return id;
  };

  for (;;) {
    const r = events.next();
    if (r.done) return;
    const ev = r.value;
    const node = ev.node;

    if (ev.type === "leaf") {
      yield* leafToIr(node);
      continue;
    }

    if (ev.type === "enter") {
      switch (node.tag) {
        case "section": {
          const id = sectionId(node);
          sectionIds.push(id);
          headingOwnedBySection = true;
          yield start({ type: "section", id }, attributesOf(node, "id"));
          break;
        }
        case "heading": {
          const level = node.level ?? 1;
          if (headingOwnedBySection) {
            headingOwnedBySection = false;
            const id = sectionIds[sectionIds.length - 1] ?? "";
            yield start({ type: "heading", level, id }, attributesOf(node, "id"));
          } else {
            const id =
              node.attributes?.id ?? node.autoAttributes?.id ?? slugify(plainText(node), usedIds);
            usedIds.add(id);
            yield start({ type: "heading", level, id }, attributesOf(node, "id"));
          }
          break;
        }
        case "image": {
          const { destination, attributes } = resolve(node);
          const alt = collectText(containerSpan(events, djotStep), djotText);
          yield { type: "image", destination, alt, attributes };
          break;
        }
        case "link": {
          const { destination, attributes } = resolve(node);
          yield start({ type: "link", destination }, attributes);
          break;
        }
        case "double_quoted":
          yield str("“");
          break;
        case "single_quoted":
          yield str("‘");
          break;
        case "table":
          tables.push({ section: "none" });
          yield start({ type: "table" }, attributesOf(node));
          break;
        case "caption":
          if (node.children?.length) yield start({ type: "other", tag: "caption" }, attributesOf(node));
          break;
        case "row": {
          const table = tables[tables.length - 1];
          if (table && table.section === "none") {
            if (node.head) {
              table.section = "head";
              yield start({ type: "table-head" });
            } else {
              table.section = "body";
              yield start({ type: "table-body" });
            }
          }
          yield start({ type: "table-row" }, attributesOf(node));
          break;
        }
        default: {
          const container = containerOf(node);
          if (container) yield start(container, attributesOf(node));
        }
      }
      continue;
    }

    switch (node.tag) {
      case "section":
        sectionIds.pop();
        yield end({ type: "section" });
        break;
      case "heading":
        yield end({ type: "heading", level: node.level ?? 1 });
        break;
      case "link":
        yield end({ type: "link" });
        break;
      case "double_quoted":
        yield str("”");
        break;
      case "single_quoted":
        yield str("’");
        break;
      case "caption":
        if (node.children?.length) yield end({ type: "other", tag: "caption" });
        break;
      case "row": {
        yield end({ type: "table-row" });
        const table = tables[tables.length - 1];
        if (table && table.section === "head") {
          table.section = "body";
          yield end({ type: "table-head" });
          yield start({ type: "table-body" });
        }
        break;
      }
      case "table": {
        const table = tables.pop();
        if (table && table.section === "none") yield start({ type: "table-body" });
        yield end({ type: "table-body" });
        yield end({ type: "table" });
        break;
      }
      default: {
        const container = containerOf(node);
        if (container) yield end(endOf(container));
      }
    }
  }
}

function containerOf(node: DjotNode): Container | null {
  switch (node.tag) {
    case "para":
      return { type: "paragraph" };
    case "div":
      return { type: "div" };
    case "block_quote":
      return { type: "blockquote" };
    case "bullet_list":
      return { type: "list", kind: { type: "unordered" }, tight: node.tight ?? false };
    case "ordered_list": {
      const kind: ListKind = { type: "ordered", numbering: numberingOf(node.style), start: node.start ?? 1 };
      return { type: "list", kind, tight: node.tight ?? false };
    }
    case "task_list":
      return { type: "list", kind: { type: "task" }, tight: node.tight ?? false };
    case "list_item":
      return { type: "list-item" };
    case "task_list_item":
      return { type: "task-list-item", checked: node.checkbox === "checked" };
    case "definition_list":
      return { type: "description-list" };
    case "term":
      return { type: "description-term" };
    case "definition":
      return { type: "description-details" };
    case "cell":
      return { type: "table-cell", alignment: alignmentOf(node.align), head: node.head ?? false };
    case "footnote":
      return { type: "footnote", label: node.label ?? "" };
    case "emph":
      return { type: "other", tag: "em" };
    case "strong":
      return { type: "other", tag: "strong" };
    case "span":
      return { type: "other", tag: "span" };
    case "mark":
      return { type: "other", tag: "mark" };
    case "superscript":
      return { type: "other", tag: "sup" };
    case "subscript":
      return { type: "other", tag: "sub" };
    case "insert":
      return { type: "other", tag: "ins" };
    case "delete":
      return { type: "other", tag: "del" };
    default:
      return null;
  }
}

function* leafToIr(node: DjotNode): Generator<IrEvent, void, undefined> {
  const attributes = attributesOf(node);
  switch (node.tag) {
    case "str":
      yield str(node.text ?? "");
      break;
    case "soft_break":
      yield str("\n");
      break;
    case "hard_break":
      yield { type: "html-inline", content: "<br />", attributes: new Attributes() };
      break;
    case "non_breaking_space":
      yield { type: "html-inline", content: "&nbsp;", attributes: new Attributes() };
      break;
    case "smart_punctuation":
      yield str(smartText(node));
      break;
    case "symb":
      yield str(`:${node.alias ?? ""}:`);
      break;
    case "verbatim":
      yield start({ type: "other", tag: "code" }, attributes);
      yield str(node.text ?? "");
      yield end({ type: "other", tag: "code" });
      break;
    case "inline_math":
      yield { type: "math", kind: "inline", source: node.text ?? "", attributes };
      break;
    case "display_math":
      yield { type: "math", kind: "display", source: node.text ?? "", attributes };
      break;
    case "url":
      yield start({ type: "link", destination: node.text ?? "" }, attributes);
      yield str(node.text ?? "");
      yield end({ type: "link" });
      break;
    case "email":
      yield start({ type: "link", destination: `mailto:${node.text ?? ""}` }, attributes);
      yield str(node.text ?? "");
      yield end({ type: "link" });
      break;
    case "footnote_reference":
      yield { type: "footnote-reference", label: node.text ?? "" };
      break;
    case "code_block":
      yield { type: "code-block", language: node.lang ?? "", code: node.text ?? "", attributes };
      break;
    case "raw_inline":
      if (isHtmlFormat(node.format)) yield { type: "html-inline", content: node.text ?? "", attributes };
      break;
    case "raw_block":
      if (isHtmlFormat(node.format)) yield { type: "html-block", content: node.text ?? "", attributes };
      break;
    case "thematic_break":
      yield { type: "tag", tag: "hr", attributes };
      break;
    default:
      break;
  }
}

/** Parses djot source into a lazy IR event stream. */
export function parseDjot(source: string): Generator<IrEvent, void, undefined> {
  const doc = parseDjotDocument(source);
  return djotToIr(djotEvents(doc), doc);
}
