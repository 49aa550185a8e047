export type Alignment = "unspecified" | "left" | "center" | "right";

export type OrderedListNumbering =
  | "decimal"
  | "alpha-lower"
  | "alpha-upper"
  | "roman-lower"
  | "roman-upper";

export type ListKind =
  | { type: "unordered" }
  | { type: "ordered"; numbering: OrderedListNumbering; start: number }
  | { type: "task" };

export type MathKind = "inline" | "display";

export type Container =
  | { type: "blockquote" }
  | { type: "description-list" }
  | { type: "description-term" }
  | { type: "description-details" }
  | { type: "heading"; level: number; id: string }
  | { type: "section"; id: string }
  | { type: "div" }
  | { type: "paragraph" }
  | { type: "link"; destination: string }
  | { type: "list"; kind: ListKind; tight: boolean }
  | { type: "list-item" }
  | { type: "task-list-item"; checked: boolean }
  | { type: "table" }
  | { type: "table-head" }
  | { type: "table-body" }
  | { type: "table-row" }
  | { type: "table-cell"; alignment: Alignment; head: boolean }
  | { type: "footnote"; label: string }
  | { type: "other"; tag: string };

export type ContainerEnd =
  | { type: "blockquote" }
  | { type: "description-list" }
  | { type: "description-term" }
  | { type: "description-details" }
  | { type: "heading"; level: number }
  | { type: "section" }
  | { type: "div" }
  | { type: "paragraph" }
  | { type: "link" }
  | { type: "list"; kind: ListKind }
  | { type: "list-item" }
  | { type: "task-list-item" }
  | { type: "table" }
  | { type: "table-head" }
  | { type: "table-body" }
  | { type: "table-row" }
  | { type: "table-cell"; head: boolean }
  | { type: "footnote" }
  | { type: "other"; tag: string };

export type StartEvent = { type: "start"; container: Container; attributes: Attributes };
export type EndEvent = { type: "end"; container: ContainerEnd };

export type IrEvent =
  | StartEvent
  | EndEvent
  | { type: "str"; text: string }
  | { type: "image"; destination: string; alt: string; attributes: Attributes }
  | { type: "code-block"; language: string; code: string; attributes: Attributes }
  | { type: "math"; kind: MathKind; source: string; attributes: Attributes }
  | { type: "html-inline"; content: string; attributes: Attributes }
  | { type: "html-block"; content: string; attributes: Attributes }
  | { type: "tag"; tag: string; attributes: Attributes }
  | { type: "footnote-reference"; label: string };

/**
 * Ordered attribute set. Keys are unique and always iterate in lexicographic
 * (UTF-16 code unit) order, so equal sets render identical HTML whatever order
 * their pairs were inserted in.
 */
export class Attributes {
  private readonly pairs: [string, string][] = [];

  static from(record: Readonly<Record<string, string>> | null | undefined): Attributes {
    const attrs = new Attributes();
    if (record) {
      for (const [k, v] of Object.entries(record)) attrs.set(k, v);
    }
    return attrs;
  }

  static of(...pairs: [string, string][]): Attributes {
    const attrs = new Attributes();
    for (const [k, v] of pairs) attrs.set(k, v);
    return attrs;
  }

  get size(): number {
    return this.pairs.length;
  }

  isEmpty(): boolean {
    return this.pairs.length === 0;
  }

  get(key: string): string | undefined {
    const i = this.search(key);
    return i >= 0 ? this.pairs[i][1] : undefined;
  }

  has(key: string): boolean {
    return this.search(key) >= 0;
  }

  set(key: string, value: string): this {
    const i = this.search(key);
    if (i >= 0) {
      this.pairs[i][1] = value;
    } else {
      this.pairs.splice(-i - 1, 0, [key, value]);
    }
    return this;
  }

  delete(key: string): boolean {
    const i = this.search(key);
    if (i < 0) return false;
    this.pairs.splice(i, 1);
    return true;
  }

  clone(): Attributes {
    const copy = new Attributes();
    for (const [k, v] of this.pairs) copy.pairs.push([k, v]);
    return copy;
  }

  without(key: string): Attributes {
    const copy = this.clone();
    copy.delete(key);
    return copy;
  }

  /** Copies the pairs of `other` over this set. */
  merge(other: Attributes): this {
    for (const [k, v] of other) this.set(k, v);
    return this;
  }

  equals(other: Attributes): boolean {
    if (other.size !== this.size) return false;
    return this.pairs.every(([k, v], i) => other.pairs[i][0] === k && other.pairs[i][1] === v);
  }

  *[Symbol.iterator](): IterableIterator<[string, string]> {
    for (const [k, v] of this.pairs) yield [k, v];
  }

  // Binary search; a miss returns -(insertion point) - 1.
  private search(key: string): number {
    let lo = 0;
    let hi = this.pairs.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const k = this.pairs[mid][0];
      if (k < key) lo = mid + 1;
      else if (k > key) hi = mid - 1;
      else return mid;
    }
    return -lo - 1;
  }
}

export function endOf(container: Container): ContainerEnd {
  switch (container.type) {
    case "heading":
      return { type: "heading", level: container.level };
    case "list":
      return { type: "list", kind: container.kind };
    case "table-cell":
      return { type: "table-cell", head: container.head };
    case "other":
      return { type: "other", tag: container.tag };
    case "section":
      return { type: "section" };
    case "link":
      return { type: "link" };
    case "task-list-item":
      return { type: "task-list-item" };
    case "footnote":
      return { type: "footnote" };
    default:
      return { type: container.type };
  }
}

export function start(container: Container, attributes: Attributes = new Attributes()): StartEvent {
  return { type: "start", container, attributes };
}

export function end(container: ContainerEnd): EndEvent {
  return { type: "end", container };
}

export function str(text: string): IrEvent {
  return { type: "str", text };
}

/** Depth step of an IR event, for the span primitives. */
export function irStep(event: IrEvent): "open" | "close" | "leaf" {
  if (event.type === "start") return "open";
  if (event.type === "end") return "close";
  return "leaf";
}

/** Identifies the container kind an end event closes, e.g. "list" or "other:em". */
export function containerKey(container: Container | ContainerEnd): string {
  return container.type === "other" ? `other:${container.tag}` : container.type;
}
