import { UnknownInternalLinkError } from "./errors";
import type { IrEvent } from "./ir";
import { irSpan } from "./span";
import { renderFragment } from "./writer";

export const INTERNAL_LINK_PREFIX = "~/";

/** Anything a document can link to by canonical name. */
export type EntryRef = { readonly permalink: string };

export type SeparatedTitle = { title: string | null; events: IrEvent[] };

/**
 * Removes a leading level-1 heading and returns its rendered content as the
 * title. The heading must be the first thing in the first section; any other
 * layout leaves the events untouched.
 */
export function separateTitle(events: IrEvent[]): SeparatedTitle {
  const [first, second] = events;
  if (
    first === undefined ||
    second === undefined ||
    first.type !== "start" ||
    first.container.type !== "section" ||
    second.type !== "start" ||
    second.container.type !== "heading" ||
    second.container.level !== 1
  ) {
    return { title: null, events };
  }
  const iter = events.slice(2)[Symbol.iterator]();
  const inner = [...irSpan(iter)];
  const title = renderFragment(inner).trim();
  // section start + heading start + inner + heading end
  const consumed = 2 + inner.length + 1;
  return { title, events: [first, ...events.slice(consumed)] };
}

export type ResolvedLinks<E extends EntryRef> = { events: IrEvent[]; linked: E[] };

/**
 * Rewrites `~/name#fragment` link and image destinations to the permalink
 * of the named entry. Entries reached through links are returned sorted by
 * name, without duplicates.
 */
export function rewriteInternalLinks<E extends EntryRef>(
  events: readonly IrEvent[],
  entries: ReadonlyMap<string, E>,
): ResolvedLinks<E> {
  const linked = new Map<string, E>();
  const resolve = (destination: string): { name: string; entry: E; url: string } | null => {
    if (!destination.startsWith(INTERNAL_LINK_PREFIX)) return null;
    const path = destination.slice(INTERNAL_LINK_PREFIX.length);
    const hash = path.indexOf("#");
    const name = hash >= 0 ? path.slice(0, hash) : path;
    const fragment = hash >= 0 ? path.slice(hash) : "";
    const entry = entries.get(name);
    if (!entry) throw new UnknownInternalLinkError(destination);
    return { name, entry, url: entry.permalink + fragment };
  };

  const out = events.map((ev): IrEvent => {
    if (ev.type === "start" && ev.container.type === "link") {
      const r = resolve(ev.container.destination);
      if (!r) return ev;
      linked.set(r.name, r.entry);
      return { ...ev, container: { type: "link", destination: r.url } };
    }
    if (ev.type === "image") {
      const r = resolve(ev.destination);
      return r ? { ...ev, destination: r.url } : ev;
    }
    return ev;
  });

  const names = [...linked.keys()].sort();
  const sorted: E[] = [];
  for (const name of names) {
    const entry = linked.get(name);
    if (entry) sorted.push(entry);
  }
  return { events: out, linked: sorted };
}
