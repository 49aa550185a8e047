import { HighlightError, MathError, UnknownLanguageError } from "./errors";
import type { Highlighter } from "./highlight";
import { attrsToString, escapeHtml } from "./html";
import { Attributes, end, start, type IrEvent, type StartEvent } from "./ir";
import type { MathRenderer } from "./math";
import { irSpan, Peekable } from "./span";
import { createLogger } from "./utils/logger";

const logger = createLogger({ file: "passes" });

/** What the image pipeline computed for one image reference. */
export type ImageVariants = {
  originalPath: string;
  originalWidth?: number;
  width1536Path?: string;
  width768Path?: string;
};

const PLAIN_LANGUAGES = new Set(["", "plain", "text", "plaintext"]);

function plainCode(code: string, attrs: Attributes): string {
  return `<pre${attrsToString(attrs)}><code>${escapeHtml(code)}</code></pre>`;
}

/**
 * Replaces code blocks with highlighted HTML. Plain blocks, blocks in an
 * unknown language and all blocks when no highlighter is given are escaped
 * verbatim.
 */
export function* highlightCode(
  events: Iterable<IrEvent>,
  highlighter?: Highlighter | null,
): Generator<IrEvent, void, undefined> {
  for (const ev of events) {
    if (ev.type !== "code-block") {
      yield ev;
      continue;
    }
    const lang = ev.language.trim();
    let content: string;
    if (!highlighter || PLAIN_LANGUAGES.has(lang.toLowerCase())) {
      content = plainCode(ev.code, ev.attributes);
    } else {
      try {
        const html = highlighter.highlight(ev.code, lang);
        const attrs = ev.attributes.clone().set("class", "highlight");
        content = `<pre${attrsToString(attrs)}><code data-lang="${escapeHtml(lang)}">${html}</code></pre>`;
      } catch (e) {
        if (!(e instanceof UnknownLanguageError)) throw new HighlightError(lang, ev.code, e);
        logger.warn(`no highlighting grammar for ${lang}, rendering as plain text`);
        content = plainCode(ev.code, ev.attributes);
      }
    }
    yield { type: "html-block", content, attributes: new Attributes() };
  }
}

/** Typesets math events. Without a renderer the stream passes through. */
export function* renderMath(
  events: Iterable<IrEvent>,
  renderer?: MathRenderer | null,
): Generator<IrEvent, void, undefined> {
  if (!renderer) {
    yield* events;
    return;
  }
  for (const ev of events) {
    if (ev.type !== "math") {
      yield ev;
      continue;
    }
    let html: string;
    try {
      html = renderer.render(ev.source, ev.kind);
    } catch (e) {
      throw new MathError(ev.source, ev.kind === "display", e);
    }
    const attrs = ev.attributes.clone().set("class", ev.kind === "display" ? "math display" : "math");
    const content = `<span${attrsToString(attrs)}>${html}</span>`;
    yield { type: "html-inline", content, attributes: new Attributes() };
  }
}

export function imageAttributes(variants: ImageVariants, alt: string, own: Attributes): Attributes {
  const attrs = own.clone().set("alt", alt).set("src", variants.originalPath);
  if (variants.originalWidth !== undefined) {
    const w = variants.originalWidth;
    const srcset = [`${variants.originalPath} ${w}w`];
    if (variants.width1536Path !== undefined) srcset.push(`${variants.width1536Path} 1536w`);
    if (variants.width768Path !== undefined) srcset.push(`${variants.width768Path} 768w`);
    attrs.set("srcset", srcset.join(", "));
    attrs.set("style", `max-width: calc(min(100%, ${w}px))`);
  }
  return attrs;
}

/**
 * Expands image events into `<img>` tags using the computed variants. An
 * image missing from the table leaves an empty placeholder.
 */
export function* materializeImages(
  events: Iterable<IrEvent>,
  images: ReadonlyMap<string, ImageVariants>,
): Generator<IrEvent, void, undefined> {
  for (const ev of events) {
    if (ev.type !== "image") {
      yield ev;
      continue;
    }
    const variants = images.get(ev.destination);
    if (!variants) {
      logger.warn(`image ${ev.destination} is not in the image table`);
      yield { type: "html-inline", content: "", attributes: new Attributes() };
      continue;
    }
    const attrs = imageAttributes(variants, ev.alt, ev.attributes);
    const content = `<img${attrsToString(attrs)}>`;
    yield { type: "html-inline", content, attributes: new Attributes() };
  }
}

function isFigureDiv(ev: IrEvent): ev is StartEvent {
  return ev.type === "start" && ev.container.type === "div" && ev.attributes.get("class") === "figure";
}

/**
 * Turns `div.figure` into `<figure>`, and a caption that is its last child
 * into `<figcaption>`.
 */
export function* promoteFigures(events: Iterable<IrEvent>): Generator<IrEvent, void, undefined> {
  const iter = new Peekable(events[Symbol.iterator]());
  for (const ev of iter) {
    if (!isFigureDiv(ev)) {
      yield ev;
      continue;
    }
    yield start({ type: "other", tag: "figure" }, ev.attributes.without("class"));
    const inner = new Peekable(irSpan(iter));
    let depth = 0;
    for (const child of inner) {
      const isCaption =
        child.type === "start" && child.container.type === "other" && child.container.tag === "caption";
      if (depth === 0 && isCaption) {
        const caption = [...irSpan(inner)];
        const trailing = inner.peek() === undefined;
        const tag = trailing ? "figcaption" : "caption";
        yield start({ type: "other", tag }, child.attributes);
        yield* caption;
        yield end({ type: "other", tag });
        continue;
      }
      if (child.type === "start") depth++;
      else if (child.type === "end") depth--;
      yield child;
    }
    yield end({ type: "other", tag: "figure" });
  }
}
