import type MarkdownIt from "markdown-it";
import { createMarkdownIt, parseCommonMark } from "./commonmark";
import { Config } from "./config";
import { parseDjot } from "./djot";
import { rewriteInternalLinks, separateTitle, type EntryRef } from "./extract";
import { PrismHighlighter, type Highlighter } from "./highlight";
import type { IrEvent } from "./ir";
import { KatexMathRenderer, type MathRenderer } from "./math";
import {
  highlightCode,
  materializeImages,
  promoteFigures,
  renderMath,
  type ImageVariants,
} from "./passes";
import { createLogger } from "./utils/logger";
import { writeHtml } from "./writer";

const logger = createLogger({ file: "index" });

export type SourceKind = "djot" | "commonmark";

export type RendererOptions = {
  highlighter?: Highlighter | null;
  math?: MathRenderer | null;
  /** Paragraph text that splits summary from rest; null disables splitting. */
  moreMarker?: string | null;
  extractTitle?: boolean;
};

export type RenderContext<E extends EntryRef> = {
  images?: ReadonlyMap<string, ImageVariants>;
  entries?: ReadonlyMap<string, E>;
};

export type RenderedEntry<E extends EntryRef> = {
  title: string | null;
  summary: string;
  rest: string;
  links: E[];
};

/**
 * Renders documents of either syntax to HTML. The parser, highlighter and
 * math renderer are fixed at construction and only read afterwards, so one
 * instance serves every document of a build.
 */
export class MarkupRenderer {
  private readonly md: MarkdownIt;
  private readonly highlighter: Highlighter | null;
  private readonly math: MathRenderer | null;
  private readonly moreMarker: string | null;
  private readonly extractTitle: boolean;

  constructor(options: RendererOptions = {}) {
    this.md = createMarkdownIt();
    this.highlighter = options.highlighter ?? null;
    this.math = options.math ?? null;
    this.moreMarker = options.moreMarker === undefined ? "-more-" : options.moreMarker;
    this.extractTitle = options.extractTitle ?? true;
  }

  parse(source: string, kind: SourceKind): Generator<IrEvent, void, undefined> {
    return kind === "djot" ? parseDjot(source) : parseCommonMark(source, this.md);
  }

  render<E extends EntryRef>(
    source: string,
    kind: SourceKind,
    context: RenderContext<E> = {},
  ): RenderedEntry<E> {
    let events = [...this.parse(source, kind)];
    let title: string | null = null;
    if (this.extractTitle) {
      const separated = separateTitle(events);
      title = separated.title;
      events = separated.events;
    }
    const entries = context.entries ?? new Map<string, E>();
    const { events: linkedEvents, linked } = rewriteInternalLinks(events, entries);

    let stream: Iterable<IrEvent> = linkedEvents;
    stream = highlightCode(stream, this.highlighter);
    stream = renderMath(stream, this.math);
    stream = materializeImages(stream, context.images ?? new Map<string, ImageVariants>());
    stream = promoteFigures(stream);
    const { summary, rest } = writeHtml(stream, { moreMarker: this.moreMarker });
    logger.debug(`rendered ${kind} document: ${summary.length + rest.length} chars, ${linked.length} links`);
    return { title, summary, rest, links: linked };
  }
}

/** Builds a renderer with the backends selected by the environment. */
export function createRenderer(options: RendererOptions = {}): MarkupRenderer {
  return new MarkupRenderer({
    highlighter: options.highlighter === undefined ? new PrismHighlighter() : options.highlighter,
    math:
      options.math === undefined
        ? Config.MATH_BACKEND === "katex"
          ? new KatexMathRenderer()
          : null
        : options.math,
    moreMarker: options.moreMarker === undefined ? Config.MORE_MARKER : options.moreMarker,
    extractTitle: options.extractTitle ?? Config.EXTRACT_TITLE,
  });
}

export { Attributes, endOf } from "./ir";
export type {
  Alignment,
  Container,
  ContainerEnd,
  IrEvent,
  ListKind,
  MathKind,
  OrderedListNumbering,
  StartEvent,
  EndEvent,
} from "./ir";
export { containerSpan, containerSpanAt, collectText, Peekable } from "./span";
export { parseDjot } from "./djot";
export { createMarkdownIt, parseCommonMark } from "./commonmark";
export { highlightCode, renderMath, materializeImages, promoteFigures } from "./passes";
export type { ImageVariants } from "./passes";
export { PrismHighlighter } from "./highlight";
export type { Highlighter } from "./highlight";
export { KatexMathRenderer } from "./math";
export type { MathRenderer } from "./math";
export { HtmlWriter, writeHtml, renderHtml, renderFragment } from "./writer";
export { separateTitle, rewriteInternalLinks, INTERNAL_LINK_PREFIX } from "./extract";
export type { EntryRef } from "./extract";
export {
  MarkupError,
  UnknownInternalLinkError,
  UnknownLanguageError,
  HighlightError,
  MathError,
} from "./errors";
