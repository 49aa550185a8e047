import { irStep, type IrEvent } from "./ir";

export type SpanStep = "open" | "close" | "leaf";

/**
 * Yields the events inside the container whose start was just consumed from
 * `iter`, up to but excluding the matching end. The end itself is consumed and
 * nothing after it, so the caller can keep pulling from the same iterator.
 *
 * The iterator is advanced with `next()` only; it is never closed.
 */
export function* containerSpan<E>(
  iter: Iterator<E>,
  step: (event: E) => SpanStep,
): Generator<E, void, undefined> {
  let depth = 1;
  for (;;) {
    const r = iter.next();
    if (r.done) return;
    const s = step(r.value);
    if (s === "open") {
      depth++;
    } else if (s === "close") {
      depth--;
      if (depth === 0) return;
    }
    yield r.value;
  }
}

/**
 * Like containerSpan, but `iter` is positioned at the start event. An iterator
 * whose next event is not a start gives an empty span.
 */
export function* containerSpanAt<E>(
  iter: Iterator<E>,
  step: (event: E) => SpanStep,
): Generator<E, void, undefined> {
  const first = iter.next();
  if (first.done || step(first.value) !== "open") return;
  yield* containerSpan(iter, step);
}

export function irSpan(iter: Iterator<IrEvent>): Generator<IrEvent, void, undefined> {
  return containerSpan(iter, irStep);
}

export function irSpanAt(iter: Iterator<IrEvent>): Generator<IrEvent, void, undefined> {
  return containerSpanAt(iter, irStep);
}

/** Concatenates the text leaves of a span, dropping all formatting. */
export function collectText<E>(events: Iterable<E>, textOf: (event: E) => string | null): string {
  let out = "";
  for (const ev of events) {
    const t = textOf(ev);
    if (t !== null) out += t;
  }
  return out;
}

export function irText(event: IrEvent): string | null {
  return event.type === "str" ? event.text : null;
}

/** Iterator wrapper with non-destructive lookahead. */
export class Peekable<T> implements IterableIterator<T> {
  private readonly buffer: T[] = [];
  private done = false;

  constructor(private readonly source: Iterator<T>) {}

  static of<T>(items: Iterable<T>): Peekable<T> {
    return new Peekable(items[Symbol.iterator]());
  }

  /** Returns the event `offset` positions ahead without consuming it. */
  peek(offset = 0): T | undefined {
    while (this.buffer.length <= offset) {
      if (this.done) return undefined;
      const r = this.source.next();
      if (r.done) {
        this.done = true;
        return undefined;
      }
      this.buffer.push(r.value);
    }
    return this.buffer[offset];
  }

  next(): IteratorResult<T, undefined> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) return { done: false, value };
    }
    if (this.done) return { done: true, value: undefined };
    const r = this.source.next();
    if (r.done) {
      this.done = true;
      return { done: true, value: undefined };
    }
    return { done: false, value: r.value };
  }

  [Symbol.iterator](): Peekable<T> {
    return this;
  }
}
