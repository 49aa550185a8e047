export class MarkupError extends Error {
  readonly detail: string | null;

  constructor(message: string, detail: string | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = "MarkupError";
    this.detail = detail;
  }
}

export class UnknownInternalLinkError extends MarkupError {
  constructor(readonly destination: string) {
    super(`unknown internal link: ${destination}`, destination);
    this.name = "UnknownInternalLinkError";
  }
}

/** Raised by a highlighter that has no grammar for the requested language. */
export class UnknownLanguageError extends MarkupError {
  constructor(readonly language: string) {
    super(`unknown highlight language: ${language}`, language);
    this.name = "UnknownLanguageError";
  }
}

export class HighlightError extends MarkupError {
  constructor(
    readonly language: string,
    code: string,
    cause: unknown,
  ) {
    super(`failed to highlight ${language} code block`, code, { cause });
    this.name = "HighlightError";
  }
}

export class MathError extends MarkupError {
  constructor(
    readonly source: string,
    readonly display: boolean,
    cause: unknown,
  ) {
    super(`failed to render ${display ? "display" : "inline"} math`, source, { cause });
    this.name = "MathError";
  }
}
