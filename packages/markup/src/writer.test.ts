import { MarkupError } from "./errors";
import { Attributes, end, endOf, start, str, type Container, type IrEvent, type ListKind } from "./ir";
import { HtmlWriter, renderFragment, renderHtml, writeHtml } from "./writer";

function wrap(container: Container, inner: IrEvent[], attrs?: Attributes): IrEvent[] {
  return [start(container, attrs), ...inner, end(endOf(container))];
}

function para(...inner: IrEvent[]): IrEvent[] {
  return wrap({ type: "paragraph" }, inner);
}

function list(kind: ListKind, tight: boolean, ...items: string[]): IrEvent[] {
  return wrap(
    { type: "list", kind, tight },
    items.flatMap((text) => wrap({ type: "list-item" }, para(str(text)))),
  );
}

function footnoteDef(label: string, text: string): IrEvent[] {
  return wrap({ type: "footnote", label }, para(str(text)));
}

const FOOTNOTES_OPEN = '<hr>\n<aside class="footnotes" role="doc-endnotes">\n<ol>\n';
const FOOTNOTES_CLOSE = "</ol>\n</aside>\n";

function noteRef(n: number): string {
  return `<sup class="footnote-reference"><a role="doc-noteref" href="#fn-${n}">${n}</a></sup>`;
}

function noteDef(n: number, text: string): string {
  return `<li class="footnote-definition" id="fn-${n}" role="doc-footnote">\n<p>${text}</p>\n</li>\n`;
}

describe("HtmlWriter", () => {
  it("writes a paragraph", () => {
    expect(renderHtml(para(str("hello")))).toBe("<p>hello</p>\n");
  });

  it("escapes text and attribute values", () => {
    expect(renderHtml(para(str(`<script>&"'`)))).toBe("<p>&lt;script&gt;&amp;&quot;&#x27;</p>\n");
    const link = wrap({ type: "link", destination: `/a?b=1&c="d"` }, [str("x")]);
    expect(renderHtml(para(...link))).toBe('<p><a href="/a?b=1&amp;c=&quot;d&quot;">x</a></p>\n');
  });

  it("writes raw html without escaping", () => {
    const events: IrEvent[] = [
      ...para(str("a"), { type: "html-inline", content: "<br />", attributes: new Attributes() }, str("b")),
      { type: "html-block", content: "<div>raw</div>\n", attributes: new Attributes() },
      { type: "html-block", content: "<b>x</b>", attributes: Attributes.of(["class", "note"]) },
    ];
    expect(renderHtml(events)).toBe('<p>a<br />b</p>\n<div>raw</div>\n<div class="note"><b>x</b></div>\n');
  });

  it("nests a heading in its section with an anchor", () => {
    const heading = wrap({ type: "heading", level: 2, id: "intro" }, [str("Intro")], Attributes.of(["class", "big"]));
    const events = wrap({ type: "section", id: "intro" }, [...heading, ...para(str("text"))]);
    expect(renderHtml(events)).toBe(
      '<section id="intro">\n<h2 class="big"><a href="#intro">Intro</a></h2>\n<p>text</p>\n</section>\n',
    );
  });

  it("puts the id on a heading outside a section", () => {
    const events = wrap({ type: "heading", level: 3, id: "x" }, [str("X")]);
    expect(renderHtml(events)).toBe('<h3 id="x"><a href="#x">X</a></h3>\n');
  });

  it("drops paragraphs in tight lists only", () => {
    expect(renderHtml(list({ type: "unordered" }, true, "one", "two"))).toBe(
      "<ul>\n<li>one</li>\n<li>two</li>\n</ul>\n",
    );
    expect(renderHtml(list({ type: "unordered" }, false, "one", "two"))).toBe(
      "<ul>\n<li>\n<p>one</p>\n</li>\n<li>\n<p>two</p>\n</li>\n</ul>\n",
    );
  });

  it("consults only the innermost list for tightness", () => {
    const inner = list({ type: "unordered" }, false, "inner");
    const events = wrap({ type: "list", kind: { type: "unordered" }, tight: true }, [
      ...wrap({ type: "list-item" }, [...para(str("outer")), ...inner]),
    ]);
    expect(renderHtml(events)).toBe("<ul>\n<li>outer\n<ul>\n<li>\n<p>inner</p>\n</li>\n</ul>\n</li>\n</ul>\n");
  });

  it("writes ordered list numbering and start", () => {
    expect(renderHtml(list({ type: "ordered", numbering: "decimal", start: 1 }, true, "a"))).toBe(
      "<ol>\n<li>a</li>\n</ol>\n",
    );
    expect(renderHtml(list({ type: "ordered", numbering: "decimal", start: 3 }, true, "a"))).toBe(
      '<ol start="3">\n<li>a</li>\n</ol>\n',
    );
    expect(renderHtml(list({ type: "ordered", numbering: "alpha-lower", start: 1 }, true, "a"))).toBe(
      '<ol type="a">\n<li>a</li>\n</ol>\n',
    );
    expect(renderHtml(list({ type: "ordered", numbering: "roman-upper", start: 4 }, true, "a"))).toBe(
      '<ol start="4" type="I">\n<li>a</li>\n</ol>\n',
    );
  });

  it("writes task lists", () => {
    const events = wrap({ type: "list", kind: { type: "task" }, tight: true }, [
      ...wrap({ type: "task-list-item", checked: false }, para(str("todo"))),
      ...wrap({ type: "task-list-item", checked: true }, para(str("done"))),
    ]);
    expect(renderHtml(events)).toBe(
      '<ul class="task-list">\n' +
        '<li class="unchecked" data-checked="false">todo</li>\n' +
        '<li class="checked" data-checked="true">done</li>\n' +
        "</ul>\n",
    );
  });

  it("writes description lists", () => {
    const events = wrap({ type: "description-list" }, [
      ...wrap({ type: "description-term" }, [str("Term")]),
      ...wrap({ type: "description-details" }, para(str("Def"))),
    ]);
    expect(renderHtml(events)).toBe("<dl>\n<dt>Term</dt>\n<dd>\n<p>Def</p>\n</dd>\n</dl>\n");
  });

  it("writes table head cells as th and aligns cells", () => {
    const cell = (text: string, alignment: "unspecified" | "right", head: boolean) =>
      wrap({ type: "table-cell", alignment, head }, [str(text)]);
    const events = wrap({ type: "table" }, [
      ...wrap({ type: "table-head" }, wrap({ type: "table-row" }, [...cell("h", "unspecified", false)])),
      ...wrap({ type: "table-body" }, wrap({ type: "table-row" }, [...cell("c", "right", false)])),
    ]);
    expect(renderHtml(events)).toBe(
      "<table>\n<thead>\n<tr>\n<th>h</th>\n</tr>\n</thead>\n" +
        '<tbody>\n<tr>\n<td style="text-align: right;">c</td>\n</tr>\n</tbody>\n</table>\n',
    );
  });

  it("writes leaves that no pass expanded", () => {
    const events: IrEvent[] = [
      ...para(
        { type: "image", destination: "a.png", alt: "A", attributes: new Attributes() },
        { type: "math", kind: "inline", source: "x<2", attributes: new Attributes() },
      ),
      { type: "code-block", language: "", code: "a < b\n", attributes: new Attributes() },
      { type: "tag", tag: "hr", attributes: new Attributes() },
    ];
    expect(renderHtml(events)).toBe(
      '<p><img alt="A" src="a.png"><span class="math">x&lt;2</span></p>\n' +
        "<pre><code>a &lt; b\n</code></pre>\n<hr>\n",
    );
  });

  it("numbers footnotes at first sight", () => {
    const events = [
      ...para(str("x"), { type: "footnote-reference", label: "b" }, { type: "footnote-reference", label: "a" }),
      ...footnoteDef("a", "A note"),
      ...footnoteDef("b", "B note"),
    ];
    expect(renderHtml(events)).toBe(
      `<p>x${noteRef(1)}${noteRef(2)}</p>\n` +
        FOOTNOTES_OPEN +
        noteDef(1, "B note") +
        noteDef(2, "A note") +
        FOOTNOTES_CLOSE,
    );
  });

  it("numbers a definition seen before its reference", () => {
    const events = [...footnoteDef("early", "Early"), ...para({ type: "footnote-reference", label: "early" })];
    expect(renderHtml(events)).toBe(`<p>${noteRef(1)}</p>\n` + FOOTNOTES_OPEN + noteDef(1, "Early") + FOOTNOTES_CLOSE);
  });

  it("leaves a placeholder for a missing definition", () => {
    const events = para(str("x"), { type: "footnote-reference", label: "gone" });
    expect(renderHtml(events)).toBe(
      `<p>x${noteRef(1)}</p>\n` +
        FOOTNOTES_OPEN +
        '<li class="footnote-definition" id="fn-1" role="doc-footnote"></li>\n' +
        FOOTNOTES_CLOSE,
    );
  });

  it("appends a duplicate definition to the first", () => {
    const events = [...para({ type: "footnote-reference", label: "d" }), ...footnoteDef("d", "one"), ...footnoteDef("d", "two")];
    expect(renderHtml(events)).toBe(
      `<p>${noteRef(1)}</p>\n` + FOOTNOTES_OPEN + noteDef(1, "one") + noteDef(1, "two") + FOOTNOTES_CLOSE,
    );
  });

  it("rejects an end that does not close the innermost container", () => {
    const writer = new HtmlWriter();
    writer.write(start({ type: "paragraph" }));
    writer.write(start({ type: "other", tag: "em" }));
    expect(() => writer.write(end({ type: "paragraph" }))).toThrow(MarkupError);
  });

  it("rejects unclosed containers at the end", () => {
    const writer = new HtmlWriter();
    writer.write(start({ type: "div" }));
    expect(() => writer.finish()).toThrow("unclosed container: div");
  });

  it("rejects a list end without a list", () => {
    const writer = new HtmlWriter();
    expect(() => writer.write(end({ type: "list", kind: { type: "unordered" } }))).toThrow(MarkupError);
  });
});

describe("writeHtml", () => {
  const marker = "-more-";

  it("splits at the marker paragraph", () => {
    const events = [...para(str("Intro")), ...para(str(marker)), ...para(str("Body"))];
    expect(writeHtml(events, { moreMarker: marker })).toEqual({
      summary: "<p>Intro</p>\n",
      rest: "<p>Body</p>\n",
    });
  });

  it("returns an empty rest without a marker", () => {
    const events = [...para(str("Intro")), ...para(str("Body"))];
    expect(writeHtml(events, { moreMarker: marker })).toEqual({
      summary: "<p>Intro</p>\n<p>Body</p>\n",
      rest: "",
    });
  });

  it("keeps a marker paragraph with other content", () => {
    const events = para(str(marker), str(" and more"));
    expect(writeHtml(events, { moreMarker: marker })).toEqual({
      summary: "<p>-more- and more</p>\n",
      rest: "",
    });
  });

  it("puts footnotes into the rest when split", () => {
    const events = [
      ...para(str("a"), { type: "footnote-reference", label: "n" }),
      ...para(str(marker)),
      ...para(str("b")),
      ...footnoteDef("n", "Note"),
    ];
    const { summary, rest } = writeHtml(events, { moreMarker: marker });
    expect(summary).toBe(`<p>a${noteRef(1)}</p>\n`);
    expect(rest).toBe("<p>b</p>\n" + FOOTNOTES_OPEN + noteDef(1, "Note") + FOOTNOTES_CLOSE);
  });

  it("splits at a marker directly inside a section", () => {
    const events = wrap({ type: "section", id: "s" }, [...para(str("Intro")), ...para(str(marker)), ...para(str("Body"))]);
    expect(writeHtml(events, { moreMarker: marker })).toEqual({
      summary: '<section id="s">\n<p>Intro</p>\n',
      rest: "<p>Body</p>\n</section>\n",
    });
  });

  it("does not split inside a list item", () => {
    const events = list({ type: "unordered" }, true, "a", marker, "b");
    expect(writeHtml(events, { moreMarker: marker })).toEqual({
      summary: "<ul>\n<li>a</li>\n<li>-more-</li>\n<li>b</li>\n</ul>\n",
      rest: "",
    });
  });

  it("ignores the marker when splitting is disabled", () => {
    const events = para(str(marker));
    expect(writeHtml(events)).toEqual({ summary: "<p>-more-</p>\n", rest: "" });
  });
});

describe("renderFragment", () => {
  it("keeps footnote references and drops the footnote list", () => {
    expect(renderFragment([str("T"), { type: "footnote-reference", label: "n" }])).toBe(`T${noteRef(1)}`);
  });

  it("rejects unclosed containers", () => {
    expect(() => renderFragment([start({ type: "paragraph" })])).toThrow(MarkupError);
  });
});
