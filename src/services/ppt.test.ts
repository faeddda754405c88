import { describe, expect, it } from "vitest";
import { captureLogger } from "../test/captureLogger";
import {
  buildDeck,
  groupShape,
  paragraph,
  picture,
  plainShape,
  run,
  tableShape,
  textBox,
  titleShape
} from "../test/deckBuilder";
import type { DeckSlide } from "../test/deckBuilder";
import { analyzePresentation, extractPresentation, translatePresentation } from "./ppt";
import { Presentation } from "./pptx/presentation";

async function open(slides: DeckSlide[]): Promise<Presentation> {
  return Presentation.load(await buildDeck(slides));
}

const bracket = async (text: string) => `[${text}]`;

describe("extractPresentation", () => {
  it("collects title, body text and notes in order", async () => {
    const presentation = await open([
      { shapes: [titleShape("Welcome"), textBox("Thank you for reading")], notes: "See appendix" }
    ]);

    expect(extractPresentation(presentation)).toEqual({
      slides: [
        {
          slide_index: 1,
          title: "Welcome",
          items: [{ type: "text", text: "Thank you for reading" }],
          notes: "See appendix"
        }
      ],
      strings: ["Welcome", "Thank you for reading", "See appendix"]
    });
  });

  it("omits the title key when a slide has no title placeholder", async () => {
    const presentation = await open([{ shapes: [textBox("Just a box")] }]);
    const [slide] = extractPresentation(presentation).slides;

    expect("title" in slide).toBe(false);
    expect("notes" in slide).toBe(false);
    expect(slide.items).toEqual([{ type: "text", text: "Just a box" }]);
  });

  it("emits table cells with 0-based positions and skips empty tables", async () => {
    const presentation = await open([
      {
        shapes: [
          tableShape([
            ["", ""],
            ["", ""],
            ["", " Total "]
          ]),
          tableShape([["", ""]], "Empty")
        ]
      }
    ]);
    const [slide] = extractPresentation(presentation).slides;

    expect(slide.items).toEqual([{ type: "table", cells: [{ r: 2, c: 1, text: "Total" }] }]);
  });

  it("records unclassified text without adding it to the string pool", async () => {
    const presentation = await open([
      { shapes: [titleShape("日本語"), tableShape([["Region", "2024"]])], notes: "42" }
    ]);
    const record = extractPresentation(presentation);

    expect(record.slides[0]).toEqual({
      slide_index: 1,
      title: "日本語",
      items: [
        {
          type: "table",
          cells: [
            { r: 0, c: 0, text: "Region" },
            { r: 0, c: 1, text: "2024" }
          ]
        }
      ],
      notes: "42"
    });
    expect(record.strings).toEqual(["Region"]);
  });

  it("keeps a body shape whose text equals the title", async () => {
    const presentation = await open([{ shapes: [titleShape("Agenda"), textBox("Agenda")] }]);
    const record = extractPresentation(presentation);

    expect(record.slides[0].title).toBe("Agenda");
    expect(record.slides[0].items).toEqual([{ type: "text", text: "Agenda" }]);
    expect(record.strings).toEqual(["Agenda"]);
  });

  it("walks into group shapes and skips shapes without text", async () => {
    const presentation = await open([
      {
        shapes: [
          picture(),
          plainShape(),
          groupShape([textBox("Inside one"), groupShape([textBox("Nested")]), textBox("   ")]),
          textBox("Line one\nLine two")
        ]
      }
    ]);
    const [slide] = extractPresentation(presentation).slides;

    expect(slide.items).toEqual([
      { type: "text", text: "Inside one" },
      { type: "text", text: "Nested" },
      { type: "text", text: "Line one\nLine two" }
    ]);
  });

  it("deduplicates strings across slides, first occurrence first", async () => {
    const presentation = await open([
      { shapes: [titleShape("Next steps"), textBox("Owner")] },
      { shapes: [titleShape("Owner"), textBox("Next steps")], notes: "Wrap up" }
    ]);
    const record = extractPresentation(presentation);

    expect(record.slides.map((s) => s.slide_index)).toEqual([1, 2]);
    expect(record.strings).toEqual(["Next steps", "Owner", "Wrap up"]);
  });

  it("is deterministic", async () => {
    const presentation = await open([
      { shapes: [titleShape("Plan"), tableShape([["a", "b"]]), textBox("Body")], notes: "Notes" }
    ]);
    expect(extractPresentation(presentation)).toEqual(extractPresentation(presentation));
  });

  it("ignores a notes page without a body placeholder", async () => {
    const presentation = await open([{ shapes: [titleShape("Hi")], notesShapes: [textBox("Not the body")] }]);
    expect("notes" in extractPresentation(presentation).slides[0]).toBe(false);
  });
});

describe("analyzePresentation", () => {
  it("counts text boxes, tables, paragraphs and characters per slide", async () => {
    const { logger, lines } = captureLogger(true);
    const presentation = await open([
      { shapes: [titleShape("Welcome"), textBox("A\nBC"), tableShape([["x"]]), plainShape(), textBox("")] },
      { shapes: [] }
    ]);

    expect(analyzePresentation(presentation, logger)).toEqual([
      { slideIndex: 1, textBoxes: 2, tables: 1, paragraphs: 3, characters: 11 },
      { slideIndex: 2, textBoxes: 0, tables: 0, paragraphs: 0, characters: 0 }
    ]);
    expect(lines[0]).toBe("09:05:03 — Slide 1 — 2 text box(es), 1 table(s), 3 paragraph(s)\n");
  });
});

describe("translatePresentation", () => {
  it("translates titles, shapes, table cells and notes in document order", async () => {
    const presentation = await open([
      {
        shapes: [
          titleShape("Welcome"),
          textBox([paragraph([run("Thank you "), run("for reading", '<a:rPr b="1"/>')])]),
          tableShape([["Name", "42"]])
        ],
        notes: "See appendix\nMore"
      }
    ]);
    const seen: string[] = [];

    const { summary } = await translatePresentation(presentation, async (text) => {
      seen.push(text);
      return bracket(text);
    });

    expect(seen).toEqual(["Welcome", "Thank you ", "for reading", "Name", "42", "See appendix\nMore"]);
    expect(summary).toEqual({ frames: 5, runs: 5, failures: [] });

    const [slide] = presentation.slides;
    const [title, body, table] = slide.shapes;
    expect(title.text).toBe("[Welcome]");
    expect(body.text).toBe("[Thank you ][for reading]");
    expect(body.textFrame?.paragraphs[0].runs[1].font.bold).toBe(true);
    expect(table.table?.rows[0].cells.map((c) => c.text)).toEqual(["[Name]", "[42]"]);
    expect(slide.notesTextFrame().text).toBe("[See appendix\nMore]");
  });

  it("translates a body shape whose text equals the title", async () => {
    const presentation = await open([{ shapes: [titleShape("Agenda"), textBox("Agenda")] }]);
    const { summary } = await translatePresentation(presentation, bracket);

    expect(presentation.slides[0].shapes.map((s) => s.text)).toEqual(["[Agenda]", "[Agenda]"]);
    expect(summary.frames).toBe(2);
  });

  it("translates members of group shapes", async () => {
    const presentation = await open([{ shapes: [groupShape([textBox("Left"), textBox("Right")])] }]);
    await translatePresentation(presentation, bracket);

    expect(presentation.slides[0].shapes[0].children.map((s) => s.text)).toEqual(["[Left]", "[Right]"]);
  });

  it("skips shapes whose name matches the ignore pattern", async () => {
    const { logger, lines } = captureLogger(true);
    const presentation = await open([{ shapes: [textBox("Acme", "Logo 1"), textBox("Hello", "Body")] }]);

    const { summary } = await translatePresentation(presentation, bracket, { logger, ignoreShapes: "^Logo" });

    expect(presentation.slides[0].shapes.map((s) => s.text)).toEqual(["Acme", "[Hello]"]);
    expect(summary.frames).toBe(1);
    expect(lines).toContain("09:05:03 — Ignored: Logo 1\n");
  });

  it("warns about an invalid ignore pattern and skips nothing", async () => {
    const { logger, lines } = captureLogger();
    const presentation = await open([{ shapes: [textBox("Acme", "Logo 1")] }]);

    await translatePresentation(presentation, bracket, { logger, ignoreShapes: "([" });

    expect(presentation.slides[0].shapes[0].text).toBe("[Acme]");
    expect(lines[0]).toBe("09:05:03 — WARN Invalid ignore pattern, no shapes skipped: ([\n");
  });

  it("keeps failed runs and reports them in the summary", async () => {
    const presentation = await open([
      { shapes: [textBox([paragraph([run("Good "), run("bad")])])], notes: "Also bad" }
    ]);

    const { summary } = await translatePresentation(presentation, async (text) => {
      if (text.includes("bad")) throw new Error("quota exceeded");
      return bracket(text);
    });

    const [slide] = presentation.slides;
    expect(slide.shapes[0].text).toBe("[Good ]bad");
    expect(slide.notesTextFrame().text).toBe("Also bad");
    expect(summary.failures.map((f) => f.text)).toEqual(["bad", "Also bad"]);
    expect(summary).toMatchObject({ frames: 2, runs: 2 });
  });

  it("keeps line breaks inside translated paragraphs", async () => {
    const presentation = await open([{ shapes: [textBox([paragraph([run("Hello"), "<a:br/>", run("World")])])] }]);

    await translatePresentation(presentation, bracket);

    expect(presentation.slides[0].shapes[0].text).toBe("[Hello]\v[World]");
  });

  it("leaves a slide-number field as it was", async () => {
    const field = '<a:fld id="{8A1C7F20-0000-4000-8000-000000000003}" type="slidenum"><a:rPr lang="en-US"/><a:t>3</a:t></a:fld>';
    const presentation = await open([
      { shapes: [textBox("Agenda"), textBox([paragraph(field)], "Slide Number Placeholder 3")] }
    ]);
    const seen: string[] = [];

    await translatePresentation(presentation, async (text) => {
      seen.push(text);
      return bracket(text);
    });

    const [, number] = presentation.slides[0].shapes;
    expect(number.text).toBe("3");
    expect(number.textFrame?.paragraphs[0].content.map((el) => el.localName)).toEqual(["fld"]);
    expect(seen).toEqual(["Agenda"]);

    const reopened = await Presentation.load(await presentation.toBuffer());
    expect(reopened.slides[0].shapes[1].text).toBe("3");
  });

  it("logs progress per slide", async () => {
    const { logger, lines } = captureLogger();
    const presentation = await open([{ shapes: [titleShape("One")] }, { shapes: [] }]);

    await translatePresentation(presentation, bracket, { logger });

    expect(lines).toEqual(["09:05:03 — Slide 1/2 — translating…\n", "09:05:03 — Slide 2/2 — translating…\n"]);
  });

  it("produces a deck that reads back translated", async () => {
    const presentation = await open([{ shapes: [titleShape("Hello"), textBox("World")], notes: "Note" }]);
    await translatePresentation(presentation, bracket);

    const reopened = await Presentation.load(await presentation.toBuffer());
    expect(extractPresentation(reopened).strings).toEqual(["[Hello]", "[World]", "[Note]"]);
  });
});
