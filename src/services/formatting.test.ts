import { describe, expect, it, vi } from "vitest";
import { captureLogger } from "../test/captureLogger";
import { NS_DECL, paragraph, run } from "../test/deckBuilder";
import { rewriteTextFrame, snapshotTextFrame, translateOrKeep } from "./formatting";
import { TextFrame } from "./pptx/text";
import { NS, childPath, parseXml } from "./pptx/xml";
import type { ParagraphSnapshot, TranslationFailure } from "../utils/types";

function frameFrom(...paragraphs: string[]): TextFrame {
  const doc = parseXml(`<p:txBody ${NS_DECL}><a:bodyPr/><a:lstStyle/>${paragraphs.join("")}</p:txBody>`, "test.xml");
  return new TextFrame(doc.documentElement);
}

const upper = async (text: string) => text.toUpperCase();

function runTexts(snapshot: ParagraphSnapshot[]): string[][] {
  return snapshot.map((p) => p.content.flatMap((item) => (item.kind === "run" ? [item.text] : [])));
}

// Run fonts, with breaks and fields by kind.
function layoutOf(snapshot: ParagraphSnapshot[]) {
  return snapshot.map((p) => p.content.map((item) => (item.kind === "run" ? item.font : item.kind)));
}


function styledFrame(): TextFrame {
  return frameFrom(
    paragraph(
      [
        run("Hello ", '<a:rPr lang="en-US" sz="2000" b="1"/>'),
        run("world", '<a:rPr lang="en-US" i="1" u="sng"><a:solidFill><a:srgbClr val="336699"/></a:solidFill></a:rPr>')
      ],
      '<a:pPr algn="ctr" lvl="1"><a:spcAft><a:spcPts val="0"/></a:spcAft></a:pPr>'
    ),
    paragraph(""),
    paragraph(
      run("Bye", '<a:rPr><a:latin typeface="Georgia"/></a:rPr>'),
      '<a:pPr><a:lnSpc><a:spcPct val="90000"/></a:lnSpc><a:spcBef><a:spcPts val="0"/></a:spcBef></a:pPr>'
    )
  );
}

describe("rewriteTextFrame", () => {
  it("keeps paragraph and run layout and formatting", async () => {
    const frame = styledFrame();
    const before = snapshotTextFrame(frame);

    const result = await rewriteTextFrame(frame, upper);

    expect(result).toEqual({ rewritten: true, runs: 3, failures: [] });
    const after = snapshotTextFrame(frame);
    expect(runTexts(after)).toEqual([["HELLO ", "WORLD"], [], ["BYE"]]);
    expect(after.map((p) => p.format)).toEqual(before.map((p) => p.format));
    expect(layoutOf(after)).toEqual(layoutOf(before));
  });

  it("keeps line breaks between translated runs", async () => {
    const frame = frameFrom(paragraph([run("Hello"), "<a:br/>", run("World")]));
    expect(frame.text).toBe("Hello\vWorld");

    const result = await rewriteTextFrame(frame, upper);

    expect(frame.text).toBe("HELLO\vWORLD");
    expect(result.runs).toBe(2);
  });

  it("puts fields back untranslated", async () => {
    const field = '<a:fld id="{5C2A1E3B-0000-4000-8000-000000000001}" type="slidenum"><a:rPr lang="en-US"/><a:t>3</a:t></a:fld>';
    const frame = frameFrom(paragraph(field), paragraph([run("Page "), field]));
    const translate = vi.fn(upper);

    const result = await rewriteTextFrame(frame, translate);

    expect(frame.text).toBe("3\nPAGE 3");
    expect(translate.mock.calls.map(([text]) => text)).toEqual(["Page "]);
    expect(result.runs).toBe(1);
    expect(frame.paragraphs[1].content.map((el) => el.localName)).toEqual(["r", "fld"]);
    expect(frame.paragraphs[0].content[0].getAttribute("type")).toBe("slidenum");
  });

  it("keeps color transforms and preset colors", async () => {
    const tinted =
      '<a:solidFill><a:schemeClr val="tx1"><a:lumMod val="50000"/><a:lumOff val="50000"/></a:schemeClr></a:solidFill>';
    const preset = '<a:solidFill><a:prstClr val="red"/></a:solidFill>';
    const frame = frameFrom(paragraph([run("Grey", `<a:rPr>${tinted}</a:rPr>`), run("Red", `<a:rPr>${preset}</a:rPr>`)]));

    await rewriteTextFrame(frame, upper);

    expect(frame.text).toBe("GREYRED");
    const [grey, red] = frame.paragraphs[0].runs;
    expect(grey.font.color).toEqual({
      model: "schemeClr",
      attributes: { val: "tx1" },
      transforms: [
        { name: "lumMod", val: "50000" },
        { name: "lumOff", val: "50000" }
      ]
    });
    expect(red.font.color).toEqual({ model: "prstClr", attributes: { val: "red" }, transforms: [] });
    const scheme = childPath(grey.element, [NS.a, "rPr"], [NS.a, "solidFill"], [NS.a, "schemeClr"]);
    expect(scheme?.getAttribute("val")).toBe("tx1");
    expect(scheme?.childNodes.length).toBe(2);
  });

  it("writes zero spacing rather than dropping it", async () => {
    const frame = styledFrame();
    await rewriteTextFrame(frame, upper);

    const [first, , third] = frame.paragraphs;
    expect(first.spaceAfter).toBe(0);
    expect(third.spaceBefore).toBe(0);
    expect(third.lineSpacing).toEqual({ kind: "lines", value: 0.9 });
    expect(third.runs[0].font.name).toBe("Georgia");
  });

  it("keeps the original text of a run whose translation fails", async () => {
    const { logger, lines } = captureLogger();
    const frame = styledFrame();
    const translate = async (text: string) => {
      if (text === "world") throw new Error("boom");
      return text.toUpperCase();
    };

    const result = await rewriteTextFrame(frame, translate, logger);

    expect(frame.text).toBe("HELLO world\n\nBYE");
    expect(result.runs).toBe(3);
    expect(result.failures.map((f) => [f.text, f.error.message])).toEqual([["world", "boom"]]);
    expect(lines).toEqual(['09:05:03 — WARN Failed to translate text: "world" (boom)\n']);
  });

  it("leaves a blank frame alone", async () => {
    const frame = frameFrom(paragraph(run("   ")), paragraph(""));
    const translate = vi.fn(upper);

    const result = await rewriteTextFrame(frame, translate);

    expect(result).toEqual({ rewritten: false, runs: 0, failures: [] });
    expect(translate).not.toHaveBeenCalled();
    expect(frame.paragraphs).toHaveLength(2);
  });

  it("translates runs in reading order", async () => {
    const seen: string[] = [];
    const frame = frameFrom(paragraph([run("a"), run("b")]), paragraph(run("c")));
    await rewriteTextFrame(frame, async (text) => {
      seen.push(text);
      return text;
    });
    expect(seen).toEqual(["a", "b", "c"]);
  });
});

describe("translateOrKeep", () => {
  it("wraps non-Error rejections", async () => {
    const failures: TranslationFailure[] = [];
    const result = await translateOrKeep("Hi", () => Promise.reject("offline"), failures);

    expect(result).toBe("Hi");
    expect(failures).toHaveLength(1);
    expect(failures[0].error).toBeInstanceOf(Error);
    expect(failures[0].error.message).toBe("offline");
  });
});
