// @vitest-environment node
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { TemplateMissingError } from "~/utils/errors.server";
import { composeQbrDeck, loadTemplate } from "../compose.server";
import { PresentationDeck } from "../deck.server";
import { shapeText } from "../placeholders.server";
import { buildTestDeck, textShape } from "./fixtures";

const FRAME = { x: 685800, y: 2011680, cx: 7772400, cy: 3017520 };

const tickets = [
  { id: 1, tickettype_id: 30, hasbeenclosed: true, dateoccurred: "2025-02-03T08:00:00", dateclosed: "2025-02-03T10:00:00" },
  { id: 2, tickettype_id: 1, hasbeenclosed: true, dateoccurred: "2025-02-04T08:00:00", dateclosed: "2025-02-05T10:00:00" }
];

function sampleTemplate() {
  return buildTestDeck([
    [
      textShape(2, "Title", [["{{CLIENT_NAME}}"]]),
      textShape(3, "Count", [["Tickets: {{TICKET_COUNT}}"]]),
      textShape(4, "Unknown", [["{{UNKNOWN_TOKEN}}"]])
    ],
    [
      textShape(2, "Chart", [["{{CHART_PLACEHOLDER}}"]], FRAME),
      textShape(3, "Extra", [["{{CHART_PLACEHOLDER}} again"]])
    ],
    [textShape(2, "Static", [["Static"]])],
    [textShape(2, "Loose chart", [["{{CHART_PLACEHOLDER}}"]])]
  ]);
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("composeQbrDeck", () => {
  it("fills tokens and places one chart per marked slide", () => {
    const result = composeQbrDeck(sampleTemplate(), { CLIENT_NAME: "Acme Corp", CHART_PLACEHOLDER: "" }, tickets);

    expect(result.metrics).toMatchObject({ ticketCount: 2, proactivePct: 50, reactivePct: 50, sameDayRate: 50 });
    expect(result.chartSlides).toEqual([2, 4]);
    expect(result.slidesModified).toBe(3);

    const deck = PresentationDeck.load(result.bytes);
    expect(deck.slides[0].shapes.map(shapeText)).toEqual(["Acme Corp", "Tickets: 2", "{{UNKNOWN_TOKEN}}"]);

    const chartSlide = deck.slides[1].shapes;
    expect(chartSlide.map(shapeText)).toEqual(["", "{{CHART_PLACEHOLDER}} again", ""]);
    expect(chartSlide[2]).toEqual({ kind: "other", name: "Support Distribution Chart", frame: FRAME });

    expect(deck.slides[2].shapes.map(shapeText)).toEqual(["Static"]);
    expect(deck.slides[3].shapes[1]).toEqual({
      kind: "other",
      name: "Support Distribution Chart",
      frame: deck.centeredFrame()
    });
  });

  it("logs tokens that stay unresolved", () => {
    composeQbrDeck(sampleTemplate(), { CLIENT_NAME: "Acme Corp" }, tickets);
    expect(console.info).toHaveBeenCalledWith("Slide 1 keeps unresolved tokens: UNKNOWN_TOKEN");
    expect(console.info).toHaveBeenCalledWith("Slide 2 keeps unresolved tokens: CHART_PLACEHOLDER");
    expect(console.info).toHaveBeenCalledWith("Slides modified: 3/4");
  });

  it("lets computed metrics win over context values of the same name", () => {
    const result = composeQbrDeck(sampleTemplate(), { TICKET_COUNT: "999" }, tickets);
    const deck = PresentationDeck.load(result.bytes);
    expect(shapeText(deck.slides[0].shapes[1])).toBe("Tickets: 2");
  });

  it("composes with default metrics when there are no tickets", () => {
    const result = composeQbrDeck(sampleTemplate(), {}, []);
    const deck = PresentationDeck.load(result.bytes);
    expect(shapeText(deck.slides[0].shapes[1])).toBe("Tickets: 0");
    expect(result.chartSlides).toEqual([2, 4]);
  });
});

describe("loadTemplate", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "qbr-template-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a template from disk", async () => {
    const templatePath = path.join(dir, "custom.pptx");
    const bytes = sampleTemplate();
    await writeFile(templatePath, bytes);
    expect((await loadTemplate(templatePath)).equals(bytes)).toBe(true);
  });

  it("raises TemplateMissingError for an absent file", async () => {
    const templatePath = path.join(dir, "missing.pptx");
    await expect(loadTemplate(templatePath)).rejects.toBeInstanceOf(TemplateMissingError);
    await expect(loadTemplate(templatePath)).rejects.toThrow(`Template file not found: ${templatePath}`);
  });
});
