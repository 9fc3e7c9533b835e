import PptxGenJS from "pptxgenjs";

const BLUE = "2E5C8A";
const GRAY = "4A5568";
const LIGHT_GRAY = "E2E8F0";
const LAYOUT_NAME = "QBR_4x3";

/** Context tokens the master template expects from the caller. */
export const REQUIRED_TEMPLATE_TOKENS = [
  "CLIENT_NAME",
  "REVIEW_PERIOD",
  "RECOMMENDATION_1",
  "RECOMMENDATION_2",
  "RECOMMENDATION_3",
  "MSP_CONTACT_INFO"
] as const;

type Slide = PptxGenJS.Slide;

function addHeading(slide: Slide, text: string) {
  slide.addText(text, { x: 0.5, y: 0.5, w: 9, h: 0.8, fontSize: 36, bold: true, color: BLUE });
}

function addTitleSlide(pptx: PptxGenJS) {
  const slide = pptx.addSlide();
  slide.addText("Quarterly Business Review", {
    x: 1, y: 2.5, w: 8, h: 1, fontSize: 44, bold: true, color: BLUE, align: "center"
  });
  slide.addText("{{CLIENT_NAME}}", { x: 1, y: 3.7, w: 8, h: 0.8, fontSize: 32, color: GRAY, align: "center" });
  slide.addText("{{REVIEW_PERIOD}}", { x: 1, y: 6, w: 8, h: 0.5, fontSize: 20, color: GRAY, align: "center" });
}

function addExecutiveSummary(pptx: PptxGenJS) {
  const slide = pptx.addSlide();
  addHeading(slide, "Executive Summary");
  slide.addText(
    [
      { text: "We resolved {{TICKET_COUNT}} service requests this period", options: { bullet: true, breakLine: true } },
      { text: "{{SAME_DAY_RATE}}% of closed tickets were resolved the same day", options: { bullet: true, breakLine: true } },
      { text: "Average first response: {{AVG_FIRST_RESPONSE}}", options: { bullet: true } }
    ],
    { x: 1, y: 2, w: 8, h: 4, fontSize: 24, color: GRAY, paraSpaceAfter: 20, valign: "top" }
  );
}

function addDistributionSlide(pptx: PptxGenJS) {
  const slide = pptx.addSlide();
  addHeading(slide, "Service Type Distribution");
  slide.addText("Proactive vs Reactive Support", { x: 0.5, y: 1.3, w: 9, h: 0.4, fontSize: 18, color: GRAY });
  slide.addText("{{CHART_PLACEHOLDER}}", {
    x: 0.75, y: 2.2, w: 8.5, h: 3.3, fontSize: 14, color: GRAY, align: "center"
  });
}

function addStabilitySlide(pptx: PptxGenJS) {
  const slide = pptx.addSlide();
  addHeading(slide, "Service Stability & Proactive Maintenance");
  const cards = [
    { x: 1, label: "Proactive Work", token: "{{PROACTIVE_PERCENT}}%" },
    { x: 5.5, label: "Reactive Issues", token: "{{REACTIVE_PERCENT}}%" }
  ];
  for (const card of cards) {
    slide.addShape(pptx.ShapeType.rect, {
      x: card.x, y: 2.5, w: 3.5, h: 2, fill: { color: LIGHT_GRAY }, line: { color: BLUE }
    });
    slide.addText(
      [
        { text: card.label, options: { fontSize: 18, color: GRAY, breakLine: true } },
        { text: card.token, options: { fontSize: 36, bold: true, color: BLUE } }
      ],
      { x: card.x, y: 2.7, w: 3.5, h: 1.5, align: "center" }
    );
  }
  slide.addText(
    "A higher proactive percentage indicates better preventive maintenance and system monitoring.",
    { x: 1, y: 5.5, w: 8, h: 1, fontSize: 14, italic: true, color: GRAY }
  );
}

function addPerformanceTable(pptx: PptxGenJS) {
  const slide = pptx.addSlide();
  addHeading(slide, "SLA Performance & Response Times");
  const header = { bold: true, color: "FFFFFF", fill: { color: BLUE } };
  slide.addTable(
    [
      [
        { text: "Measure", options: header },
        { text: "This Period", options: header }
      ],
      [{ text: "Tickets handled" }, { text: "{{TICKET_COUNT}}" }],
      [{ text: "Average first response" }, { text: "{{AVG_FIRST_RESPONSE}}" }],
      [{ text: "Same-day resolution" }, { text: "{{SAME_DAY_RATE}}%" }],
      [{ text: "Critical issue resolution" }, { text: "{{CRITICAL_RES_TIME}}" }]
    ],
    { x: 1.5, y: 2.3, w: 7, colW: [4, 3], fontSize: 18, color: GRAY, border: { type: "solid", pt: 1, color: LIGHT_GRAY } }
  );
}

function addRecommendations(pptx: PptxGenJS) {
  const slide = pptx.addSlide();
  addHeading(slide, "Strategic Recommendations");
  [2, 3.5, 5].forEach((y, index) => {
    slide.addShape(pptx.ShapeType.ellipse, { x: 1.2, y, w: 0.5, h: 0.5, fill: { color: BLUE } });
    slide.addText(String(index + 1), {
      x: 1.2, y, w: 0.5, h: 0.5, fontSize: 18, bold: true, color: "FFFFFF", align: "center"
    });
    slide.addText(`{{RECOMMENDATION_${index + 1}}}`, { x: 2, y, w: 6.5, h: 0.8, fontSize: 18, color: GRAY });
  });
}

function addThankYou(pptx: PptxGenJS) {
  const slide = pptx.addSlide();
  slide.addText("Thank You", { x: 1, y: 2.5, w: 8, h: 1, fontSize: 44, bold: true, color: BLUE, align: "center" });
  slide.addText("Questions? Contact your account manager", {
    x: 1, y: 4, w: 8, h: 0.6, fontSize: 20, color: GRAY, align: "center"
  });
  slide.addText("{{MSP_CONTACT_INFO}}", { x: 1, y: 5, w: 8, h: 1, fontSize: 18, color: GRAY, align: "center" });
}

/** Builds the bundled seven-slide QBR master template. */
export async function buildMasterTemplate(): Promise<Buffer> {
  const pptx = new PptxGenJS();
  pptx.defineLayout({ name: LAYOUT_NAME, width: 10, height: 7.5 });
  pptx.layout = LAYOUT_NAME;
  pptx.title = "Quarterly Business Review";

  addTitleSlide(pptx);
  addExecutiveSummary(pptx);
  addDistributionSlide(pptx);
  addStabilitySlide(pptx);
  addPerformanceTable(pptx);
  addRecommendations(pptx);
  addThankYou(pptx);

  const output = await pptx.write({ outputType: "nodebuffer" });
  if (Buffer.isBuffer(output)) {
    return output;
  }
  if (output instanceof Uint8Array) {
    return Buffer.from(output);
  }
  if (output instanceof ArrayBuffer) {
    return Buffer.from(output);
  }
  throw new Error("pptxgenjs returned an unexpected output type");
}
