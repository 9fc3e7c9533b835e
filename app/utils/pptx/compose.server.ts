import { readFile } from "node:fs/promises";

import { asTextUnit } from "~/types/deck";
import type { TicketClassification, TicketMetrics, TokenMap } from "~/types/qbr";
import { renderDistributionChart } from "../chart.server";
import { TemplateMissingError } from "../errors.server";
import { aggregateTicketMetrics, metricsToTokens } from "../metrics.server";
import { PresentationDeck } from "./deck.server";
import { CHART_TOKEN, findTokens, resolvePlaceholders, shapeText, wrapToken } from "./placeholders.server";
import { buildMasterTemplate } from "./template.server";

export const PPTX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.presentationml.presentation";

const CHART_NAME = "Support Distribution Chart";

export interface ComposeOptions {
  classification?: TicketClassification;
}

export interface ComposeResult {
  bytes: Buffer;
  metrics: TicketMetrics;
  slidesModified: number;
  chartSlides: number[];
}

/**
 * Reads the template at `templatePath`, or builds the bundled master template
 * when no path is configured.
 */
export async function loadTemplate(templatePath?: string): Promise<Buffer> {
  if (!templatePath) {
    return buildMasterTemplate();
  }
  try {
    return await readFile(templatePath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new TemplateMissingError(templatePath);
    }
    throw error;
  }
}

/**
 * Fills a QBR template: metrics from `tickets`, the distribution chart at the
 * first `{{CHART_PLACEHOLDER}}` of each slide, and every other token from
 * `contextTokens` and the metrics.
 */
export function composeQbrDeck(
  template: Buffer,
  contextTokens: TokenMap,
  tickets: unknown,
  options: ComposeOptions = {}
): ComposeResult {
  const metrics = aggregateTicketMetrics(tickets, options.classification);
  const chart = renderDistributionChart(metrics.proactivePct, metrics.reactivePct);

  const tokens: TokenMap = { ...contextTokens, ...metricsToTokens(metrics) };
  delete tokens[CHART_TOKEN];
  const chartMarker = wrapToken(CHART_TOKEN);

  const deck = PresentationDeck.load(template);
  const chartSlides: number[] = [];
  let slidesModified = 0;

  for (const slide of deck.slides) {
    let chartInserted = false;
    let changedRuns = 0;

    // Inserting appends to slide.shapes; only the template's own shapes are walked.
    for (const shape of [...slide.shapes]) {
      const body = asTextUnit(shape);
      // Further chart markers on the slide stay literal.
      if (!chartInserted && body?.text.includes(chartMarker)) {
        const frame = shape.frame ?? deck.centeredFrame();
        body.clear();
        slide.insertPicture(chart.png, frame, CHART_NAME);
        chartInserted = true;
        chartSlides.push(slide.number);
        console.info(`Chart inserted on slide ${slide.number}: '${slide.title}'`);
      }
      changedRuns += resolvePlaceholders(shape, tokens);
    }

    if (changedRuns > 0 || chartInserted) {
      slidesModified += 1;
    }

    const unresolved = slide.shapes.flatMap((shape) => findTokens(shapeText(shape)));
    if (unresolved.length) {
      console.info(`Slide ${slide.number} keeps unresolved tokens: ${unresolved.join(", ")}`);
    }
  }

  console.info(`Slides modified: ${slidesModified}/${deck.slides.length}`);

  return {
    bytes: deck.toBuffer(),
    metrics,
    slidesModified,
    chartSlides
  };
}
