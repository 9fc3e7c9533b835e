import { Resvg } from "@resvg/resvg-js";

const CHART_WIDTH = 1350;
const CHART_HEIGHT = 525;
const PROACTIVE_COLOR = "#22C55E";
const REACTIVE_COLOR = "#EF4444";
const TITLE_COLOR = "#2E5C8A";
const AXIS_COLOR = "#4A5568";
const MIN_LABEL_SHARE = 10;

const PLOT = {
  left: 90,
  right: 1290,
  barTop: 150,
  barHeight: 150,
  axisY: 330
} as const;

export interface ChartArtifact {
  png: Buffer;
  svg: string;
  width: number;
  height: number;
}

export interface DistributionSplit {
  proactive: number;
  reactive: number;
}

/** With nothing classified the bar shows an even split rather than an empty chart. */
export function displaySplit(proactivePct: number, reactivePct: number): DistributionSplit {
  if (proactivePct === 0 && reactivePct === 0) {
    return { proactive: 50, reactive: 50 };
  }
  return { proactive: proactivePct, reactive: reactivePct };
}

function toX(pct: number) {
  return PLOT.left + ((PLOT.right - PLOT.left) * pct) / 100;
}

function segmentLabel(share: number, centerPct: number) {
  if (share < MIN_LABEL_SHARE) return "";
  const y = PLOT.barTop + PLOT.barHeight / 2;
  return `<text class="segment-label" x="${toX(centerPct)}" y="${y}" text-anchor="middle" dominant-baseline="central" font-size="36" font-weight="bold" fill="#FFFFFF">${Math.trunc(share)}%</text>`;
}

function axisTicks() {
  const ticks: string[] = [];
  for (let pct = 0; pct <= 100; pct += 20) {
    const x = toX(pct);
    ticks.push(
      `<line x1="${x}" y1="${PLOT.axisY}" x2="${x}" y2="${PLOT.axisY + 8}" stroke="${AXIS_COLOR}" stroke-width="2"/>`,
      `<text x="${x}" y="${PLOT.axisY + 32}" text-anchor="middle" font-size="20" fill="${AXIS_COLOR}">${pct}</text>`
    );
  }
  return ticks.join("");
}

export function buildDistributionSvg(proactivePct: number, reactivePct: number): string {
  const split = displaySplit(proactivePct, reactivePct);
  const proactiveWidth = toX(split.proactive) - PLOT.left;
  const reactiveWidth = toX(split.proactive + split.reactive) - toX(split.proactive);
  const legendY = CHART_HEIGHT - 40;

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CHART_WIDTH}" height="${CHART_HEIGHT}" viewBox="0 0 ${CHART_WIDTH} ${CHART_HEIGHT}">`,
    `<rect width="100%" height="100%" fill="#FFFFFF"/>`,
    `<text x="${CHART_WIDTH / 2}" y="70" text-anchor="middle" font-size="30" font-weight="bold" fill="${TITLE_COLOR}">Proactive vs. Reactive Support Distribution</text>`,
    `<rect class="segment-proactive" x="${PLOT.left}" y="${PLOT.barTop}" width="${proactiveWidth}" height="${PLOT.barHeight}" fill="${PROACTIVE_COLOR}"/>`,
    `<rect class="segment-reactive" x="${PLOT.left + proactiveWidth}" y="${PLOT.barTop}" width="${reactiveWidth}" height="${PLOT.barHeight}" fill="${REACTIVE_COLOR}"/>`,
    segmentLabel(split.proactive, split.proactive / 2),
    segmentLabel(split.reactive, split.proactive + split.reactive / 2),
    `<line x1="${PLOT.left}" y1="${PLOT.axisY}" x2="${PLOT.right}" y2="${PLOT.axisY}" stroke="${AXIS_COLOR}" stroke-width="2"/>`,
    axisTicks(),
    `<text x="${CHART_WIDTH / 2}" y="${PLOT.axisY + 72}" text-anchor="middle" font-size="22" fill="${AXIS_COLOR}">Percentage of Total Tickets (%)</text>`,
    `<rect x="${CHART_WIDTH / 2 - 300}" y="${legendY - 18}" width="24" height="24" fill="${PROACTIVE_COLOR}"/>`,
    `<text class="legend" x="${CHART_WIDTH / 2 - 266}" y="${legendY}" font-size="22" fill="${AXIS_COLOR}">Proactive (${Math.trunc(split.proactive)}%)</text>`,
    `<rect x="${CHART_WIDTH / 2 + 40}" y="${legendY - 18}" width="24" height="24" fill="${REACTIVE_COLOR}"/>`,
    `<text class="legend" x="${CHART_WIDTH / 2 + 74}" y="${legendY}" font-size="22" fill="${AXIS_COLOR}">Reactive (${Math.trunc(split.reactive)}%)</text>`,
    `</svg>`
  ].join("");
}

/** Renders the proactive/reactive bar to an in-memory PNG. */
export function renderDistributionChart(proactivePct: number, reactivePct: number): ChartArtifact {
  const svg = buildDistributionSvg(proactivePct, reactivePct);
  const resvg = new Resvg(svg, {
    fitTo: { mode: "width", value: CHART_WIDTH },
    background: "white",
    font: { loadSystemFonts: true }
  });
  const rendered = resvg.render();

  return {
    png: rendered.asPng(),
    svg,
    width: rendered.width,
    height: rendered.height
  };
}
