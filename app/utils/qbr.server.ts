import { format, parseISO } from "date-fns";

import type { HaloClientSummary, QbrRequest, QbrResult, Recommendation, TokenMap } from "~/types/qbr";
import { getOptionalEnv } from "./env.server";
import { fixtureClients, loadHaloFixture } from "./fixture.server";
import { fetchHaloClients, fetchHaloTickets } from "./halo.server";
import { aggregateTicketMetrics, getConfiguredClassification, normalizeTicket } from "./metrics.server";
import { composeQbrDeck, loadTemplate } from "./pptx/compose.server";
import { CHART_TOKEN, findMissingTokens } from "./pptx/placeholders.server";
import { REQUIRED_TEMPLATE_TOKENS } from "./pptx/template.server";
import {
  buildRecommendationTokens,
  generateRecommendations,
  isAiAvailable,
  manualRecommendations
} from "./recommendations.server";

export function formatReviewPeriod(startDate: string, endDate: string) {
  return `${format(parseISO(startDate), "MMMM d, yyyy")} - ${format(parseISO(endDate), "MMMM d, yyyy")}`;
}

export function buildQbrFilename(clientName: string, startDate: string) {
  const safeName = clientName.trim().replace(/\s+/g, "_").replace(/[\\/:*?"<>|]/g, "-") || "Client";
  return `${safeName}_QBR_${format(parseISO(startDate), "yyyyMMdd")}.pptx`;
}

function belongsToClient(ticket: unknown, clientId: number) {
  if (typeof ticket !== "object" || ticket === null || !("client_id" in ticket)) return true;
  return ticket.client_id === clientId;
}

export async function listClients(): Promise<HaloClientSummary[]> {
  const fixturePath = getOptionalEnv("HALO_FIXTURE_PATH");
  if (fixturePath) {
    return fixtureClients(await loadHaloFixture(fixturePath));
  }
  return fetchHaloClients();
}

async function loadTickets(request: QbrRequest): Promise<unknown[]> {
  const fixturePath = getOptionalEnv("HALO_FIXTURE_PATH");
  if (fixturePath) {
    const fixture = await loadHaloFixture(fixturePath);
    return fixture.tickets.filter((ticket) => belongsToClient(ticket, request.clientId));
  }
  return fetchHaloTickets({
    clientId: request.clientId,
    startDate: request.startDate,
    endDate: request.endDate
  });
}

async function resolveRecommendations(
  request: QbrRequest,
  tickets: unknown[],
  reviewPeriod: string
): Promise<Recommendation[]> {
  const plan = request.recommendations;
  if (plan.mode === "manual") {
    return manualRecommendations(plan.items);
  }
  if (!isAiAvailable()) {
    console.warn("AI recommendations requested but OPENAI_API_KEY is not set; leaving recommendations empty.");
    return [];
  }

  const ticketSummaries = tickets
    .slice(0, plan.sampleSize)
    .map((ticket) => normalizeTicket(ticket)?.summary ?? "")
    .filter(Boolean);

  return generateRecommendations({
    clientName: request.clientName,
    reviewPeriod,
    metrics: aggregateTicketMetrics(tickets, getConfiguredClassification()),
    ticketSummaries,
    count: plan.count
  });
}

/** Runs one QBR generation end to end and returns the finished deck. */
export async function generateClientQbr(request: QbrRequest): Promise<QbrResult> {
  const tickets = await loadTickets(request);
  if (!tickets.length) {
    console.warn(`No tickets found for ${request.clientName} between ${request.startDate} and ${request.endDate}.`);
  }

  const reviewPeriod = formatReviewPeriod(request.startDate, request.endDate);
  const recommendations = await resolveRecommendations(request, tickets, reviewPeriod);

  const contextTokens: TokenMap = {
    CLIENT_NAME: request.clientName,
    REVIEW_PERIOD: reviewPeriod,
    MSP_CONTACT_INFO: request.mspContact,
    [CHART_TOKEN]: "",
    ...buildRecommendationTokens(recommendations)
  };

  const missing = findMissingTokens(contextTokens, REQUIRED_TEMPLATE_TOKENS);
  if (missing.length) {
    console.warn(`Missing data for: ${missing.join(", ")}`);
  }

  const template = await loadTemplate(getOptionalEnv("QBR_TEMPLATE_PATH"));
  const result = composeQbrDeck(template, contextTokens, tickets, {
    classification: getConfiguredClassification()
  });

  const filename = buildQbrFilename(request.clientName, request.startDate);
  console.info(`QBR generated for ${request.clientName}: ${filename}`);

  return {
    bytes: result.bytes,
    filename,
    metrics: result.metrics,
    ticketCount: tickets.length
  };
}
