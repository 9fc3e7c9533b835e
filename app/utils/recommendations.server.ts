import OpenAI from "openai";
import { z } from "zod";

import type { Recommendation, TicketMetrics, TokenMap } from "~/types/qbr";
import { getOptionalEnv } from "./env.server";
import { RecommendationError } from "./errors.server";

const DEFAULT_MODEL = "gpt-4o-mini";
const MAX_RECOMMENDATIONS = 10;

const SYSTEM_PROMPT = `You are a senior IT consultant and customer success strategist for Managed Service Providers (MSPs).
Analyze the IT support data for one client and write strategic, actionable recommendations that show the MSP's value and improve the client's IT posture.

Each recommendation must:
1. Mix data-driven insight from the ticket data with general IT best practice relevant to the client.
2. Use plain, executive-friendly language.
3. Have a SHORT TITLE (5 words or fewer) and a 1-2 sentence RATIONALE.

Reply with a JSON array only, no text outside it:
[{"title": "Short Action Title", "rationale": "Why this matters and what to do."}]`;

const recommendationSchema = z.object({
  title: z.string(),
  rationale: z.string()
});

export interface RecommendationRequest {
  clientName: string;
  reviewPeriod: string;
  metrics: TicketMetrics;
  ticketSummaries: string[];
  count: number;
}

function createOpenAiClient(): OpenAI {
  const apiKey = getOptionalEnv("OPENAI_API_KEY");
  if (!apiKey) {
    throw new RecommendationError("Missing OPENAI_API_KEY. Set it to generate AI recommendations.");
  }
  return new OpenAI({ apiKey });
}

export function isAiAvailable() {
  return Boolean(getOptionalEnv("OPENAI_API_KEY"));
}

export function buildUserPrompt(request: RecommendationRequest): string {
  const { metrics } = request;
  const count = Math.min(Math.max(1, Math.floor(request.count)), MAX_RECOMMENDATIONS);
  const summaries = request.ticketSummaries
    .map((summary) => summary.trim())
    .filter(Boolean)
    .map((summary, index) => `${index + 1}. ${summary}`);

  return [
    `Generate exactly ${count} strategic recommendations for this MSP client QBR.`,
    "",
    `CLIENT: ${request.clientName}`,
    `REVIEW PERIOD: ${request.reviewPeriod}`,
    "",
    "--- AGGREGATED METRICS ---",
    `- Total Tickets: ${metrics.ticketCount}`,
    `- Same-Day Resolution Rate: ${metrics.sameDayRate}%`,
    `- Average First Response Time: ${metrics.avgFirstResponse}`,
    `- Critical Issue Resolution Time: ${metrics.criticalResolutionTime}`,
    `- Proactive Work: ${metrics.proactivePct}%`,
    `- Reactive Work: ${metrics.reactivePct}%`,
    "",
    `--- SAMPLE TICKET SUMMARIES (${summaries.length} tickets sampled) ---`,
    ...summaries,
    "",
    `Return exactly ${count} recommendations as a JSON array.`
  ].join("\n");
}

function stripCodeFence(raw: string) {
  const fenced = raw.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : raw.trim();
}

/** Parses the model's JSON reply, keeping only well-formed `{ title, rationale }` entries. */
export function parseRecommendations(raw: string): Recommendation[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    throw new RecommendationError("Recommendation reply was not valid JSON", { cause: error });
  }
  if (!Array.isArray(parsed)) {
    throw new RecommendationError("Recommendation reply was not a JSON array");
  }

  return parsed.flatMap((entry) => {
    const result = recommendationSchema.safeParse(entry);
    if (!result.success) {
      console.warn("Dropping malformed recommendation entry", entry);
      return [];
    }
    const title = result.data.title.trim();
    const rationale = result.data.rationale.trim();
    return title || rationale ? [{ title, rationale }] : [];
  });
}

export async function generateRecommendations(
  request: RecommendationRequest,
  client: OpenAI = createOpenAiClient()
): Promise<Recommendation[]> {
  const completion = await client.chat.completions.create({
    model: getOptionalEnv("OPENAI_MODEL") ?? DEFAULT_MODEL,
    temperature: 0.4,
    max_tokens: 2048,
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: buildUserPrompt(request) }
    ]
  });

  const content = completion.choices[0]?.message?.content ?? "";
  const recommendations = parseRecommendations(content);
  console.info(`Generated ${recommendations.length} recommendations for ${request.clientName}`);
  return recommendations;
}

export function manualRecommendations(texts: readonly string[]): Recommendation[] {
  return texts
    .map((text) => text.trim())
    .filter(Boolean)
    .map((text) => ({ title: text, rationale: "" }));
}

export function buildRecommendationTokens(recommendations: readonly Recommendation[]): TokenMap {
  const tokens: TokenMap = {};
  recommendations.forEach((recommendation, index) => {
    const n = index + 1;
    tokens[`RECOMMENDATION_${n}`] = [recommendation.title, recommendation.rationale].filter(Boolean).join(": ");
    tokens[`RECOMMENDATION_${n}_TITLE`] = recommendation.title;
    tokens[`RECOMMENDATION_${n}_RATIONALE`] = recommendation.rationale;
  });
  return tokens;
}
