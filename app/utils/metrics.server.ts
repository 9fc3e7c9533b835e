import { isValid, parseISO } from "date-fns";
import { z } from "zod";

import type { TicketClassification, TicketMetrics, TicketRecord, TokenMap } from "~/types/qbr";
import { getOptionalEnv, parseIdList } from "./env.server";

const DEFAULT_PROACTIVE_TYPE_IDS = [30, 40, 100];
const DEFAULT_REACTIVE_TYPE_IDS = [1, 10, 20, 50, 60, 61, 62, 63, 64, 65, 66, 67, 68, 69, 70, 71, 72, 9999];
const DEFAULT_CRITICAL_PRIORITY_ID = 1;
const UNSET_DATE_PREFIX = "0001";
const SUB_HOUR_RESOLUTION = "< 1 hour";
const NOT_AVAILABLE = "N/A";

export const DEFAULT_CLASSIFICATION: TicketClassification = {
  proactiveTypeIds: new Set(DEFAULT_PROACTIVE_TYPE_IDS),
  reactiveTypeIds: new Set(DEFAULT_REACTIVE_TYPE_IDS),
  criticalPriorityId: DEFAULT_CRITICAL_PRIORITY_ID
};

export const DEFAULT_METRICS: TicketMetrics = Object.freeze({
  ticketCount: 0,
  proactivePct: 0,
  reactivePct: 0,
  sameDayRate: 0,
  criticalResolutionTime: SUB_HOUR_RESOLUTION,
  avgFirstResponse: NOT_AVAILABLE
});

// A field of the wrong type reads as null; the rest of the record still counts.
const ticketRecordSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish().catch(null),
  tickettype_id: z.number().int().nullish().catch(null),
  priority_id: z.number().int().nullish().catch(null),
  hasbeenclosed: z.boolean().nullish().catch(null),
  dateoccurred: z.string().nullish().catch(null),
  responsedate: z.string().nullish().catch(null),
  dateclosed: z.string().nullish().catch(null),
  ticketage: z.number().finite().nullish().catch(null),
  summary: z.string().nullish().catch(null)
});

export function normalizeTicket(raw: unknown): TicketRecord | null {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return null;
  }
  const parsed = ticketRecordSchema.parse(raw);
  return {
    id: parsed.id ?? null,
    tickettype_id: parsed.tickettype_id ?? null,
    priority_id: parsed.priority_id ?? null,
    hasbeenclosed: parsed.hasbeenclosed ?? null,
    dateoccurred: parsed.dateoccurred ?? null,
    responsedate: parsed.responsedate ?? null,
    dateclosed: parsed.dateclosed ?? null,
    ticketage: parsed.ticketage ?? null,
    summary: parsed.summary ?? null
  };
}

/** Classification from QBR_* configuration, falling back to the built-in id sets. */
export function getConfiguredClassification(): TicketClassification {
  const critical = Number(getOptionalEnv("QBR_CRITICAL_PRIORITY_ID"));
  return {
    proactiveTypeIds: new Set(parseIdList(getOptionalEnv("QBR_PROACTIVE_TYPE_IDS"), DEFAULT_PROACTIVE_TYPE_IDS)),
    reactiveTypeIds: new Set(parseIdList(getOptionalEnv("QBR_REACTIVE_TYPE_IDS"), DEFAULT_REACTIVE_TYPE_IDS)),
    criticalPriorityId: Number.isInteger(critical) && critical > 0 ? critical : DEFAULT_CRITICAL_PRIORITY_ID
  };
}

function parseTimestamp(value: string) {
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}

function datePortion(value: string) {
  return value.split(/[T ]/)[0];
}

function percentage(part: number, whole: number) {
  return whole > 0 ? Math.floor((part * 100) / whole) : 0;
}

function formatFirstResponse(totalMinutes: number, count: number) {
  if (count === 0) return NOT_AVAILABLE;
  const average = totalMinutes / count;
  if (average < 60) {
    return `${Math.floor(average)} mins`;
  }
  return `${(average / 60).toFixed(1)} hours`;
}

function formatCriticalResolution(totalHours: number, count: number) {
  if (count === 0 || totalHours <= 0) return SUB_HOUR_RESOLUTION;
  return `${(totalHours / count).toFixed(1)} hours`;
}

/**
 * Reduces raw ticket records to the six QBR metrics.
 *
 * Never throws. Records with bad timestamps or ages are logged and left out of
 * the one metric they break; absent or empty input yields {@link DEFAULT_METRICS}.
 */
export function aggregateTicketMetrics(
  tickets: unknown,
  classification: TicketClassification = DEFAULT_CLASSIFICATION
): TicketMetrics {
  if (!Array.isArray(tickets)) {
    console.warn("No ticket data provided; using default metrics.");
    return DEFAULT_METRICS;
  }
  if (tickets.length === 0) {
    return DEFAULT_METRICS;
  }

  let proactive = 0;
  let reactive = 0;
  let closed = 0;
  let sameDay = 0;
  let critical = 0;
  let criticalHours = 0;
  let responded = 0;
  let responseMinutes = 0;

  for (const raw of tickets) {
    const ticket = normalizeTicket(raw);
    if (!ticket) {
      console.warn("Skipping ticket entry that is not an object.");
      continue;
    }

    const typeId = ticket.tickettype_id;
    if (typeId !== null && classification.proactiveTypeIds.has(typeId)) {
      proactive += 1;
    } else if (typeId !== null && classification.reactiveTypeIds.has(typeId)) {
      reactive += 1;
    }

    if (ticket.hasbeenclosed === true) {
      closed += 1;
      if (ticket.dateoccurred && ticket.dateclosed && datePortion(ticket.dateoccurred) === datePortion(ticket.dateclosed)) {
        sameDay += 1;
      }
    }

    if (ticket.priority_id === classification.criticalPriorityId) {
      critical += 1;
      if (ticket.ticketage !== null && ticket.ticketage > 0) {
        criticalHours += ticket.ticketage;
      }
    }

    if (ticket.dateoccurred && ticket.responsedate && !ticket.responsedate.startsWith(UNSET_DATE_PREFIX)) {
      const occurred = parseTimestamp(ticket.dateoccurred);
      const response = parseTimestamp(ticket.responsedate);
      if (!occurred || !response) {
        console.warn(`Skipping ticket ${ticket.id ?? "unknown"}: invalid date format.`);
        continue;
      }
      const elapsedMinutes = (response.getTime() - occurred.getTime()) / 60_000;
      if (elapsedMinutes < 0) {
        console.warn(`Skipping ticket ${ticket.id ?? "unknown"}: response date is before occurrence date.`);
        continue;
      }
      responded += 1;
      responseMinutes += elapsedMinutes;
    }
  }

  const classified = proactive + reactive;
  const proactivePct = percentage(proactive, classified);

  return Object.freeze({
    ticketCount: tickets.length,
    proactivePct,
    reactivePct: classified > 0 ? 100 - proactivePct : 0,
    sameDayRate: percentage(sameDay, closed),
    criticalResolutionTime: formatCriticalResolution(criticalHours, critical),
    avgFirstResponse: formatFirstResponse(responseMinutes, responded)
  });
}

export function metricsToTokens(metrics: TicketMetrics): TokenMap {
  return {
    TICKET_COUNT: String(metrics.ticketCount),
    PROACTIVE_PERCENT: String(metrics.proactivePct),
    REACTIVE_PERCENT: String(metrics.reactivePct),
    SAME_DAY_RATE: String(metrics.sameDayRate),
    CRITICAL_RES_TIME: metrics.criticalResolutionTime,
    AVG_FIRST_RESPONSE: metrics.avgFirstResponse
  };
}
