import { z } from "zod";

import type { HaloClientSummary } from "~/types/qbr";
import { getOptionalEnv, getServerEnv } from "./env.server";
import { HaloApiError } from "./errors.server";

const DEFAULT_SCOPE = "all";
const PAGE_SIZE = 100;
const MAX_PAGES = 50;
const CLIENTS_TTL_MS = 5 * 60_000;
const TOKEN_REFRESH_MARGIN_MS = 60_000;
const DEFAULT_TOKEN_LIFETIME_S = 3600;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional()
});

const clientsResponseSchema = z.object({
  clients: z.array(z.object({ id: z.number().int(), name: z.string() }).passthrough()).default([])
});

const ticketsPageSchema = z.object({
  record_count: z.number().int().nonnegative().optional(),
  tickets: z.array(z.unknown()).nullish()
});

type QueryParams = Record<string, string | number | boolean | undefined>;

interface TicketQuery {
  clientId: number;
  startDate: string;
  endDate: string;
  pageSize?: number;
  maxPages?: number;
}

let cachedToken: { value: string; expiresAt: number } | null = null;
let cachedClients: { value: HaloClientSummary[]; expiresAt: number } | null = null;

function haloHost() {
  return getServerEnv("HALO_HOST").replace(/\/+$/, "");
}

async function readError(response: Response) {
  const message = await response.text();
  return new HaloApiError(response.status, message || response.statusText);
}

/** Exchanges the configured client credentials for a bearer token, reusing it until shortly before expiry. */
export async function authenticate(): Promise<string> {
  if (cachedToken && cachedToken.expiresAt > Date.now()) {
    return cachedToken.value;
  }

  const body = new URLSearchParams({
    grant_type: "client_credentials",
    client_id: getServerEnv("HALO_CLIENT_ID"),
    client_secret: getServerEnv("HALO_CLIENT_SECRET"),
    scope: getOptionalEnv("HALO_SCOPE") ?? DEFAULT_SCOPE
  });

  const response = await fetch(`${haloHost()}/auth/token`, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: body.toString()
  });

  if (!response.ok) {
    throw await readError(response);
  }

  const token = tokenResponseSchema.parse(await response.json());
  const lifetimeMs = (token.expires_in ?? DEFAULT_TOKEN_LIFETIME_S) * 1000;
  cachedToken = {
    value: token.access_token,
    expiresAt: Date.now() + Math.max(0, lifetimeMs - TOKEN_REFRESH_MARGIN_MS)
  };
  return token.access_token;
}

async function haloRequest(path: string, params: QueryParams): Promise<unknown> {
  const url = new URL(`${haloHost()}/api/${path}`);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }

  const token = await authenticate();
  const response = await fetch(url.toString(), {
    headers: {
      Accept: "application/json",
      "Content-Type": "application/json",
      Authorization: `Bearer ${token}`
    }
  });

  if (!response.ok) {
    throw await readError(response);
  }

  return response.json();
}

export async function fetchHaloClients(): Promise<HaloClientSummary[]> {
  if (cachedClients && cachedClients.expiresAt > Date.now()) {
    return cachedClients.value;
  }

  const payload = clientsResponseSchema.parse(await haloRequest("Client", { includeinactive: false }));
  const clients = payload.clients
    .map(({ id, name }) => ({ id, name: name.trim() || `Client ${id}` }))
    .sort((a, b) => a.name.localeCompare(b.name));

  cachedClients = { value: clients, expiresAt: Date.now() + CLIENTS_TTL_MS };
  return clients;
}

/**
 * Fetches every ticket for a client inside the date range, newest first. Pages
 * until the declared record count is reached, a short page comes back, or the
 * page cap is hit.
 */
export async function fetchHaloTickets(query: TicketQuery): Promise<unknown[]> {
  const pageSize = query.pageSize ?? PAGE_SIZE;
  const maxPages = query.maxPages ?? MAX_PAGES;
  const tickets: unknown[] = [];
  let declaredTotal: number | null = null;

  for (let page = 1; page <= maxPages; page += 1) {
    const result = ticketsPageSchema.parse(
      await haloRequest("Tickets", {
        client_id: query.clientId,
        startdate: query.startDate,
        enddate: query.endDate,
        order: "id",
        orderdesc: true,
        pageinate: true,
        page_size: pageSize,
        page_no: page
      })
    );

    const items = result.tickets ?? [];
    tickets.push(...items);

    if (typeof result.record_count === "number") {
      declaredTotal = result.record_count;
    }

    const fetchedAllByTotal = declaredTotal !== null && tickets.length >= declaredTotal;
    const reachedEnd = items.length < pageSize;

    if (fetchedAllByTotal || reachedEnd) {
      break;
    }
  }

  console.info(`Fetched ${tickets.length} tickets for client ${query.clientId}`);
  return tickets;
}

export const __testables = {
  reset() {
    cachedToken = null;
    cachedClients = null;
  }
};
