export interface TicketRecord {
  id: number | string | null;
  tickettype_id: number | null;
  priority_id: number | null;
  hasbeenclosed: boolean | null;
  dateoccurred: string | null;
  responsedate: string | null;
  dateclosed: string | null;
  ticketage: number | null;
  summary: string | null;
}

export interface TicketClassification {
  proactiveTypeIds: ReadonlySet<number>;
  reactiveTypeIds: ReadonlySet<number>;
  criticalPriorityId: number;
}

export interface TicketMetrics {
  readonly ticketCount: number;
  readonly proactivePct: number;
  readonly reactivePct: number;
  readonly sameDayRate: number;
  readonly criticalResolutionTime: string;
  readonly avgFirstResponse: string;
}

/** Token identifier (without braces) to substitution text. */
export type TokenMap = Record<string, string>;

export interface Recommendation {
  title: string;
  rationale: string;
}

export interface HaloClientSummary {
  id: number;
  name: string;
}

export type RecommendationPlan =
  | { mode: "ai"; count: number; sampleSize: number }
  | { mode: "manual"; items: string[] };

export interface QbrRequest {
  clientId: number;
  clientName: string;
  startDate: string;
  endDate: string;
  mspContact: string;
  recommendations: RecommendationPlan;
}

export interface QbrResult {
  bytes: Buffer;
  filename: string;
  metrics: TicketMetrics;
  ticketCount: number;
}
