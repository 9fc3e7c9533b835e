// @vitest-environment node
import { beforeEach, describe, expect, it, vi } from "vitest";

import { action } from "~/routes/qbr.generate.server";
import { DEFAULT_METRICS } from "~/utils/metrics.server";

const mocks = vi.hoisted(() => ({
  listClients: vi.fn(),
  generateClientQbr: vi.fn()
}));

vi.mock("~/utils/qbr.server", () => ({
  listClients: mocks.listClients,
  generateClientQbr: mocks.generateClientQbr
}));

function createRequest(fields: Array<[string, string]>) {
  return new Request("http://localhost/qbr/generate", {
    method: "POST",
    body: new URLSearchParams(fields)
  });
}

const validFields: Array<[string, string]> = [
  ["clientId", "3"],
  ["startDate", "2025-01-01"],
  ["endDate", "2025-03-31"],
  ["mspContact", "Service Desk | help@example.com"]
];

function errorLocation(message: string) {
  return `/?error=${encodeURIComponent(message)}`;
}

beforeEach(() => {
  vi.resetAllMocks();
  mocks.listClients.mockResolvedValue([
    { id: 3, name: "Acme Corp" },
    { id: 4, name: "Zenith Labs" }
  ]);
  mocks.generateClientQbr.mockResolvedValue({
    bytes: Buffer.from("deck"),
    filename: "Acme_Corp_QBR_20250101.pptx",
    metrics: DEFAULT_METRICS,
    ticketCount: 0
  });
});

describe("qbr generate action", () => {
  it("streams the generated deck as an attachment", async () => {
    const response = await action({ request: createRequest([...validFields, ["mode", "ai"], ["count", "5"]]) });

    expect(response.status).toBe(200);
    expect(response.headers.get("Content-Type")).toBe(
      "application/vnd.openxmlformats-officedocument.presentationml.presentation"
    );
    expect(response.headers.get("Content-Disposition")).toBe('attachment; filename="Acme_Corp_QBR_20250101.pptx"');
    expect(Buffer.from(await response.arrayBuffer()).toString()).toBe("deck");
    expect(mocks.generateClientQbr).toHaveBeenCalledWith({
      clientId: 3,
      clientName: "Acme Corp",
      startDate: "2025-01-01",
      endDate: "2025-03-31",
      mspContact: "Service Desk | help@example.com",
      recommendations: { mode: "ai", count: 5, sampleSize: 100 }
    });
  });

  it("passes manual recommendations up to the requested count", async () => {
    await action({
      request: createRequest([
        ...validFields,
        ["mode", "manual"],
        ["count", "2"],
        ["recommendation", "Enable MFA"],
        ["recommendation", "Patch cadence"],
        ["recommendation", "Extra"]
      ])
    });

    expect(mocks.generateClientQbr).toHaveBeenCalledWith(
      expect.objectContaining({ recommendations: { mode: "manual", items: ["Enable MFA", "Patch cadence"] } })
    );
  });

  it("rejects a start date after the end date", async () => {
    const response = await action({
      request: createRequest([
        ["clientId", "3"],
        ["startDate", "2025-04-01"],
        ["endDate", "2025-03-31"],
        ["mspContact", "Service Desk"]
      ])
    });

    expect(response.status).toBe(302);
    expect(response.headers.get("Location")).toBe(errorLocation("Start date must be before end date."));
    expect(mocks.generateClientQbr).not.toHaveBeenCalled();
  });

  it("requires MSP contact details", async () => {
    const response = await action({
      request: createRequest([
        ["clientId", "3"],
        ["startDate", "2025-01-01"],
        ["endDate", "2025-03-31"],
        ["mspContact", "   "]
      ])
    });

    expect(response.headers.get("Location")).toBe(errorLocation("Please enter your MSP contact information."));
  });

  it("rejects an unknown client", async () => {
    const response = await action({
      request: createRequest([["clientId", "99"], ...validFields.slice(1)])
    });

    expect(response.headers.get("Location")).toBe(errorLocation("Client 99 was not found."));
  });

  it("redirects with the failure message when generation fails", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    mocks.generateClientQbr.mockRejectedValueOnce(new Error("Template file not found: custom.pptx"));

    const response = await action({ request: createRequest(validFields) });

    expect(response.headers.get("Location")).toBe(
      errorLocation("Error generating QBR: Template file not found: custom.pptx")
    );
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });
});
