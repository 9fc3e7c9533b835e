import type { ActionFunctionArgs } from "@remix-run/node";
import { redirect } from "@remix-run/node";
import { z } from "zod";

import type { QbrRequest } from "~/types/qbr";
import { PPTX_CONTENT_TYPE } from "~/utils/pptx/compose.server";
import { generateClientQbr, listClients } from "~/utils/qbr.server";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Dates must use the YYYY-MM-DD format.");

const generateFormSchema = z
  .object({
    clientId: z.coerce.number().int().positive("Please select a client."),
    startDate: isoDate,
    endDate: isoDate,
    mspContact: z.string().trim().min(1, "Please enter your MSP contact information."),
    mode: z.enum(["ai", "manual"]).default("ai"),
    count: z.coerce.number().int().min(1).max(10).default(3),
    sampleSize: z.coerce.number().int().min(10).max(500).default(100),
    recommendations: z.array(z.string()).default([])
  })
  .refine((form) => form.startDate < form.endDate, {
    message: "Start date must be before end date.",
    path: ["endDate"]
  });

type GenerateForm = z.infer<typeof generateFormSchema>;

function errorRedirect(message: string) {
  return redirect(`/?error=${encodeURIComponent(message)}`);
}

function readField(formData: FormData, key: string) {
  const value = formData.get(key);
  return typeof value === "string" && value !== "" ? value : undefined;
}

function toPlan(form: GenerateForm): QbrRequest["recommendations"] {
  if (form.mode === "manual") {
    return { mode: "manual", items: form.recommendations.slice(0, form.count) };
  }
  return { mode: "ai", count: form.count, sampleSize: form.sampleSize };
}

export async function action({ request }: Pick<ActionFunctionArgs, "request">) {
  const formData = await request.formData();
  const parsed = generateFormSchema.safeParse({
    clientId: readField(formData, "clientId"),
    startDate: readField(formData, "startDate"),
    endDate: readField(formData, "endDate"),
    mspContact: readField(formData, "mspContact") ?? "",
    mode: readField(formData, "mode"),
    count: readField(formData, "count"),
    sampleSize: readField(formData, "sampleSize"),
    recommendations: formData.getAll("recommendation").filter((value): value is string => typeof value === "string")
  });

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    return errorRedirect(issue?.message ?? "Invalid request.");
  }

  const form = parsed.data;

  try {
    const clients = await listClients();
    const client = clients.find((candidate) => candidate.id === form.clientId);
    if (!client) {
      return errorRedirect(`Client ${form.clientId} was not found.`);
    }

    const result = await generateClientQbr({
      clientId: client.id,
      clientName: client.name,
      startDate: form.startDate,
      endDate: form.endDate,
      mspContact: form.mspContact,
      recommendations: toPlan(form)
    });

    return new Response(new Uint8Array(result.bytes), {
      status: 200,
      headers: {
        "Content-Type": PPTX_CONTENT_TYPE,
        "Content-Disposition": `attachment; filename="${result.filename}"`
      }
    });
  } catch (error) {
    console.error("QBR generation failed", error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return errorRedirect(`Error generating QBR: ${message}`);
  }
}
