import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";
import { Form, useLoaderData } from "@remix-run/react";
import { format, subDays } from "date-fns";

import RecommendationFields from "~/components/recommendation-fields";
import StatusBanner from "~/components/status-banner";
import type { HaloClientSummary } from "~/types/qbr";
import { listClients } from "~/utils/qbr.server";
import { isAiAvailable } from "~/utils/recommendations.server";

const DEFAULT_RANGE_DAYS = 90;

type LoaderData =
  | {
      ok: true;
      clients: HaloClientSummary[];
      startDate: string;
      endDate: string;
      aiAvailable: boolean;
      error: string | null;
    }
  | { ok: false; error: string };

export async function loader({ request }: LoaderFunctionArgs) {
  const url = new URL(request.url);
  const today = new Date();

  try {
    const clients = await listClients();
    return json<LoaderData>({
      ok: true,
      clients,
      startDate: format(subDays(today, DEFAULT_RANGE_DAYS), "yyyy-MM-dd"),
      endDate: format(today, "yyyy-MM-dd"),
      aiAvailable: isAiAvailable(),
      error: url.searchParams.get("error")
    });
  } catch (error) {
    console.error(error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return json<LoaderData>({ ok: false, error: message }, { status: 500 });
  }
}

export default function QbrGeneratorRoute() {
  const data = useLoaderData<typeof loader>();

  if (!data.ok) {
    return (
      <main className="qbr-shell">
        <header>
          <h1>MSP QBR Generator</h1>
          <p>Could not load clients from HaloPSA.</p>
        </header>
        <section className="form-panel">
          <h2>Troubleshooting</h2>
          <p>{data.error}</p>
          <ul>
            <li>Verify that `HALO_HOST`, `HALO_CLIENT_ID` and `HALO_CLIENT_SECRET` are present in your .env file.</li>
            <li>Ensure the API application has permission to read clients and tickets.</li>
            <li>Set `HALO_FIXTURE_PATH` to work from a local JSON export instead.</li>
          </ul>
        </section>
      </main>
    );
  }

  return (
    <main className="qbr-shell">
      <header>
        <h1>MSP QBR Generator</h1>
        <p>Select a client and review period to build a business impact deck.</p>
      </header>

      {data.error ? <StatusBanner message={data.error} variant="error" /> : null}
      {data.clients.length === 0 ? (
        <StatusBanner message="No clients were found in this HaloPSA instance." variant="warning" />
      ) : null}

      <Form method="post" action="/qbr/generate" reloadDocument>
        <section className="form-panel">
          <h2>Client &amp; review period</h2>
          <div className="field-row">
            <label>
              Client
              <select name="clientId" required>
                {data.clients.map((client) => (
                  <option key={client.id} value={client.id}>
                    {client.name}
                  </option>
                ))}
              </select>
            </label>
            <label>
              Start date
              <input type="date" name="startDate" defaultValue={data.startDate} required />
            </label>
            <label>
              End date
              <input type="date" name="endDate" defaultValue={data.endDate} required />
            </label>
          </div>
        </section>

        <RecommendationFields aiAvailable={data.aiAvailable} />

        <section className="form-panel">
          <h2>MSP contact</h2>
          <label>
            Account manager contact
            <input type="text" name="mspContact" placeholder="Name | email | phone" required />
          </label>
        </section>

        <button type="submit" className="btn-primary">
          Generate QBR deck
        </button>
      </Form>

      <p className="meta">
        Need to customise the layout? <a href="/template.pptx">Download the master template</a> and point
        QBR_TEMPLATE_PATH at your edited copy.
      </p>
    </main>
  );
}
