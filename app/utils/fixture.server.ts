import { readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { HaloClientSummary } from "~/types/qbr";

const haloFixtureSchema = z.object({
  clients: z.array(z.object({ id: z.number().int(), name: z.string() })).default([]),
  tickets: z.array(z.unknown()).default([])
});

export type HaloFixture = z.infer<typeof haloFixtureSchema>;

/** Reads and validates a JSON fixture; a missing or malformed file yields null. */
export async function loadJsonFixture<T>(relativeOrAbsolutePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  try {
    const resolved = path.isAbsolute(relativeOrAbsolutePath)
      ? relativeOrAbsolutePath
      : path.join(process.cwd(), relativeOrAbsolutePath);
    const raw = await readFile(resolved, "utf-8");
    return schema.parse(JSON.parse(raw));
  } catch (error) {
    console.warn(`Unable to load fixture ${relativeOrAbsolutePath}`, error);
    return null;
  }
}

export async function loadHaloFixture(fixturePath: string): Promise<HaloFixture> {
  return (await loadJsonFixture(fixturePath, haloFixtureSchema)) ?? { clients: [], tickets: [] };
}

export function fixtureClients(fixture: HaloFixture): HaloClientSummary[] {
  return [...fixture.clients].sort((a, b) => a.name.localeCompare(b.name));
}
