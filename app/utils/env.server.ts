const requiredKeys = ["HALO_HOST", "HALO_CLIENT_ID", "HALO_CLIENT_SECRET"] as const;

const optionalKeys = [
  "HALO_SCOPE",
  "HALO_FIXTURE_PATH",
  "OPENAI_API_KEY",
  "OPENAI_MODEL",
  "QBR_TEMPLATE_PATH",
  "QBR_PROACTIVE_TYPE_IDS",
  "QBR_REACTIVE_TYPE_IDS",
  "QBR_CRITICAL_PRIORITY_ID"
] as const;

type RequiredKey = (typeof requiredKeys)[number];
type OptionalKey = (typeof optionalKeys)[number];

type ServerEnv = Record<RequiredKey, string>;

let cachedEnv: ServerEnv | null = null;

function loadEnv(): ServerEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const env: ServerEnv = { HALO_HOST: "", HALO_CLIENT_ID: "", HALO_CLIENT_SECRET: "" };
  for (const key of requiredKeys) {
    const value = process.env[key];
    if (!value) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
    env[key] = value;
  }

  cachedEnv = env;
  return cachedEnv;
}

export function getServerEnv(key: RequiredKey) {
  return loadEnv()[key];
}

export function getOptionalEnv(key: OptionalKey): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

export function parseIdList(raw: string | undefined, fallback: readonly number[]): number[] {
  if (!raw || !raw.trim()) return [...fallback];
  const ids = raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map(Number)
    .filter((value) => Number.isInteger(value));
  return ids.length ? ids : [...fallback];
}

export const __testables = {
  resetEnvCache() {
    cachedEnv = null;
  }
};
