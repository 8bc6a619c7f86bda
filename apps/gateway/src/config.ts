// ---------------------------------------------------------------------------
// Gateway configuration
//
// Read once by the startup sequence and frozen.  Any problem here is fatal:
// the process must not start serving with a half-valid payment setup.
// ---------------------------------------------------------------------------

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface UpstreamConfig {
  baseUrl: string;
  /** The gateway's own key for the upstream API. */
  apiKey?: string;
  timeoutMs: number;
}

export interface GatewayConfig {
  /** Address that receives every payment. */
  receivingAddress: string;
  /** Operator-provisioned key that bypasses payment. */
  internalCredential?: string;
  network: string;
  /** Admit every request without payment. Never enable in production. */
  testingMode: boolean;
  /** Settlement authority (facilitator) base URL. */
  settlementEndpoint?: string;
  settlementTimeoutMs: number;
  /** Request header the internal credential is read from. */
  credentialHeader: string;
  port: number;
  logLevel: string;
  publicBaseUrl: string;
  corsOrigins: string[];
  upstream: UpstreamConfig;
}

type Env = Readonly<Record<string, string | undefined>>;

function optional(env: Env, name: string): string | undefined {
  const val = env[name]?.trim();
  return val ? val : undefined;
}

function required(env: Env, name: string, why: string): string {
  const val = optional(env, name);
  if (!val) {
    throw new ConfigurationError(`Missing required env var: ${name} (${why})`);
  }
  return val;
}

function bool(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  return raw.toLowerCase() === "true" || raw === "1";
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

function httpUrl(name: string, raw: string): string {
  if (!/^https?:\/\//.test(raw)) {
    throw new ConfigurationError(`${name} must be an http(s) URL, got "${raw}"`);
  }
  return raw.replace(/\/+$/, "");
}

export function loadConfig(env: Env = process.env): Readonly<GatewayConfig> {
  const receivingAddress = required(env, "SERVER_ADDRESS", "payment receiving address");
  const testingMode = bool(env, "TESTING_MODE", false);

  const rawFacilitator = optional(env, "FACILITATOR_URL");
  if (!rawFacilitator && !testingMode) {
    throw new ConfigurationError(
      "FACILITATOR_URL is required when TESTING_MODE is disabled",
    );
  }
  const settlementEndpoint = rawFacilitator
    ? httpUrl("FACILITATOR_URL", rawFacilitator)
    : undefined;

  const port = positiveInt(env, "PORT", 8000);

  const config: GatewayConfig = {
    receivingAddress,
    internalCredential: optional(env, "INTERNAL_API_KEY"),
    network: optional(env, "NETWORK") ?? "sepolia",
    testingMode,
    settlementEndpoint,
    settlementTimeoutMs: positiveInt(env, "FACILITATOR_TIMEOUT_MS", 5_000),
    credentialHeader: (optional(env, "CREDENTIAL_HEADER") ?? "authorization").toLowerCase(),
    port,
    logLevel: optional(env, "LOG_LEVEL") ?? "info",
    publicBaseUrl: optional(env, "PUBLIC_BASE_URL") ?? `http://localhost:${port}`,
    corsOrigins: (optional(env, "CORS_ORIGIN") ?? "*")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    upstream: Object.freeze({
      baseUrl: httpUrl(
        "SERPER_BASE_URL",
        optional(env, "SERPER_BASE_URL") ?? "https://google.serper.dev",
      ),
      apiKey: optional(env, "SERPER_API_KEY"),
      timeoutMs: positiveInt(env, "UPSTREAM_TIMEOUT_MS", 30_000),
    }),
  };

  return Object.freeze(config);
}
