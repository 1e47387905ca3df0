import type { ProviderConfig, ProviderType } from "./providers/types";

export interface OrchestratorSettings {
  /** How long a dispatched task may wait for its worker's reply. */
  dispatchTimeoutMs: number;
  /** Re-dispatch attempts after a timed-out reply. */
  dispatchRestartLimit: number;
  /** Re-invocations of the decomposer/planner after they throw. */
  collaboratorRetryLimit: number;
  /** Base delay for exponential backoff between attempts. */
  retryBackoffMs: number;
  /** Dispatch the tasks of a `parallel` step concurrently. */
  honorParallelSteps: boolean;
  verbose: boolean;
}

/** Longest delay a Node timer honors; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export const DEFAULT_ORCHESTRATOR_SETTINGS: Readonly<OrchestratorSettings> =
  Object.freeze({
    dispatchTimeoutMs: 120_000,
    dispatchRestartLimit: 0,
    collaboratorRetryLimit: 0,
    retryBackoffMs: 250,
    honorParallelSteps: false,
    verbose: false,
  });

const DEFAULT_MODELS: Readonly<Record<ProviderType, string>> = {
  anthropic: "claude-3-5-haiku-latest",
  gemini: "gemini-2.0-flash",
  openai: "gpt-4o-mini",
};

function requireNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got: ${value}`);
  }
}

function requireTimerRange(name: string, value: number): void {
  if (value > MAX_TIMER_MS) {
    throw new Error(`${name} must be at most ${MAX_TIMER_MS}, got: ${value}`);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveSettings(
  overrides?: Partial<OrchestratorSettings>
): OrchestratorSettings {
  const settings: OrchestratorSettings = {
    ...DEFAULT_ORCHESTRATOR_SETTINGS,
    ...overrides,
  };

  if (!Number.isInteger(settings.dispatchTimeoutMs) || settings.dispatchTimeoutMs < 1) {
    throw new Error(
      `dispatchTimeoutMs must be a positive integer, got: ${settings.dispatchTimeoutMs}`
    );
  }
  requireTimerRange("dispatchTimeoutMs", settings.dispatchTimeoutMs);
  requireNonNegativeInteger("dispatchRestartLimit", settings.dispatchRestartLimit);
  requireNonNegativeInteger("collaboratorRetryLimit", settings.collaboratorRetryLimit);
  requireNonNegativeInteger("retryBackoffMs", settings.retryBackoffMs);
  requireTimerRange("retryBackoffMs", settings.retryBackoffMs);
  return settings;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got: "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new Error(`${name} must be a boolean, got: "${env[name]}"`);
}

/**
 * Settings overrides taken from SCAFFOLD_* environment variables. Unset
 * variables are omitted so that defaults still apply.
 */
export function settingsFromEnv(
  env: Env = process.env
): Partial<OrchestratorSettings> {
  const settings: Partial<OrchestratorSettings> = {};
  const dispatchTimeoutMs = readInteger(env, "SCAFFOLD_DISPATCH_TIMEOUT_MS");
  if (dispatchTimeoutMs !== undefined) settings.dispatchTimeoutMs = dispatchTimeoutMs;
  const dispatchRestartLimit = readInteger(env, "SCAFFOLD_DISPATCH_RESTARTS");
  if (dispatchRestartLimit !== undefined) settings.dispatchRestartLimit = dispatchRestartLimit;
  const collaboratorRetryLimit = readInteger(env, "SCAFFOLD_COLLABORATOR_RETRIES");
  if (collaboratorRetryLimit !== undefined) settings.collaboratorRetryLimit = collaboratorRetryLimit;
  const retryBackoffMs = readInteger(env, "SCAFFOLD_RETRY_BACKOFF_MS");
  if (retryBackoffMs !== undefined) settings.retryBackoffMs = retryBackoffMs;
  const honorParallelSteps = readBoolean(env, "SCAFFOLD_PARALLEL_STEPS");
  if (honorParallelSteps !== undefined) settings.honorParallelSteps = honorParallelSteps;
  const verbose = readBoolean(env, "SCAFFOLD_VERBOSE");
  if (verbose !== undefined) settings.verbose = verbose;
  return settings;
}

function isProviderType(value: string): value is ProviderType {
  return value === "anthropic" || value === "gemini" || value === "openai";
}

/**
 * Provider selection from SCAFFOLD_PROVIDER / SCAFFOLD_MODEL. Defaults to
 * Anthropic with its default model.
 */
export function providerConfigFromEnv(env: Env = process.env): ProviderConfig {
  const rawType = env["SCAFFOLD_PROVIDER"]?.trim().toLowerCase() || "anthropic";
  if (!isProviderType(rawType)) {
    throw new Error(
      `SCAFFOLD_PROVIDER must be one of anthropic, gemini, openai; got: "${rawType}"`
    );
  }
  return {
    type: rawType,
    model: env["SCAFFOLD_MODEL"]?.trim() || DEFAULT_MODELS[rawType],
  };
}
