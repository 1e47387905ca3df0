import {
  DEFAULT_ORCHESTRATOR_SETTINGS,
  MAX_TIMER_MS,
  providerConfigFromEnv,
  resolveSettings,
  settingsFromEnv,
} from "../config";
import { validateGoalSubmission } from "../submission";

describe("resolveSettings", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveSettings()).toEqual({
      dispatchTimeoutMs: 120000,
      dispatchRestartLimit: 0,
      collaboratorRetryLimit: 0,
      retryBackoffMs: 250,
      honorParallelSteps: false,
      verbose: false,
    });
    expect(Object.isFrozen(DEFAULT_ORCHESTRATOR_SETTINGS)).toBe(true);
  });

  it("merges overrides", () => {
    const settings = resolveSettings({ dispatchTimeoutMs: 50, honorParallelSteps: true });
    expect(settings.dispatchTimeoutMs).toBe(50);
    expect(settings.honorParallelSteps).toBe(true);
    expect(settings.retryBackoffMs).toBe(250);
  });

  it("rejects invalid numbers", () => {
    expect(() => resolveSettings({ dispatchTimeoutMs: 0 })).toThrow(
      "dispatchTimeoutMs must be a positive integer, got: 0"
    );
    expect(() => resolveSettings({ dispatchRestartLimit: -1 })).toThrow(
      "dispatchRestartLimit must be a non-negative integer, got: -1"
    );
    expect(() => resolveSettings({ retryBackoffMs: 1.5 })).toThrow(
      "retryBackoffMs must be a non-negative integer, got: 1.5"
    );
  });

  it("rejects delays longer than a Node timer can hold", () => {
    expect(resolveSettings({ dispatchTimeoutMs: MAX_TIMER_MS }).dispatchTimeoutMs).toBe(2147483647);
    expect(() => resolveSettings({ dispatchTimeoutMs: 3_000_000_000 })).toThrow(
      "dispatchTimeoutMs must be at most 2147483647, got: 3000000000"
    );
    expect(() => resolveSettings({ retryBackoffMs: 2_147_483_648 })).toThrow(
      "retryBackoffMs must be at most 2147483647, got: 2147483648"
    );
  });
});

describe("settingsFromEnv", () => {
  it("reads SCAFFOLD_* variables", () => {
    expect(
      settingsFromEnv({
        SCAFFOLD_DISPATCH_TIMEOUT_MS: "5000",
        SCAFFOLD_DISPATCH_RESTARTS: "2",
        SCAFFOLD_COLLABORATOR_RETRIES: "1",
        SCAFFOLD_RETRY_BACKOFF_MS: "0",
        SCAFFOLD_PARALLEL_STEPS: "yes",
        SCAFFOLD_VERBOSE: "off",
      })
    ).toEqual({
      dispatchTimeoutMs: 5000,
      dispatchRestartLimit: 2,
      collaboratorRetryLimit: 1,
      retryBackoffMs: 0,
      honorParallelSteps: true,
      verbose: false,
    });
  });

  it("omits unset and blank variables", () => {
    expect(settingsFromEnv({ SCAFFOLD_VERBOSE: "  " })).toEqual({});
  });

  it("throws on malformed values", () => {
    expect(() => settingsFromEnv({ SCAFFOLD_DISPATCH_RESTARTS: "two" })).toThrow(
      'SCAFFOLD_DISPATCH_RESTARTS must be an integer, got: "two"'
    );
    expect(() => settingsFromEnv({ SCAFFOLD_PARALLEL_STEPS: "maybe" })).toThrow(
      'SCAFFOLD_PARALLEL_STEPS must be a boolean, got: "maybe"'
    );
  });
});

describe("providerConfigFromEnv", () => {
  it("defaults to anthropic", () => {
    expect(providerConfigFromEnv({})).toEqual({
      type: "anthropic",
      model: "claude-3-5-haiku-latest",
    });
  });

  it("honors provider and model overrides", () => {
    expect(providerConfigFromEnv({ SCAFFOLD_PROVIDER: "Gemini" })).toEqual({
      type: "gemini",
      model: "gemini-2.0-flash",
    });
    expect(
      providerConfigFromEnv({ SCAFFOLD_PROVIDER: "openai", SCAFFOLD_MODEL: "local-model" })
    ).toEqual({ type: "openai", model: "local-model" });
  });

  it("rejects unknown providers", () => {
    expect(() => providerConfigFromEnv({ SCAFFOLD_PROVIDER: "other" })).toThrow(
      'SCAFFOLD_PROVIDER must be one of anthropic, gemini, openai; got: "other"'
    );
  });
});

describe("validateGoalSubmission", () => {
  it("accepts a goal with optional context", () => {
    expect(validateGoalSubmission({ goal: "  Summarize X  " })).toEqual({
      ok: true,
      submission: { goal: "Summarize X", context: {} },
    });
    expect(validateGoalSubmission({ goal: "g", context: { audience: "team" } })).toEqual({
      ok: true,
      submission: { goal: "g", context: { audience: "team" } },
    });
  });

  it("rejects empty or whitespace-only goals", () => {
    expect(validateGoalSubmission({ goal: "" })).toEqual({ ok: false, error: "Goal is required" });
    expect(validateGoalSubmission({ goal: "   " })).toEqual({ ok: false, error: "Goal is required" });
    expect(validateGoalSubmission({})).toEqual({ ok: false, error: "Goal is required" });
  });

  it("rejects non-object payloads and contexts", () => {
    expect(validateGoalSubmission("goal")).toEqual({
      ok: false,
      error: "Submission must be an object",
    });
    expect(validateGoalSubmission({ goal: "g", context: ["a"] })).toEqual({
      ok: false,
      error: "Context must be an object",
    });
  });
});
