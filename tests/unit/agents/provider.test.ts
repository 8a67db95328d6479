import { afterEach, describe, expect, it, vi } from "vitest";

import { callProvider, resolveProviderConfig } from "../../../src/agents/provider.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("resolveProviderConfig", () => {
  it("defaults to anthropic", () => {
    expect(resolveProviderConfig({ ANTHROPIC_API_KEY: "test-secret" })).toEqual({
      provider: "anthropic",
      model: "claude-3-5-haiku-latest",
      apiKey: "test-secret",
    });
  });

  it("lets the observer model win over the environment", () => {
    const config = resolveProviderConfig(
      { VIGIL_AI_PROVIDER: "openai", OPENAI_API_KEY: "test-secret", VIGIL_AI_MODEL: "gpt-4o" },
      "gpt-4.1-mini",
    );

    expect(config.model).toBe("gpt-4.1-mini");
  });

  it("requires the provider's key", () => {
    expect(() => resolveProviderConfig({ VIGIL_AI_PROVIDER: "openai" })).toThrow(
      "OPENAI_API_KEY environment variable is required for the openai provider.",
    );
  });

  it("rejects unknown providers", () => {
    expect(() => resolveProviderConfig({ VIGIL_AI_PROVIDER: "local" })).toThrow(
      'Unsupported VIGIL_AI_PROVIDER: local. Must be "openai" or "anthropic".',
    );
  });
});

describe("callProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("joins anthropic text blocks", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({
        content: [
          { type: "text", text: '{"observations": ' },
          { type: "tool_use" },
          { type: "text", text: "[]}" },
        ],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const reply = await callProvider(
      { systemPrompt: "system", userPrompt: "user", model: "claude-3-5-haiku-latest" },
      { ANTHROPIC_API_KEY: "test-secret" },
    );

    expect(reply).toBe('{"observations": []}');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://api.anthropic.com/v1/messages");
    expect(typeof init?.body === "string" ? JSON.parse(init.body) : null).toEqual({
      model: "claude-3-5-haiku-latest",
      max_tokens: 2048,
      system: "system",
      messages: [{ role: "user", content: "user" }],
    });
  });

  it("reads the first openai choice", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ choices: [{ message: { content: "ok" } }] })),
    );

    const reply = await callProvider(
      { systemPrompt: "s", userPrompt: "u" },
      { VIGIL_AI_PROVIDER: "openai", OPENAI_API_KEY: "test-secret" },
    );

    expect(reply).toBe("ok");
  });

  it("surfaces HTTP errors with the body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("overloaded", { status: 529 })),
    );

    await expect(
      callProvider({ systemPrompt: "s", userPrompt: "u" }, { ANTHROPIC_API_KEY: "test-secret" }),
    ).rejects.toThrow("Anthropic API error 529: overloaded");
  });
});
