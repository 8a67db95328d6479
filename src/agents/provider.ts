import { z } from "zod";

export type AiProvider = "openai" | "anthropic";

export interface ProviderConfig {
  provider: AiProvider;
  model: string;
  apiKey: string;
}

export interface ProviderCallOptions {
  systemPrompt: string;
  userPrompt: string;
  /** Takes precedence over VIGIL_AI_MODEL and the provider default. */
  model?: string;
  maxTokens?: number;
  signal?: AbortSignal;
}

export type ProviderEnv = Record<string, string | undefined>;

const openAiResponseSchema = z.object({
  choices: z.array(
    z.object({ message: z.object({ content: z.string().nullable() }) }),
  ),
});

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export function resolveProviderConfig(
  env: ProviderEnv = process.env,
  modelOverride?: string,
): ProviderConfig {
  const rawProvider = env["VIGIL_AI_PROVIDER"] ?? "anthropic";
  if (rawProvider !== "openai" && rawProvider !== "anthropic") {
    throw new Error(
      `Unsupported VIGIL_AI_PROVIDER: ${rawProvider}. Must be "openai" or "anthropic".`,
    );
  }

  const provider: AiProvider = rawProvider;

  if (provider === "openai") {
    const apiKey = env["OPENAI_API_KEY"];
    if (!apiKey) {
      throw new Error(
        "OPENAI_API_KEY environment variable is required for the openai provider.",
      );
    }
    const model = modelOverride ?? env["VIGIL_AI_MODEL"] ?? "gpt-4o-mini";
    return { provider, model, apiKey };
  }

  const apiKey = env["ANTHROPIC_API_KEY"];
  if (!apiKey) {
    throw new Error(
      "ANTHROPIC_API_KEY environment variable is required for the anthropic provider.",
    );
  }
  const model = modelOverride ?? env["VIGIL_AI_MODEL"] ?? "claude-3-5-haiku-latest";
  return { provider, model, apiKey };
}

async function callOpenAi(
  config: ProviderConfig,
  options: ProviderCallOptions,
): Promise<string> {
  const body = JSON.stringify({
    model: config.model,
    max_tokens: options.maxTokens ?? 2048,
    messages: [
      { role: "system", content: options.systemPrompt },
      { role: "user", content: options.userPrompt },
    ],
  });

  const response = await fetch("https://api.openai.com/v1/chat/completions", {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${config.apiKey}`,
    },
    body,
    signal: options.signal,
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`OpenAI API error ${response.status}: ${text}`);
  }

  const data = openAiResponseSchema.parse(await response.json());
  const content = data.choices[0]?.message.content;
  if (!content) {
    throw new Error("OpenAI API returned no content.");
  }
  return content;
}

async function callAnthropic(
  config: ProviderConfig,
  options: ProviderCallOptions,
): Promise<string> {
  const body = JSON.stringify({
    model: config.model,
    max_tokens: options.maxTokens ?? 2048,
    system: options.systemPrompt,
    messages: [{ role: "user", content: options.userPrompt }],
  });

  const response = await fetch("https://api.anthropic.com/v1/messages", {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "x-api-key": config.apiKey,
      "anthropic-version": "2023-06-01",
    },
    body,
    signal: options.signal,
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Anthropic API error ${response.status}: ${text}`);
  }

  const data = anthropicResponseSchema.parse(await response.json());
  const text = data.content
    .filter((item) => item.type === "text")
    .map((item) => item.text ?? "")
    .join("");
  if (!text) {
    throw new Error("Anthropic API returned no text content.");
  }
  return text;
}

export async function callProvider(
  options: ProviderCallOptions,
  env: ProviderEnv = process.env,
): Promise<string> {
  const config = resolveProviderConfig(env, options.model);
  if (config.provider === "openai") {
    return callOpenAi(config, options);
  }
  return callAnthropic(config, options);
}
