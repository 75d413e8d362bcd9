#!/usr/bin/env tsx
/**
 * Send one plain chat request to verify the endpoint, API key and model.
 *
 * Usage: npm run check-connection
 */
import { createProvider } from "../core/llm/openai-compat.js";
import { bootstrap, exitOnError } from "./shared.js";

async function main() {
  const { config, logger } = bootstrap("check-connection");
  const provider = createProvider(config.llm);

  logger.info({ model: config.llm.model, baseUrl: config.llm.base_url }, "Checking chat endpoint");
  const response = await provider.chat({
    model: config.llm.model,
    messages: [
      { role: "system", content: "You are a helpful assistant." },
      { role: "user", content: "Reply with one short sentence confirming you can read this." },
    ],
    maxTokens: 64,
  });

  console.log("Connection successful!");
  console.log(`Model: ${response.model}`);
  console.log(`Response: ${response.text ?? "(empty)"}`);
  console.log(
    `Tokens: ${response.usage.inputTokens ?? "?"} in / ${response.usage.outputTokens ?? "?"} out`
  );
}

main().catch(exitOnError);
