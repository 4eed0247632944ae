import { describe, expect, it } from "vitest";

import { GENERIC_LLM_VARIABLES, findLlmProvider, resolveProviderVariables } from "./providers.js";

describe("findLlmProvider", () => {
  it("matches ids case-insensitively", () => {
    expect(findLlmProvider(" OpenAI ")?.label).toBe("OpenAI");
    expect(findLlmProvider("mistral")).toBeUndefined();
  });
});

describe("resolveProviderVariables", () => {
  it("returns the provider's own variable names", () => {
    expect(resolveProviderVariables("azure-openai")).toEqual({
      apiKey: "AZURE_OPENAI_API_KEY",
      baseUrl: "AZURE_OPENAI_ENDPOINT",
      model: "AZURE_OPENAI_DEPLOYMENT_NAME",
    });
  });

  it("uses the generic names for unknown providers", () => {
    expect(resolveProviderVariables("mistral")).toBe(GENERIC_LLM_VARIABLES);
  });
});
