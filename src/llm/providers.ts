// =============================================================================
// PROVIDER TABLE
// =============================================================================

export type LlmProviderVariables = {
  apiKey: string;
  baseUrl: string;
  model: string;
};

export type LlmProvider = {
  id: string;
  label: string;
  variables: LlmProviderVariables;
  defaultBaseUrl?: string;
  exampleModels: string[];
};

export const LLM_PROVIDERS: readonly LlmProvider[] = [
  {
    id: "openai",
    label: "OpenAI",
    variables: { apiKey: "OPENAI_API_KEY", baseUrl: "OPENAI_BASE_URL", model: "OPENAI_MODEL" },
    defaultBaseUrl: "https://api.openai.com/v1",
    exampleModels: ["gpt-4o", "gpt-4o-mini"],
  },
  {
    id: "anthropic",
    label: "Anthropic",
    variables: {
      apiKey: "ANTHROPIC_API_KEY",
      baseUrl: "ANTHROPIC_BASE_URL",
      model: "ANTHROPIC_MODEL",
    },
    defaultBaseUrl: "https://api.anthropic.com/v1",
    exampleModels: ["claude-3-5-sonnet-latest", "claude-3-haiku-20240307"],
  },
  {
    id: "azure-openai",
    label: "Azure OpenAI",
    variables: {
      apiKey: "AZURE_OPENAI_API_KEY",
      baseUrl: "AZURE_OPENAI_ENDPOINT",
      model: "AZURE_OPENAI_DEPLOYMENT_NAME",
    },
    exampleModels: ["gpt-4", "gpt-35-turbo"],
  },
  {
    id: "google-gemini",
    label: "Google Gemini",
    variables: { apiKey: "GOOGLE_API_KEY", baseUrl: "GOOGLE_BASE_URL", model: "GOOGLE_MODEL" },
    defaultBaseUrl: "https://generativelanguage.googleapis.com/v1",
    exampleModels: ["gemini-1.5-pro", "gemini-1.5-flash"],
  },
  {
    id: "deepseek",
    label: "DeepSeek",
    variables: {
      apiKey: "DEEPSEEK_API_KEY",
      baseUrl: "DEEPSEEK_BASE_URL",
      model: "DEEPSEEK_MODEL",
    },
    defaultBaseUrl: "https://api.deepseek.com",
    exampleModels: ["deepseek-chat", "deepseek-reasoner"],
  },
  {
    id: "moonshot",
    label: "Moonshot",
    variables: {
      apiKey: "MOONSHOT_API_KEY",
      baseUrl: "MOONSHOT_BASE_URL",
      model: "MOONSHOT_MODEL",
    },
    defaultBaseUrl: "https://api.moonshot.cn/v1",
    exampleModels: ["moonshot-v1-8k", "kimi-k2-turbo-preview"],
  },
  {
    id: "ollama",
    label: "Ollama",
    variables: { apiKey: "OLLAMA_API_KEY", baseUrl: "OLLAMA_HOST", model: "OLLAMA_MODEL" },
    defaultBaseUrl: "http://localhost:11434",
    exampleModels: ["llama3.1", "qwen2.5"],
  },
];

/** Variables used for providers outside the table. */
export const GENERIC_LLM_VARIABLES: LlmProviderVariables = {
  apiKey: "LLM_API_KEY",
  baseUrl: "LLM_BASE_URL",
  model: "LLM_MODEL",
};

export function findLlmProvider(id: string): LlmProvider | undefined {
  const normalized = id.trim().toLowerCase();
  return LLM_PROVIDERS.find((provider) => provider.id === normalized);
}

export function resolveProviderVariables(id: string): LlmProviderVariables {
  return findLlmProvider(id)?.variables ?? GENERIC_LLM_VARIABLES;
}
