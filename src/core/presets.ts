import type { CcEnvironment } from "./environments.js";

// Built-in CC profiles offered by `envswitch sync --presets`. Keys stay as placeholders.
export const CC_PRESETS: readonly CcEnvironment[] = [
  {
    kind: "cc",
    name: "anthropic-cc",
    provider: "anthropic",
    apiKey: "${ANTHROPIC_API_KEY}",
    baseUrl: "https://api.anthropic.com",
    model: "claude-3-sonnet-20240229",
    description: "Anthropic Claude Code profile",
  },
  {
    kind: "cc",
    name: "moonshot-cc",
    provider: "anthropic",
    apiKey: "${MOONSHOT_API_KEY}",
    baseUrl: "https://api.moonshot.cn/anthropic",
    model: "claude-3-sonnet-20240229",
    description: "Moonshot Claude Code profile",
  },
  {
    kind: "cc",
    name: "glmcc",
    provider: "anthropic",
    apiKey: "${GLM_API_KEY}",
    baseUrl: "https://open.bigmodel.cn/api/paas/v4",
    model: "glm-4-6",
    description: "Zhipu GLM Claude Code profile",
  },
  {
    kind: "cc",
    name: "anycc",
    provider: "anthropic",
    apiKey: "${ANY_API_KEY}",
    baseUrl: "https://api.any-api.com/anthropic",
    model: "claude-sonnet-4-5",
    description: "Generic Anthropic-compatible profile",
  },
  {
    kind: "cc",
    name: "kimicc",
    provider: "anthropic",
    apiKey: "${KIMI_API_KEY}",
    baseUrl: "https://api.moonshot.cn/anthropic",
    model: "kimi-k2-turbo-preview",
    description: "Kimi Claude Code profile",
  },
];
