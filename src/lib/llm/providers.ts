import type { ProviderConfig, ProviderDescriptor } from "@/lib/llm/base";
import { OpenAICompatibleProvider } from "@/lib/llm/openai-compatible-provider";
import type { ProviderRegistry } from "@/lib/llm/registry";

function openAICompatible(name: string, defaultBaseURL: string): ProviderDescriptor {
  return {
    name,
    defaultBaseURL,
    create: (config: ProviderConfig) => new OpenAICompatibleProvider(config, { name, defaultBaseURL }),
  };
}

export const glmProvider = openAICompatible("glm", "https://open.bigmodel.cn/api/paas/v4/");
export const openAIProvider = openAICompatible("openai", "https://api.openai.com/v1");
export const deepSeekProvider = openAICompatible("deepseek", "https://api.deepseek.com/v1");

export function registerBuiltinProviders(registry: ProviderRegistry): void {
  registry.register(/^glm-/, 10, glmProvider);
  registry.register(/^(gpt-|o\d)/, 10, openAIProvider);
  registry.register(/^deepseek-/, 10, deepSeekProvider);
}
