import { InferenceConfigError, NoProviderFoundError } from "@/lib/errors";
import type { ProviderDescriptor } from "@/lib/llm/base";
import { logger } from "@/lib/logger";

export interface RegistryEntry {
  pattern: RegExp;
  priority: number;
  descriptor: ProviderDescriptor;
  order: number;
}

export type PluginLoader = (registry: ProviderRegistry) => void;

const log = logger.child({ module: "registry" });

function compilePattern(pattern: RegExp | string): RegExp {
  if (pattern instanceof RegExp) {
    return pattern;
  }

  const source = pattern.startsWith("^") ? pattern : `^${pattern}`;
  try {
    return new RegExp(source);
  } catch (error) {
    throw new InferenceConfigError(`Invalid model id pattern "${pattern}"`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Maps model ids to provider descriptors. The highest priority match wins and equal
 * priorities fall back to registration order.
 */
export class ProviderRegistry {
  private readonly entries: RegistryEntry[] = [];
  private readonly loadedPlugins = new Set<PluginLoader>();
  private nextOrder = 0;

  register(pattern: RegExp | string, priority: number, descriptor: ProviderDescriptor): void {
    if (!Number.isInteger(priority)) {
      throw new InferenceConfigError(`Provider priority must be an integer, got ${priority}`);
    }

    const compiled = compilePattern(pattern);
    const duplicate = this.entries.some(
      (entry) =>
        entry.pattern.source === compiled.source &&
        entry.pattern.flags === compiled.flags &&
        entry.descriptor.name === descriptor.name,
    );

    if (duplicate) {
      log.debug({ pattern: compiled.source, provider: descriptor.name }, "duplicate registration ignored");
      return;
    }

    this.entries.push({ pattern: compiled, priority, descriptor, order: this.nextOrder });
    this.nextOrder += 1;
    log.debug({ pattern: compiled.source, priority, provider: descriptor.name }, "provider registered");
  }

  resolve(modelId: string): ProviderDescriptor {
    let best: RegistryEntry | undefined;

    for (const entry of this.entries) {
      entry.pattern.lastIndex = 0;
      if (!entry.pattern.test(modelId)) {
        continue;
      }

      if (
        !best ||
        entry.priority > best.priority ||
        (entry.priority === best.priority && entry.order < best.order)
      ) {
        best = entry;
      }
    }

    if (!best) {
      throw new NoProviderFoundError(
        modelId,
        this.entries.map((entry) => entry.pattern.source),
      );
    }

    log.debug({ modelId, provider: best.descriptor.name }, "provider resolved");
    return best.descriptor;
  }

  resolveByName(name: string): ProviderDescriptor {
    const match = this.entries.find((entry) => entry.descriptor.name === name);
    if (!match) {
      throw new NoProviderFoundError(
        name,
        this.entries.map((entry) => entry.descriptor.name),
      );
    }

    return match.descriptor;
  }

  list(): ReadonlyArray<Readonly<RegistryEntry>> {
    return [...this.entries];
  }

  loadPluginsOnce(...loaders: PluginLoader[]): void {
    for (const loader of loaders) {
      if (this.loadedPlugins.has(loader)) {
        continue;
      }

      this.loadedPlugins.add(loader);
      loader(this);
    }
  }
}
