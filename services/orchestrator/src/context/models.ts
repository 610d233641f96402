import { z } from "zod";
import modelsFile from "../../config/models.json";

export enum ModelFamily {
  Claude = "claude",
  Gpt = "gpt",
  Gemini = "gemini",
  DeepSeek = "deepseek",
  Default = "default"
}

export type TokenEncoding = "cl100k_base" | "o200k_base" | "chars";

export interface FamilyProfile {
  /** Prompt budget in estimated tokens, after reserving room for output and overhead. */
  contextBudget: number;
  maxOutputTokens?: number;
  encoding: TokenEncoding;
  /** Prefix prepended to the model id to reach the overload fallback route. */
  fallbackPrefix: string;
}

export const FAMILY_PROFILES: Readonly<Record<ModelFamily, FamilyProfile>> = {
  [ModelFamily.Claude]: {
    contextBudget: 200_000 - 64_000 - 28_000,
    maxOutputTokens: 8192,
    encoding: "cl100k_base",
    fallbackPrefix: "openrouter/"
  },
  [ModelFamily.Gpt]: {
    contextBudget: 128_000 - 28_000,
    maxOutputTokens: 4096,
    encoding: "o200k_base",
    fallbackPrefix: "openrouter/"
  },
  [ModelFamily.Gemini]: {
    contextBudget: 1_000_000 - 300_000,
    maxOutputTokens: 64_000,
    encoding: "chars",
    fallbackPrefix: "openrouter/"
  },
  [ModelFamily.DeepSeek]: {
    contextBudget: 128_000 - 28_000,
    encoding: "cl100k_base",
    fallbackPrefix: "openrouter/"
  },
  [ModelFamily.Default]: {
    contextBudget: 41_000 - 10_000,
    encoding: "cl100k_base",
    fallbackPrefix: "openrouter/"
  }
};

const ModelsFileSchema = z.object({
  models: z.record(z.string(), z.nativeEnum(ModelFamily))
});

/**
 * Exact model id → family lookup. Unknown ids resolve to ModelFamily.Default;
 * ids already routed through a fallback prefix resolve like their base id.
 */
export class ModelCatalog {
  private readonly families = new Map<string, ModelFamily>();

  constructor(entries: Record<string, ModelFamily> = {}) {
    for (const [model, family] of Object.entries(entries)) {
      this.register(model, family);
    }
  }

  static fromJson(raw: unknown): ModelCatalog {
    return new ModelCatalog(ModelsFileSchema.parse(raw).models);
  }

  register(model: string, family: ModelFamily): void {
    this.families.set(model, family);
  }

  familyOf(model: string): ModelFamily {
    const direct = this.families.get(model);
    if (direct) return direct;
    for (const family of Object.values(ModelFamily)) {
      const prefix = FAMILY_PROFILES[family].fallbackPrefix;
      if (model.startsWith(prefix)) {
        const base = this.families.get(model.slice(prefix.length));
        if (base) return base;
      }
    }
    return ModelFamily.Default;
  }

  profileOf(model: string): FamilyProfile {
    return FAMILY_PROFILES[this.familyOf(model)];
  }

  /** Route for the next attempt after an overload; already-routed ids are kept as they are. */
  fallbackFor(model: string): string {
    const { fallbackPrefix } = this.profileOf(model);
    return model.startsWith(fallbackPrefix) ? model : `${fallbackPrefix}${model}`;
  }
}

export const defaultCatalog = ModelCatalog.fromJson(modelsFile);
