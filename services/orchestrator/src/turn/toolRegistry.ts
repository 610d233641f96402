import type { ToolRegistryView, ToolSchema } from "./types";

export type ToolHandler = (args: unknown) => Promise<unknown>;

export interface ToolDefinition {
  schema: ToolSchema;
  handler: ToolHandler;
}

/**
 * Name → schema + handler mapping, filled by the caller before a run starts.
 */
export class ToolRegistry implements ToolRegistryView {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(definitions: ToolDefinition[] = []) {
    for (const def of definitions) this.register(def);
  }

  register(def: ToolDefinition): this {
    if (this.tools.has(def.schema.name)) {
      throw new Error(`Tool already registered: ${def.schema.name}`);
    }
    this.tools.set(def.schema.name, def);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  schemas(): ToolSchema[] {
    return [...this.tools.values()].map((def) => def.schema);
  }

  async invoke(name: string, args: unknown): Promise<unknown> {
    const def = this.tools.get(name);
    if (!def) throw new Error(`Unknown tool: ${name}`);
    return def.handler(args);
  }
}
