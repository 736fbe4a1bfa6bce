// src/tools/tool-registry.ts

import { ITool, IToolDefinition, IToolProvider } from '../core/tool';
import { ConfigurationError } from '../core/errors';
import { errorMessage } from '../core/utils';

/**
 * Name -> tool lookup for the dispatcher. Holds directly registered tools and
 * may also aggregate other IToolProviders; registered tools take precedence,
 * then providers in the order they were added.
 */
export class ToolRegistry implements IToolProvider {
  private tools: Map<string, ITool> = new Map();
  private providers: IToolProvider[] = [];

  /**
   * Registers a tool under its definition's name.
   * @throws ConfigurationError if the name is empty or already taken.
   */
  async register(tool: ITool): Promise<IToolDefinition> {
    const definition = await tool.getDefinition();
    if (!definition.name || !definition.name.trim()) {
      throw new ConfigurationError('Tool definitions must have a non-empty name.');
    }
    if (this.tools.has(definition.name)) {
      throw new ConfigurationError(`Tool "${definition.name}" is already registered.`, { toolName: definition.name });
    }
    this.tools.set(definition.name, tool);
    console.info(`[ToolRegistry] Registered tool "${definition.name}".`);
    return definition;
  }

  unregister(toolName: string): boolean {
    return this.tools.delete(toolName);
  }

  /** Adds a provider consulted after the directly registered tools. */
  addProvider(provider: IToolProvider): void {
    this.providers.push(provider);
  }

  /**
   * All tools, without duplicate names. The first tool found for a name wins.
   */
  async getTools(): Promise<ITool[]> {
    const allTools: ITool[] = [...this.tools.values()];
    const toolNames = new Set(this.tools.keys());

    for (const provider of this.providers) {
      try {
        for (const tool of await provider.getTools()) {
          const definition = await tool.getDefinition();
          if (!toolNames.has(definition.name)) {
            allTools.push(tool);
            toolNames.add(definition.name);
          } else {
            console.warn(`[ToolRegistry] Duplicate tool name "${definition.name}" encountered. Keeping the first one.`);
          }
        }
      } catch (error: unknown) {
        console.error(`[ToolRegistry] Error fetching tools from a provider: ${errorMessage(error)}`);
      }
    }
    return allTools;
  }

  async getTool(toolName: string): Promise<ITool | undefined> {
    const registered = this.tools.get(toolName);
    if (registered) {
      return registered;
    }
    for (const provider of this.providers) {
      try {
        const tool = await provider.getTool(toolName);
        if (tool) {
          return tool;
        }
      } catch (error: unknown) {
        console.error(`[ToolRegistry] Error fetching tool "${toolName}" from a provider: ${errorMessage(error)}`);
      }
    }
    return undefined;
  }

  async getDefinitions(): Promise<IToolDefinition[]> {
    const tools = await this.getTools();
    return Promise.all(tools.map((t) => t.getDefinition()));
  }
}
