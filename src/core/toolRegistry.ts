import { ToolExecutionError } from './errors';
import { logger } from './logger';
import { ToolDefinition, ToolHandler } from './types';

export const UNKNOWN_TOOL_RESULT = JSON.stringify({ error: 'Unknown tool' });

export interface ToolOutcome {
  content: string;
  isError: boolean;
}

/**
 * Maps tool names to handlers. `resolve` is total: whatever the handler does,
 * the caller gets content it can put in a tool_result block.
 */
export class ToolRegistry {
  private readonly handlers = new Map<string, ToolHandler>();

  constructor(handlers: readonly ToolHandler[] = []) {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  register(handler: ToolHandler): this {
    const name = handler.definition.name;
    if (this.handlers.has(name)) {
      throw new Error(`Tool ${name} is already registered`);
    }
    this.handlers.set(name, handler);
    return this;
  }

  definitions(): ToolDefinition[] {
    return [...this.handlers.values()].map((handler) => handler.definition);
  }

  async resolve(name: string, input: Record<string, unknown>): Promise<ToolOutcome> {
    const handler = this.handlers.get(name);
    if (!handler) {
      logger.warn('Model requested an unknown tool', {}, { toolName: name });
      return { content: UNKNOWN_TOOL_RESULT, isError: true };
    }

    try {
      const output = await handler.execute(input);
      return { content: JSON.stringify(output), isError: false };
    } catch (err) {
      const failure = new ToolExecutionError(name, err);
      logger.warn(failure.message, {}, { toolName: name, code: failure.code });
      return { content: JSON.stringify({ error: failure.message }), isError: true };
    }
  }
}
