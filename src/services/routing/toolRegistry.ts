// src/services/routing/toolRegistry.ts
import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import logger from '../../logger.js';
import { AppError, ValidationError } from '../../utils/errors.js';
import type { ToolServices } from '../service-container.js';

/**
 * Defines the structure for passing contextual information to tool executors.
 */
export interface ToolExecutionContext {
  /** Identifier for the client connection (e.g., SSE session) */
  sessionId: string;
  /** The type of transport being used (stdio, sse) */
  transportType?: string;
  [key: string]: unknown;
}

/**
 * Defines the function signature for executing a tool's core logic.
 * @param params The validated parameters for the tool, matching its inputSchema.
 * @param services The project manager, phase-state engine and collaborators built at startup.
 * @param context Optional context about the calling session.
 */
export type ToolExecutor = (
  params: Record<string, unknown>,
  services: ToolServices,
  context?: ToolExecutionContext
) => Promise<CallToolResult>;

/**
 * Defines the structure for registering a tool, including its metadata,
 * input validation schema, and execution logic.
 */
export interface ToolDefinition {
  /** The unique name used to identify and call the tool. */
  name: string;
  /** A description of the tool's purpose, shown to MCP clients. */
  description: string;
  /** The raw shape definition for the Zod schema, defining expected input parameters. */
  inputSchema: z.ZodRawShape;
  /** The asynchronous function that implements the tool's core logic. */
  executor: ToolExecutor;
}

// Singleton instance holder
let instance: ToolRegistry | null = null;

/**
 * Manages the registration and execution of tools.
 * Uses Singleton pattern so tool modules can register themselves on import.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  private constructor() {
    logger.debug('ToolRegistry instance created.');
  }

  public static getInstance(): ToolRegistry {
    if (!instance) {
      instance = new ToolRegistry();
    }
    return instance;
  }

  public registerTool(definition: ToolDefinition): void {
    if (this.tools.has(definition.name)) {
      logger.warn(`Tool "${definition.name}" is already registered. Overwriting.`);
    }
    this.tools.set(definition.name, definition);
    logger.debug(`Registered tool: ${definition.name}`);
  }

  public getTool(toolName: string): ToolDefinition | undefined {
    return this.tools.get(toolName);
  }

  public getAllTools(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  /**
   * Clears the tool registry. Intended for use in testing environments ONLY.
   * @internal
   */
  public clearRegistryForTesting(): void {
    if (process.env.NODE_ENV !== 'test') {
      logger.warn('Attempted to clear tool registry outside of a test environment. Operation aborted.');
      return;
    }
    this.tools.clear();
    instance = null;
    logger.debug('Tool registry cleared for testing.');
  }
}

// --- Standalone Functions (using the Singleton instance) ---

export function registerTool(definition: ToolDefinition): void {
  ToolRegistry.getInstance().registerTool(definition);
}

export function getTool(toolName: string): ToolDefinition | undefined {
  return ToolRegistry.getInstance().getTool(toolName);
}

export function getAllTools(): ToolDefinition[] {
  return ToolRegistry.getInstance().getAllTools();
}

/**
 * Finds a tool by name, validates the input parameters against its schema,
 * and executes the tool's logic with the validated parameters.
 *
 * Thrown errors never escape: they come back as a CallToolResult with
 * `isError: true` and `errorDetails` naming the error type, its message and
 * its context (which for workflow errors includes the next step).
 */
export async function executeTool(
  toolName: string,
  params: Record<string, unknown>,
  services: ToolServices,
  context?: ToolExecutionContext
): Promise<CallToolResult> {
  logger.debug({ toolName, sessionId: context?.sessionId }, `Attempting to execute tool: ${toolName}`);
  const toolDefinition = getTool(toolName);

  if (!toolDefinition) {
    logger.error(`Tool "${toolName}" not found in registry.`);
    return {
      content: [{ type: 'text', text: `Error: Tool "${toolName}" not found.` }],
      isError: true,
      errorDetails: {
        type: 'ToolNotFoundError',
        message: `Tool "${toolName}" not found.`,
        context: { toolName, availableTools: getAllTools().map(tool => tool.name) }
      }
    };
  }

  const schemaObject = z.object(toolDefinition.inputSchema);
  const validationResult = schemaObject.safeParse(params);

  if (!validationResult.success) {
    logger.warn({ tool: toolName, errors: validationResult.error.issues }, 'Tool parameter validation failed.');
    const validationError = new ValidationError(
      `Input validation failed for tool '${toolName}'`,
      validationResult.error.issues,
      { toolName }
    );
    return {
      content: [{ type: 'text', text: validationError.message }],
      isError: true,
      errorDetails: {
        type: validationError.name,
        message: validationError.message,
        context: validationError.context
      }
    };
  }

  try {
    const result = await toolDefinition.executor(validationResult.data, services, context);
    logger.info({ toolName, sessionId: context?.sessionId }, `Tool "${toolName}" executed successfully.`);
    return result;
  } catch (error) {
    let errorMessage: string;
    let errorType: string;
    let errorContext: Record<string, unknown> = { toolName, params: validationResult.data };

    if (error instanceof AppError) {
      errorMessage = `Error in tool '${toolName}': ${error.message}`;
      errorType = error.name;
      errorContext = { ...errorContext, ...error.context };
      logger.warn({ err: error, tool: toolName }, `Tool "${toolName}" rejected the request.`);
    } else if (error instanceof Error) {
      errorMessage = `Unexpected error in tool '${toolName}': ${error.message}`;
      errorType = error.name;
      logger.error({ err: error, tool: toolName }, `Error during execution of tool "${toolName}".`);
    } else {
      errorMessage = `Unknown execution error in tool '${toolName}'.`;
      errorType = 'UnknownExecutionError';
      errorContext.originalValue = String(error);
      logger.error({ err: error, tool: toolName }, `Error during execution of tool "${toolName}".`);
    }

    return {
      content: [{ type: 'text', text: errorMessage }],
      isError: true,
      errorDetails: {
        type: errorType,
        message: error instanceof Error ? error.message : String(error),
        context: errorContext
      }
    };
  }
}

/**
 * Clears the tool registry. Intended for use in testing environments ONLY
 * to ensure test isolation.
 * @internal
 */
export function clearRegistryForTesting(): void {
  if (!instance) {
    logger.debug('Tool registry not initialized, nothing to clear for testing.');
    return;
  }
  instance.clearRegistryForTesting();
}
