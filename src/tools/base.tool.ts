import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import { CensusClientError } from '../errors.js'
import { CensusApiService } from '../services/censusApi.service.js'
import type { StoredMCPTool, ToolResponse } from '../types/base.types.js'

export interface MCPTool<Args extends object = object> {
  name: string
  description: string
  inputSchema: Tool['inputSchema']
  argsSchema: z.ZodType<Args, z.ZodTypeDef, unknown>
  handler: (args: Args) => Promise<ToolResponse>
}

export abstract class BaseTool<Args extends object> implements MCPTool<Args> {
  abstract name: string
  abstract description: string
  abstract inputSchema: Tool['inputSchema']
  abstract get argsSchema(): z.ZodType<Args, z.ZodTypeDef, unknown>
  protected abstract toolHandler(args: Args): Promise<ToolResponse>

  constructor(
    protected readonly api: CensusApiService = CensusApiService.getInstance(),
  ) {
    this.handler = this.handler.bind(this)
  }

  async handler(args: Args): Promise<ToolResponse> {
    try {
      return await this.toolHandler(args)
    } catch (err) {
      if (err instanceof CensusClientError) {
        console.error(`${this.name} failed:`, err.message)
        return this.createErrorResponse(`${err.name}: ${err.message}`)
      }
      const errorMessage = err instanceof Error ? err.message : String(err)
      return this.createErrorResponse(`Unexpected error: ${errorMessage}`)
    }
  }

  protected createErrorResponse(message: string): ToolResponse {
    return {
      content: [
        {
          type: 'text' as const,
          text: message,
        },
      ],
      isError: true,
    }
  }

  protected createSuccessResponse(text: string): ToolResponse {
    return {
      content: [
        {
          type: 'text' as const,
          text,
        },
      ],
    }
  }
}

export class ToolRegistry {
  private tools = new Map<string, StoredMCPTool>()

  register<T extends object>(tool: MCPTool<T>): void {
    const storedTool: StoredMCPTool = {
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      invoke: (args: unknown) => tool.handler(tool.argsSchema.parse(args)),
    }
    this.tools.set(tool.name, storedTool)
  }

  getAll(): StoredMCPTool[] {
    return Array.from(this.tools.values())
  }

  get(name: string): StoredMCPTool | undefined {
    return this.tools.get(name)
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }
}
