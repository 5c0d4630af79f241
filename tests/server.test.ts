import { afterEach, describe, it, expect, beforeEach, vi } from 'vitest'
import {
  CallToolResultSchema,
  McpError,
  ErrorCode,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js'
import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'

import { MCPServer } from '../src/server.js'
import { ToolRegistry } from '../src/tools/base.tool.js'
import { ErrorThrowingTool, MockEchoTool, NotFoundTool } from './mocks/tool.mock.js'

vi.mock('@modelcontextprotocol/sdk/server/stdio.js', () => ({
  StdioServerTransport: vi.fn().mockImplementation(() => ({
    start() {
      return true
    },
  })),
}))

describe('MCP Server', () => {
  let mcpServer: MCPServer
  let echoTool: MockEchoTool

  beforeEach(() => {
    vi.spyOn(Server.prototype, 'connect').mockResolvedValue(undefined)
    mcpServer = new MCPServer('test-server', '1.0.0')
    echoTool = new MockEchoTool()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('connect', () => {
    it('should call the connect method in the MCP Server', async () => {
      const mockTransport = new StdioServerTransport()

      await mcpServer.connect(mockTransport)
      expect(Server.prototype.connect).toHaveBeenCalledTimes(1)
    })
  })

  describe('registerTool', () => {
    it('should register tools in the registry', () => {
      const registerSpy = vi.spyOn(ToolRegistry.prototype, 'register')

      mcpServer.registerTool(echoTool)

      expect(registerSpy).toHaveBeenCalledOnce()
      expect(registerSpy).toHaveBeenCalledWith(echoTool)
    })
  })

  describe('getTools', () => {
    it('should return tools in list format', () => {
      mcpServer.registerTool(echoTool)

      expect(mcpServer.getTools()).toEqual({
        tools: [
          {
            name: 'echo-mock',
            description: 'A test tool for unit testing',
            inputSchema: echoTool.inputSchema,
          },
        ],
      })
    })
  })

  describe('handleToolCall', () => {
    beforeEach(() => {
      mcpServer.registerTool(echoTool)
    })

    it('should call the tool with valid arguments', async () => {
      const result = await mcpServer.handleToolCall({
        params: { name: 'echo-mock', arguments: { message: 'test message' } },
      })

      expect(result).toEqual({
        content: [{ type: 'text', text: 'Test response: test message' }],
      })
    })

    it('should return results the SDK accepts as tool call results', async () => {
      const result: CallToolResult = await mcpServer.handleToolCall({
        params: { name: 'echo-mock', arguments: { message: 'typed' } },
      })

      expect(CallToolResultSchema.parse(result)).toMatchObject({
        content: [{ type: 'text', text: 'Test response: typed' }],
      })
    })

    it('should throw InvalidParams for invalid arguments', async () => {
      const request = {
        params: { name: 'echo-mock', arguments: { invalidField: 'wrong data' } },
      }

      const error = await mcpServer.handleToolCall(request).catch((err) => err)

      expect(error).toBeInstanceOf(McpError)
      expect(error.code).toBe(ErrorCode.InvalidParams)
      expect(error.message).toContain('Invalid arguments:')
    })

    it('should turn unexpected tool errors into error responses', async () => {
      mcpServer.registerTool(new ErrorThrowingTool())

      const result = await mcpServer.handleToolCall({
        params: { name: 'error-tool', arguments: { message: 'test' } },
      })

      expect(result).toEqual({
        content: [
          { type: 'text', text: 'Unexpected error: Tool execution failed' },
        ],
        isError: true,
      })
    })

    it('should name client errors in error responses', async () => {
      mcpServer.registerTool(new NotFoundTool())

      const result = await mcpServer.handleToolCall({
        params: { name: 'not-found-tool', arguments: { message: 'acs3' } },
      })

      expect(result).toEqual({
        content: [
          { type: 'text', text: 'NotFoundError: Nothing found for acs3' },
        ],
        isError: true,
      })
    })

    it('should throw MethodNotFound for unknown tool', async () => {
      const error = await mcpServer
        .handleToolCall({ params: { name: 'unknown-tool', arguments: {} } })
        .catch((err) => err)

      expect(error).toBeInstanceOf(McpError)
      expect(error.code).toBe(ErrorCode.MethodNotFound)
      expect(error.message).toBe('MCP error -32601: Unknown tool: unknown-tool')
    })
  })
})
