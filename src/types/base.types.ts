import type { TextContent, Tool } from '@modelcontextprotocol/sdk/types.js'

export type ToolContent = TextContent

export type ToolResponse = {
  content: ToolContent[]
  isError?: boolean
}

// Type-erased tool kept by the registry; invoke validates before calling
export interface StoredMCPTool {
  name: string
  description: string
  inputSchema: Tool['inputSchema']
  invoke: (args: unknown) => Promise<ToolResponse>
}
