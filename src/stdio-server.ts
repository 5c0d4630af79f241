#!/usr/bin/env node
import { config } from './config.js'

// stdout carries the MCP protocol, so chatty console output stays off by default
if (!config.debugLogs) {
  console.log = () => {}
  console.info = () => {}
  console.warn = () => {}
}

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { MCPServer } from './server.js'

import { FetchAggregateDataTool } from './tools/fetch-aggregate-data.tool.js'
import { FetchDatasetGeographyTool } from './tools/fetch-dataset-geography.tool.js'
import { FetchDatasetGroupsTool } from './tools/fetch-dataset-groups.tool.js'
import { FetchDatasetVariablesTool } from './tools/fetch-dataset-variables.tool.js'
import { ListDatasetsTool } from './tools/list-datasets.tool.js'

// MCP Server Setup
export async function main() {
  const mcpServer = new MCPServer('census-metadata', '0.1.0')

  mcpServer.registerTool(new ListDatasetsTool())
  mcpServer.registerTool(new FetchDatasetGeographyTool())
  mcpServer.registerTool(new FetchDatasetGroupsTool())
  mcpServer.registerTool(new FetchDatasetVariablesTool())
  mcpServer.registerTool(new FetchAggregateDataTool())

  const transport = new StdioServerTransport()
  await mcpServer.connect(transport)
}

main().catch(console.error)
