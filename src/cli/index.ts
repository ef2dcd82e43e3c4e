#!/usr/bin/env node

import 'dotenv/config';
import { paths } from '../utils/paths.js';

const args = process.argv.slice(2);
const command = args[0];

if (command === 'serve') {
  // HTTP server mode (REST API + MCP over SSE)
  const { startHttpServer } = await import('../server/fastify-server.js');
  await startHttpServer();
} else if (command === 'mcp') {
  // stdio MCP server
  const { runStdioServer } = await import('./stdio.js');
  await runStdioServer();
} else if (command === 'version') {
  console.log(paths.getVersion());
  process.exit(0);
} else if (command === '--help' || command === '-h' || command === undefined) {
  console.log(`
agira-rag - Retrieval and AI agent service for the Agira issue tracker

Usage:
  agira-rag serve          Run the HTTP server (REST API + MCP over SSE)
  agira-rag mcp            Run as stdio MCP server
  agira-rag version        Show version
  agira-rag --help         Show this help

Environment variables:
  AGIRA_PORT               HTTP server port (default: 3040)
  AGIRA_DATA_DIR           Logs and AI job history (default: ./data)
  AGIRA_AGENTS_DIR         Agent YAML files (default: ./agents)
  AGIRA_AI_MODELS_FILE     AI provider/model registry (default: ./config/ai-models.yml)
  API_KEY                  Bearer token required on /api and /mcp when set
  WEAVIATE_ENABLED         Enable vector search (true/false)
  WEAVIATE_URL             Weaviate base URL, e.g. http://localhost:8080
  REDIS_CACHE_ENABLED      Enable the agent response cache (true/false)
  LOG_LEVEL                debug | info | warn | error (default: info)
  `);
  process.exit(0);
} else {
  console.error(`Unknown command: ${command}\nRun 'agira-rag --help' for usage.`);
  process.exit(1);
}
