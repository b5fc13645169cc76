// Load environment variables FIRST: ESM hoists imports, so this must be the first one
import 'dotenv/config';

import { ConversationAgent } from '@/agent/conversation-agent';
import { ConversationStore } from '@/agent/conversation-store';
import { createApp } from '@/app';
import { LoggerAuditSink } from '@/audit/audit-sink';
import { loadAppConfig } from '@/config/app.config';
import { AuditedToolClient } from '@/mcp/audited-tool-client';
import { McpHttpToolClient, UnconfiguredToolClient } from '@/mcp/tool-client';
import type { ToolClient } from '@/mcp/tool-client';
import { OpenAiLlmClient } from '@/services/llm-client';
import { logger, setLogLevel } from '@/services/logger';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const config = loadAppConfig();
setLogLevel(config.logLevel);
const audit = new LoggerAuditSink();

const llm = new OpenAiLlmClient({
  baseUrl: config.llm.baseUrl,
  apiKey: config.llm.apiKey,
  model: config.llm.model,
  temperature: config.llm.temperature,
});

let rawTools: ToolClient;
if (config.mcpServerUrl) {
  const mcp = new McpHttpToolClient({ serverUrl: config.mcpServerUrl });
  onShutdown(() => mcp.close());
  rawTools = mcp;
} else {
  logger.warn('startup:no_tool_server', { hint: 'set MCP_SERVER_URL to enable search and utility tools' });
  rawTools = new UnconfiguredToolClient();
}

const store = new ConversationStore({
  ttlMinutes: config.conversationTtlMinutes,
  sessionTtlMs: config.searchTuning.sessionTtlMs,
});
onShutdown(() => store.destroy());

const agent = new ConversationAgent({
  llm,
  tools: new AuditedToolClient(rawTools, audit),
  audit,
  store,
  systemPrompt: config.systemPrompt,
  tuning: config.searchTuning,
});

const app = createApp(agent);

const server = app.listen(config.port, '0.0.0.0', () => {
  logger.info('startup:listening', { port: config.port, env: config.nodeEnv, model: config.llm.model });
});
setServerInstance(server);
