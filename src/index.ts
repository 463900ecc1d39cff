#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import express from "express";
import cors from "cors";
import dotenv from "dotenv";
import path from 'path';
import { fileURLToPath } from 'url';
import logger, { detectTransportType, registerShutdownCallback } from "./logger.js";
import { loadServerConfig } from './utils/configLoader.js';
import { createServices, type ToolServices } from './services/service-container.js';

// Import createServer *after* the logger so tool registration is logged
import { createServer } from "./server.js";

// --- Load .env file explicitly ---
// The .env file sits in the package root, one level above src/ and dist/
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, '../.env');
const dotenvResult = dotenv.config({ path: envPath });

if (dotenvResult.error) {
  logger.debug({ path: envPath }, 'No .env file loaded; using the process environment.');
} else {
  logger.info({ path: envPath, loaded: dotenvResult.parsed ? Object.keys(dotenvResult.parsed) : [] }, `Loaded environment variables from .env file.`);
}
// --- End .env loading ---

async function startSse(services: ToolServices): Promise<void> {
  const app = express();
  app.use(cors());
  app.use(express.json());

  const port = services.config.ssePort;
  const transports = new Map<string, SSEServerTransport>();

  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.status(200).json({ status: 'ok', sessions: transports.size });
  });

  app.get('/sse', (_req: express.Request, res: express.Response) => {
    const transport = new SSEServerTransport('/messages', res);
    const sessionId = transport.sessionId;
    transports.set(sessionId, transport);
    logger.info({ sessionId }, 'Established SSE connection');

    res.on('close', () => {
      transports.delete(sessionId);
      logger.info({ sessionId }, 'SSE connection closed');
    });

    // One MCP server per connection; every server shares the same services
    createServer(services, 'sse').connect(transport).catch((error: unknown) => {
      logger.error({ err: error, sessionId }, 'Failed to connect transport');
    });
  });

  app.post('/messages', async (req: express.Request, res: express.Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined;
    if (!sessionId) {
      res.status(400).json({ error: 'Missing session ID. Establish an SSE connection first.' });
      return;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(404).json({ error: `No active SSE connection for session ${sessionId}` });
      return;
    }

    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (error) {
      logger.error({ err: error, sessionId }, 'Error handling POST message');
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error while handling POST message.' });
      }
    }
  });

  const httpServer = app.listen(port, () => {
    logger.info({ port }, `Phase state MCP SSE server running on http://localhost:${port}`);
    logger.info('Connect using SSE at /sse and post messages to /messages');
  });

  registerShutdownCallback(() => new Promise<void>((resolve) => {
    logger.info('Closing SSE server...');
    httpServer.close(() => resolve());
  }));
}

async function startStdio(services: ToolServices): Promise<void> {
  process.env.MCP_TRANSPORT = 'stdio';

  // stdout carries JSON-RPC; send stray console output to stderr
  console.log = (...args: unknown[]) => process.stderr.write(args.join(' ') + '\n');
  console.info = (...args: unknown[]) => process.stderr.write('[INFO] ' + args.join(' ') + '\n');
  console.warn = (...args: unknown[]) => process.stderr.write('[WARN] ' + args.join(' ') + '\n');
  console.error = (...args: unknown[]) => process.stderr.write('[ERROR] ' + args.join(' ') + '\n');

  const transport = new StdioServerTransport();
  await createServer(services, 'stdio').connect(transport);
  logger.info('Phase state MCP server running on stdio');
}

async function main(): Promise<void> {
  const config = loadServerConfig();
  const services = createServices(config);

  // Fail at startup rather than on the first tool call
  const catalog = await services.catalog.getCatalog();
  logger.info(
    { workflows: Object.keys(catalog.workflows), branchTypes: catalog.branch_types },
    'Workflow catalog ready'
  );

  if (detectTransportType() === 'sse') {
    await startSse(services);
  } else {
    await startStdio(services);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
