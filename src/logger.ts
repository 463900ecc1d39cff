// src/logger.ts
import pino, { type Logger } from 'pino';
import path from 'path';
import { fileURLToPath } from 'url';

const isDevelopment = process.env.NODE_ENV === 'development';
const isStdioTransport = process.env.MCP_TRANSPORT === 'stdio' || !process.argv.includes('--sse');

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function resolveLogLevel(raw: string | undefined): LogLevel {
  const match = LOG_LEVELS.find(level => level === raw?.toLowerCase());
  return match ?? (isDevelopment ? 'debug' : 'info');
}

const effectiveLogLevel = resolveLogLevel(process.env.LOG_LEVEL);

/**
 * Transport the server was started with. SSE is opt-in through `--sse`;
 * everything else speaks JSON-RPC over stdio.
 */
export function detectTransportType(): 'stdio' | 'sse' {
  if (process.argv.slice(2).includes('--sse') || process.env.MCP_TRANSPORT === 'sse') {
    return 'sse';
  }
  return 'stdio';
}

// --- Calculate paths ---
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// src/logger.ts and dist/logger.js both sit one level below the package root
const logFilePath = process.env.PHASE_STATE_LOG_FILE || path.resolve(__dirname, '../server.log');

const fileDestination = pino.destination({
  dest: logFilePath,
  append: true,
  mkdir: true
});
// stdout carries the MCP protocol under stdio, so the console copy goes to stderr
const consoleStream = (isDevelopment && !isStdioTransport) ? process.stdout : process.stderr;

const streams = [
  { level: effectiveLogLevel, stream: fileDestination },
  { level: effectiveLogLevel, stream: consoleStream }
];

const configuredLogger = pino(
  { level: effectiveLogLevel },
  pino.multistream(streams)
);

// --- Graceful shutdown handling ---
let shutdownInProgress = false;
let loggerDestroyed = false;

/**
 * Wraps the logger so calls made after shutdown fall back to the console
 * instead of writing to a closed SonicBoom stream.
 */
function createResilientLogger(baseLogger: Logger): Logger {
  return new Proxy(baseLogger, {
    get(target, prop, receiver) {
      if (loggerDestroyed && typeof prop === 'string' && ['debug', 'info', 'warn', 'error', 'fatal', 'trace'].includes(prop)) {
        return function(obj: unknown, msg?: string) {
          if (typeof obj === 'string') {
            console.error(`[${prop.toUpperCase()}] ${obj}`);
          } else if (msg) {
            console.error(`[${prop.toUpperCase()}] ${msg}`, obj);
          } else {
            console.error(`[${prop.toUpperCase()}]`, obj);
          }
        };
      }
      return Reflect.get(target, prop, receiver);
    }
  });
}

/**
 * Flushes and closes the file destination. Safe to call more than once.
 */
export function shutdownLogger(): Promise<void> {
  if (shutdownInProgress) {
    return Promise.resolve();
  }

  shutdownInProgress = true;

  return new Promise((resolve) => {
    try {
      configuredLogger.info('Initiating logger shutdown');

      try {
        fileDestination.flushSync();
      } catch (flushError) {
        // The stream may not have opened yet
        console.warn('Warning: Could not flush logger during shutdown:', flushError instanceof Error ? flushError.message : String(flushError));
      }

      try {
        fileDestination.end();
      } catch (endError) {
        console.warn('Warning: Could not end logger stream during shutdown:', endError instanceof Error ? endError.message : String(endError));
      }

      loggerDestroyed = true;

      setTimeout(() => {
        resolve();
      }, 150);

    } catch (error) {
      console.error('Error during logger shutdown:', error);
      loggerDestroyed = true;
      resolve();
    }
  });
}

const shutdownCallbacks: Array<() => Promise<void> | void> = [];

/**
 * Register a callback to be called during graceful shutdown
 */
export function registerShutdownCallback(callback: () => Promise<void> | void): void {
  shutdownCallbacks.push(callback);
}

async function executeShutdownCallbacks(): Promise<void> {
  for (const callback of shutdownCallbacks) {
    try {
      await callback();
    } catch (error) {
      console.error('Error in shutdown callback:', error);
    }
  }
}

function setupShutdownHandlers(): void {
  let shutdownInitiated = false;

  const handleShutdown = async (signal: string) => {
    if (shutdownInitiated) {
      console.error(`\nForced shutdown on second ${signal}`);
      process.exit(1);
    }

    shutdownInitiated = true;

    try {
      console.error(`\nReceived ${signal}, shutting down gracefully...`);
      await executeShutdownCallbacks();
      await shutdownLogger();
      process.exit(0);
    } catch (error) {
      console.error('Error during graceful shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('Uncaught Exception:', error);
    executeShutdownCallbacks()
      .then(() => shutdownLogger())
      .catch((shutdownError: unknown) => console.error('Error during emergency shutdown:', shutdownError))
      .finally(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection, reason:', reason);
    executeShutdownCallbacks()
      .then(() => shutdownLogger())
      .catch((shutdownError: unknown) => console.error('Error during emergency shutdown:', shutdownError))
      .finally(() => process.exit(1));
  });
}

// Vitest owns the process lifecycle in test runs
if (!process.env.VITEST) {
  setupShutdownHandlers();
}

const resilientLogger = createResilientLogger(configuredLogger);
export default resilientLogger;
