/**
 * Declaration file for global types and module augmentations
 */

// Environment variables read by the server; all optional
declare namespace NodeJS {
  export interface ProcessEnv {
    WORKSPACE_ROOT?: string;
    PHASE_STATE_DIR?: string;
    WORKFLOWS_CONFIG_PATH?: string;
    RECOVERY_COMMIT_WINDOW?: string;
    GIT_TIMEOUT_MS?: string;
    SSE_PORT?: string;
    PORT?: string;
    MCP_TRANSPORT?: 'stdio' | 'sse';
    LOG_LEVEL?: string;
    PHASE_STATE_LOG_FILE?: string;
    NODE_ENV?: 'development' | 'production' | 'test';
  }
}
