export { Ok, Err, toError, all, tryCatch } from "./result.js";
export type { Result } from "./result.js";

export { errorResponse, resultToStructuredResponse } from "./mcp.js";
export type { TextContent, ToolResponse, FailureContent } from "./mcp.js";

export { bootstrapServer, runServer, McpServer } from "./server.js";
export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
