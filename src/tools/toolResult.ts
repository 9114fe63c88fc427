import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { AppError, describeError } from "../domain/errors.js";

export function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
}

/**
 * Runs a tool body and reports service errors as an MCP tool error instead of
 * failing the JSON-RPC call.
 */
export async function runTool(task: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return jsonResult(await task());
  } catch (error) {
    const message =
      error instanceof AppError && error.clientFacing
        ? error.message
        : `Request failed: ${describeError(error)}`;
    if (!(error instanceof AppError)) {
      console.error("Unhandled tool error:", error);
    }
    return {
      content: [{ type: "text", text: message }],
      isError: true,
    };
  }
}
