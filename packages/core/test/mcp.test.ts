import { describe, it, expect } from "vitest";
import { errorResponse, resultToStructuredResponse } from "../src/mcp.js";
import { Ok, Err, type Result } from "../src/result.js";

describe("MCP utilities", () => {
  describe("errorResponse", () => {
    it("prefixes the message and flags the response", () => {
      expect(errorResponse("ripgrep missing")).toEqual({
        content: [{ type: "text", text: "Error: ripgrep missing" }],
        structuredContent: { success: false, error: "ripgrep missing" },
        isError: true,
      });
    });
  });

  describe("resultToStructuredResponse", () => {
    it("formats Ok values", () => {
      const result: Result<string[], Error> = Ok(["A.a/0", "B.b/1"]);
      const response = resultToStructuredResponse(result, (value) => ({
        text: value.join("\n"),
        data: { count: value.length },
      }));
      expect(response).toEqual({
        content: [{ type: "text", text: "A.a/0\nB.b/1" }],
        structuredContent: { success: true, count: 2 },
      });
    });

    it("uses the Error message for Err values", () => {
      const result: Result<string[], Error> = Err(new Error("parse failed"));
      const response = resultToStructuredResponse(result, (value) => ({
        text: value.join("\n"),
        data: { count: value.length },
      }));
      expect(response.structuredContent).toEqual({ success: false, error: "parse failed" });
      expect(response.isError).toBe(true);
    });

    it("accepts plain string errors", () => {
      const result: Result<number, string> = Err("bad signature");
      const response = resultToStructuredResponse(result, (value) => ({
        text: String(value),
        data: { value },
      }));
      expect(response.content).toEqual([{ type: "text", text: "Error: bad signature" }]);
    });
  });
});
