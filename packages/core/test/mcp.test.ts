import { describe, it, expect } from "vitest";
import { errorResponse, successResponse, resultToResponse } from "../src/mcp.js";
import { Ok, Err } from "../src/result.js";

describe("MCP responses", () => {
  it("errorResponse flags the failure", () => {
    expect(errorResponse("index missing")).toEqual({
      content: [{ type: "text", text: "Error: index missing" }],
      structuredContent: { success: false, error: "index missing" },
      isError: true,
    });
  });

  it("successResponse merges data with success: true", () => {
    const response = successResponse("2 results", { count: 2 });
    expect(response.content[0].text).toBe("2 results");
    expect(response.structuredContent).toEqual({ count: 2, success: true });
  });

  describe("resultToResponse", () => {
    it("formats successful results", () => {
      const response = resultToResponse(Ok(5), (n) => successResponse(`value ${n}`, { n }));
      expect(response.content[0].text).toBe("value 5");
      expect(response.structuredContent).toEqual({ n: 5, success: true });
    });

    it("uses the error message for Error failures", () => {
      const response = resultToResponse(Err(new Error("disk full")), () => successResponse("unused", {}));
      expect(response.content[0].text).toBe("Error: disk full");
      expect(response.isError).toBe(true);
    });

    it("accepts string errors", () => {
      const response = resultToResponse(Err("bad input"), () => successResponse("unused", {}));
      expect(response.structuredContent).toEqual({ success: false, error: "bad input" });
    });
  });
});
