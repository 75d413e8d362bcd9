import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  McpBridge,
  formatToolResult,
  normalizeContent,
  normalizeText,
} from "../../../../src/integrations/mcp/bridge.js";
import { McpSessionTable } from "../../../../src/integrations/mcp/session-table.js";
import { createMockLogger } from "../../../helpers/mocks.js";
import { createServerConfig } from "../../../helpers/fixtures.js";
import {
  createEchoServer,
  createInMemoryTransports,
  createUtilityServer,
  type EchoServerState,
} from "../../../helpers/mcp-servers.js";

describe("normalizeText", () => {
  it("parses text that is a JSON object", () => {
    expect(normalizeText('{"timezone":"Europe/Amsterdam"}')).toEqual({
      timezone: "Europe/Amsterdam",
    });
  });

  it("parses a JSON array with surrounding whitespace", () => {
    expect(normalizeText("  [1, 2, 3]\n")).toEqual([1, 2, 3]);
  });

  it("returns invalid JSON-looking text unchanged", () => {
    expect(normalizeText("{not json")).toBe("{not json");
  });

  it("returns plain text unchanged, whitespace included", () => {
    expect(normalizeText("  hello ")).toBe("  hello ");
  });

  it("does not promote JSON scalars", () => {
    expect(normalizeText("42")).toBe("42");
    expect(normalizeText('"quoted"')).toBe('"quoted"');
  });
});

describe("normalizeContent", () => {
  it("uses the first text item", () => {
    expect(
      normalizeContent([
        { type: "image", data: "aGVsbG8=", mimeType: "image/png" },
        { type: "text", text: "first" },
        { type: "text", text: "second" },
      ])
    ).toBe("first");
  });

  it("describes non-text items when there is no text", () => {
    expect(
      normalizeContent([
        { type: "image", data: "aGVsbG8=", mimeType: "image/png" },
        {
          type: "resource",
          resource: { uri: "file:///a.txt", mimeType: "text/plain", text: "file body" },
        },
        { type: "resource", resource: { uri: "file:///a.bin", blob: "AAAA" } },
      ])
    ).toBe("[Image: image/png]\nfile body\n[Binary resource: unknown]");
  });

  it("yields an empty string for an empty content list", () => {
    expect(normalizeContent([])).toBe("");
  });
});

describe("formatToolResult", () => {
  it("passes strings through", () => {
    expect(formatToolResult("plain")).toBe("plain");
  });

  it("pretty-prints structured values", () => {
    expect(formatToolResult({ a: 1 })).toBe('{\n  "a": 1\n}');
  });

  it("renders undefined as an empty string", () => {
    expect(formatToolResult(undefined)).toBe("");
  });
});

describe("McpBridge", () => {
  let sessions: McpSessionTable;
  let bridge: McpBridge;
  let state: EchoServerState;

  beforeEach(async () => {
    state = { calls: [] };
    const logger = createMockLogger();
    sessions = new McpSessionTable(logger, {
      createTransport: await createInMemoryTransports({
        echo: createEchoServer(state),
        util: createUtilityServer(state),
      }),
      commandExists: () => true,
    });
    await sessions.connectAll({ echo: createServerConfig(), util: createServerConfig() });
    bridge = new McpBridge(sessions, logger);
  });

  afterEach(async () => {
    await sessions.closeAll();
  });

  it("returns an error string for a server that is not connected", async () => {
    const result = await bridge.dispatch("missing", "anything", { x: 1 });
    expect(result).toBe("Error: Server 'missing' is not connected.");
    expect(bridge.getCallCount()).toBe(0);
  });

  it.each([
    { tool: "", args: {} },
    { tool: "read_file", args: { path: "/etc/hosts" } },
    { tool: "echo", args: { text: "hi" } },
  ])("never rejects for an absent server (tool '$tool')", async ({ tool, args }) => {
    await expect(bridge.dispatch("nowhere", tool, args)).resolves.toBeTypeOf("string");
  });

  it("forwards the call and returns plain text unchanged", async () => {
    const result = await bridge.dispatch("echo", "echo", { text: "hi" });

    expect(result).toBe("hi");
    expect(state.calls).toEqual([{ tool: "echo", args: { text: "hi" } }]);
    expect(bridge.getCallCount()).toBe(1);
  });

  it("promotes JSON object results to structured values", async () => {
    const result = await bridge.dispatch("util", "get_current_time", {
      timezone: "Europe/Amsterdam",
    });

    expect(result).toEqual({
      timezone: "Europe/Amsterdam",
      datetime: "2026-01-01T12:00:00+01:00",
    });
  });

  it("promotes JSON array results", async () => {
    expect(await bridge.dispatch("util", "list_numbers", { count: 2 })).toEqual([1, 2]);
  });

  it("describes image-only results", async () => {
    expect(await bridge.dispatch("util", "snapshot")).toBe("[Image: image/png]");
  });

  it("returns the text of a tool-reported error", async () => {
    const result = await bridge.dispatch("util", "explode");
    expect(result).toBeTypeOf("string");
    expect(String(result)).toContain("kaboom");
  });

  it("turns a failing call into an error string", async () => {
    await sessions.closeAll();
    const logger = createMockLogger();
    const broken = new McpSessionTable(logger, {
      createTransport: await createInMemoryTransports({ echo: createEchoServer() }),
      commandExists: () => true,
    });
    await broken.connectAll({ echo: createServerConfig() });
    const client = broken.getClient("echo");
    expect(client).toBeDefined();
    await client?.disconnect();

    const result = await new McpBridge(broken, logger).dispatch("echo", "echo", { text: "hi" });

    expect(String(result)).toMatch(/^Error: Tool 'echo' on server 'echo' failed: /);
    await broken.closeAll();
  });
});
