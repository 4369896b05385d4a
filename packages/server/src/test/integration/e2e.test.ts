/**
 * End-to-end tests: MCP client and server connected in-process
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { createTempDir, removeDir } from "@userstore/testkit";
import { openUserStore } from "@userstore/sdk";
import { createServer } from "../../server.js";
import { UserStoreService } from "../../service/userstore.js";
import { Logger } from "../../observability/logger.js";
import { MetricsRegistry } from "../../observability/metrics.js";

interface Session {
  client: Client;
  close: () => Promise<void>;
}

async function connect(dataFile: string, readOnly = false): Promise<Session> {
  const logger = new Logger("error", () => undefined);
  const service = new UserStoreService(openUserStore(dataFile), logger);
  const server = createServer({ service, logger, metrics: new MetricsRegistry(), readOnly });
  const client = new Client({ name: "userstore-test-client", version: "0.0.0" });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);

  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
      await service.close();
    },
  };
}

function callTool(client: Client, name: string, args: Record<string, unknown> = {}) {
  return client.request(
    { method: "tools/call", params: { name, arguments: args } },
    CallToolResultSchema
  );
}

describe("MCP server end-to-end", () => {
  let testDir: string;
  let dataFile: string;

  beforeEach(async () => {
    testDir = await createTempDir("userstore-e2e-");
    dataFile = join(testDir, "users.json");
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  it("should advertise all four tools", async () => {
    const session = await connect(dataFile);

    const { tools } = await session.client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      "list_users",
      "get_user",
      "create_user",
      "delete_user",
    ]);
    await session.close();
  });

  it("should run a create, list, delete cycle", async () => {
    const session = await connect(dataFile);

    const created = await callTool(session.client, "create_user", { id: "u1", name: "Ada" });
    expect(created.structuredContent).toEqual({ user: { id: "u1", name: "Ada" } });

    const listed = await callTool(session.client, "list_users");
    expect(listed.structuredContent).toEqual({ users: [{ id: "u1", name: "Ada" }], count: 1 });

    await callTool(session.client, "delete_user", { id: "u1" });
    const after = await callTool(session.client, "list_users");
    expect(after.structuredContent).toEqual({ users: [], count: 0 });

    await session.close();
  });

  it("should map store errors to protocol error codes", async () => {
    const session = await connect(dataFile);
    await callTool(session.client, "create_user", { id: "u1", name: "Ada" });

    await expect(
      callTool(session.client, "create_user", { id: "u1", name: "Grace" })
    ).rejects.toMatchObject({ code: ErrorCode.InvalidRequest });
    await expect(callTool(session.client, "delete_user", { id: "nope" })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
    await expect(callTool(session.client, "create_user", { name: "" })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
    await expect(callTool(session.client, "get_user", {})).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
    await expect(callTool(session.client, "drop_table")).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });

    await session.close();
  });

  describe("read-only mode", () => {
    it("should only advertise and serve the read tools", async () => {
      const writer = await connect(dataFile);
      await callTool(writer.client, "create_user", { id: "u1", name: "Ada" });
      await writer.close();

      const session = await connect(dataFile, true);

      const { tools } = await session.client.listTools();
      expect(tools.map((tool) => tool.name)).toEqual(["list_users", "get_user"]);

      const fetched = await callTool(session.client, "get_user", { id: "u1" });
      expect(fetched.structuredContent).toEqual({ user: { id: "u1", name: "Ada" } });

      await expect(callTool(session.client, "delete_user", { id: "u1" })).rejects.toMatchObject({
        code: ErrorCode.InvalidRequest,
      });

      await session.close();
    });
  });
});
