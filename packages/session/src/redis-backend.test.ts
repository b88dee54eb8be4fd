import { describe, it, expect } from "vitest";
import { parseInfo } from "./redis-backend.js";

describe("parseInfo", () => {
  it("reads memory and client counts from an INFO reply", () => {
    const raw = [
      "# Clients",
      "connected_clients:3",
      "blocked_clients:0",
      "",
      "# Memory",
      "used_memory:1048576",
      "used_memory_human:1.00M",
    ].join("\r\n");

    expect(parseInfo(raw)).toEqual({ memoryUsed: "1.00M", connectedClients: 3 });
  });

  it("leaves out fields the reply does not carry", () => {
    expect(parseInfo("# Server\r\nredis_version:7.2.4\r\n")).toEqual({});
  });
});
