import { describe, it, expect, vi } from "vitest";
import { paginateNodes } from "../lib/pagination.js";

function page(nodes: string[], endCursor: string | null) {
  return {
    node: {
      items: { nodes, pageInfo: { hasNextPage: endCursor !== null, endCursor } },
    },
  };
}

async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const value of iterable) out.push(value);
  return out;
}

describe("paginateNodes", () => {
  it("follows cursors until the last page", async () => {
    const execute = vi
      .fn()
      .mockResolvedValueOnce(page(["a", "b"], "c1"))
      .mockResolvedValueOnce(page(["c"], null));

    const nodes = await drain(
      paginateNodes<string>(execute, "query", { projectId: "PVT_1" }, "node.items", {
        pageSize: 2,
      }),
    );

    expect(nodes).toEqual(["a", "b", "c"]);
    expect(execute.mock.calls.map((c) => c[1])).toEqual([
      { projectId: "PVT_1", cursor: null, first: 2 },
      { projectId: "PVT_1", cursor: "c1", first: 2 },
    ]);
  });

  it("fetches nothing until iterated", () => {
    const execute = vi.fn();
    paginateNodes(execute, "query", {}, "node.items");
    expect(execute).not.toHaveBeenCalled();
  });

  it("stops at maxItems", async () => {
    const execute = vi.fn().mockResolvedValue(page(["a", "b", "c"], "next"));

    const nodes = await drain(
      paginateNodes<string>(execute, "query", {}, "node.items", { maxItems: 2 }),
    );

    expect(nodes).toEqual(["a", "b"]);
    expect(execute.mock.calls[0][1]).toEqual({ cursor: null, first: 2 });
  });

  it("surfaces a failure after the pages already yielded", async () => {
    const execute = vi
      .fn()
      .mockResolvedValueOnce(page(["a"], "c1"))
      .mockRejectedValueOnce(new Error("socket hang up"));

    const seen: string[] = [];
    await expect(async () => {
      for await (const node of paginateNodes<string>(execute, "query", {}, "node.items")) {
        seen.push(node);
      }
    }).rejects.toThrow("socket hang up");
    expect(seen).toEqual(["a"]);
  });

  it("rejects a response without the connection", async () => {
    const execute = vi.fn().mockResolvedValue({ node: null });
    await expect(drain(paginateNodes(execute, "query", {}, "node.items"))).rejects.toThrow(
      'Connection not found at path "node.items" in GraphQL response',
    );
  });
});
