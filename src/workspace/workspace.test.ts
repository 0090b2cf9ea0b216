import { describe, test, expect } from "vitest";
import { WorkspaceReconciler } from "./workspace";
import { FabricClient } from "#/fabric";
import {
  createMockClock,
  createMockHttpClient,
  errorResponse,
  jsonResponse,
  type MockResponder,
} from "#/test-utils/mocks";
import { createSilentLogger } from "#/logging";
import { WorkspaceError } from "#/errors";

const API = "https://api.fabric.microsoft.com/v1";

function createReconciler(routes: Record<string, MockResponder>) {
  const http = createMockHttpClient(routes);
  const clock = createMockClock();
  const fabric = new FabricClient({ acquire: async () => "token-a" }, http, createSilentLogger());
  const reconciler = new WorkspaceReconciler(fabric, clock, createSilentLogger());
  return { reconciler, http, clock };
}

const calls = (http: { requests: { method: string; url: string }[] }) =>
  http.requests.map((request) => `${request.method} ${request.url}`);

describe("WorkspaceReconciler", () => {
  test("returns the workspace found by explicit id without listing", async () => {
    const { reconciler, http } = createReconciler({
      [`GET ${API}/workspaces/ws-1`]: jsonResponse({ id: "ws-1", displayName: "Sales" }),
    });

    const result = await reconciler.ensure({ name: "Sales", capacityId: "cap-1", explicitId: "ws-1" });

    expect(result).toEqual({ workspace: { id: "ws-1", displayName: "Sales" }, resolution: "found-by-id" });
    expect(calls(http)).toEqual([`GET ${API}/workspaces/ws-1`]);
  });

  test("falls back to a name search when the id lookup fails", async () => {
    const { reconciler, http } = createReconciler({
      [`GET ${API}/workspaces/ws-gone`]: errorResponse(404),
      [`GET ${API}/workspaces`]: jsonResponse({
        value: [
          { id: "ws-1", displayName: "Finance" },
          { id: "ws-2", displayName: "Sales" },
        ],
      }),
    });

    const result = await reconciler.ensure({ name: "Sales", capacityId: "cap-1", explicitId: "ws-gone" });

    expect(result).toEqual({ workspace: { id: "ws-2", displayName: "Sales" }, resolution: "found-by-name" });
    expect(calls(http)).toEqual([`GET ${API}/workspaces/ws-gone`, `GET ${API}/workspaces`]);
  });

  test("creates the workspace when it is not found and waits for provisioning", async () => {
    const { reconciler, http, clock } = createReconciler({
      [`GET ${API}/workspaces`]: jsonResponse({ value: [] }),
      [`POST ${API}/workspaces`]: jsonResponse({ id: "ws-new", displayName: "Sales" }, 201),
    });

    const result = await reconciler.ensure({ name: "Sales", capacityId: "cap-1" });

    expect(result).toEqual({ workspace: { id: "ws-new", displayName: "Sales" }, resolution: "created" });
    expect(JSON.parse(http.requests[1]!.body ?? "")).toEqual({
      displayName: "Sales",
      capacityId: "cap-1",
      description: "Production workspace for Sales, managed by fabric-promote",
    });
    expect(clock.sleeps).toEqual([2000]);
  });

  test("matches display names exactly", async () => {
    const { reconciler, http } = createReconciler({
      [`GET ${API}/workspaces`]: jsonResponse({ value: [{ id: "ws-1", displayName: "sales" }] }),
      [`POST ${API}/workspaces`]: jsonResponse({ id: "ws-new", displayName: "Sales" }, 201),
    });

    const result = await reconciler.ensure({ name: "Sales", capacityId: "cap-1" });

    expect(result.resolution).toBe("created");
    expect(calls(http)).toEqual([`GET ${API}/workspaces`, `POST ${API}/workspaces`]);
  });

  test("resolves a conflict to the explicit id", async () => {
    const { reconciler, http } = createReconciler({
      [`GET ${API}/workspaces/ws-hidden`]: errorResponse(403),
      [`GET ${API}/workspaces`]: jsonResponse({ value: [] }),
      [`POST ${API}/workspaces`]: errorResponse(409, "WorkspaceNameAlreadyExists"),
    });

    const result = await reconciler.ensure({ name: "Sales", capacityId: "cap-1", explicitId: "ws-hidden" });

    expect(result).toEqual({
      workspace: { id: "ws-hidden", displayName: "Sales", capacityId: "cap-1" },
      resolution: "conflict-resolved",
    });
    expect(http.requests.filter((request) => request.method === "POST")).toHaveLength(1);
  });

  test("re-lists once on conflict without an explicit id", async () => {
    let listings = 0;
    const { reconciler } = createReconciler({
      [`GET ${API}/workspaces`]: () => {
        listings += 1;
        return jsonResponse({ value: listings === 1 ? [] : [{ id: "ws-7", displayName: "Sales" }] });
      },
      [`POST ${API}/workspaces`]: errorResponse(409),
    });

    const result = await reconciler.ensure({ name: "Sales", capacityId: "cap-1" });

    expect(result).toEqual({ workspace: { id: "ws-7", displayName: "Sales" }, resolution: "conflict-resolved" });
    expect(listings).toBe(2);
  });

  test("throws WorkspaceError when a conflict cannot be resolved", async () => {
    const { reconciler } = createReconciler({
      [`GET ${API}/workspaces`]: jsonResponse({ value: [] }),
      [`POST ${API}/workspaces`]: errorResponse(409),
    });

    const attempt = reconciler.ensure({ name: "Sales", capacityId: "cap-1" });

    await expect(attempt).rejects.toBeInstanceOf(WorkspaceError);
    await expect(attempt).rejects.toMatchObject({ code: "WORKSPACE", details: { status: 409, workspace: "Sales" } });
  });

  test("throws WorkspaceError on any other create failure", async () => {
    const { reconciler } = createReconciler({
      [`GET ${API}/workspaces`]: jsonResponse({ value: [] }),
      [`POST ${API}/workspaces`]: errorResponse(400, "InvalidCapacity"),
    });

    await expect(reconciler.ensure({ name: "Sales", capacityId: "cap-x" })).rejects.toMatchObject({
      code: "WORKSPACE",
      message: "Failed to create workspace Sales: 400",
      details: { status: 400, body: "InvalidCapacity" },
    });
  });

  test("is idempotent: a second run finds what the first created", async () => {
    const existing: { id: string; displayName: string }[] = [];
    const { reconciler, http } = createReconciler({
      [`GET ${API}/workspaces`]: () => jsonResponse({ value: existing }),
      [`POST ${API}/workspaces`]: () => {
        existing.push({ id: "ws-new", displayName: "Sales" });
        return jsonResponse({ id: "ws-new", displayName: "Sales" }, 201);
      },
    });

    const first = await reconciler.ensure({ name: "Sales", capacityId: "cap-1" });
    const second = await reconciler.ensure({ name: "Sales", capacityId: "cap-1" });

    expect(first.workspace.id).toBe("ws-new");
    expect(second).toEqual({ workspace: { id: "ws-new", displayName: "Sales" }, resolution: "found-by-name" });
    expect(http.requests.filter((request) => request.method === "POST")).toHaveLength(1);
  });
});

describe("WorkspaceReconciler.verify", () => {
  test("returns a reachable workspace without creating anything", async () => {
    const { reconciler, http } = createReconciler({
      [`GET ${API}/workspaces/ws-dev`]: jsonResponse({ id: "ws-dev", displayName: "Sales Dev" }),
    });

    const workspace = await reconciler.verify("ws-dev", "Source");

    expect(workspace).toEqual({ id: "ws-dev", displayName: "Sales Dev" });
    expect(calls(http)).toEqual([`GET ${API}/workspaces/ws-dev`]);
  });

  test("names the cause when the workspace is missing", async () => {
    const { reconciler } = createReconciler({
      [`GET ${API}/workspaces/ws-dev`]: errorResponse(404, '{"errorCode":"WorkspaceNotFound"}'),
    });

    const verifying = reconciler.verify("ws-dev", "Source");

    await expect(verifying).rejects.toBeInstanceOf(WorkspaceError);
    await expect(verifying).rejects.toMatchObject({
      message: "Cannot access source workspace ws-dev: workspace not found",
      details: { status: 404, body: '{"errorCode":"WorkspaceNotFound"}', workspace: "ws-dev" },
    });
  });

  test("reports access denial", async () => {
    const { reconciler } = createReconciler({
      [`GET ${API}/workspaces/ws-dev`]: errorResponse(403),
    });

    await expect(reconciler.verify("ws-dev", "Source")).rejects.toThrow(
      "Cannot access source workspace ws-dev: access denied, the principal is not a member"
    );
  });

  test("falls back to the response status for other failures", async () => {
    const { reconciler } = createReconciler({
      [`GET ${API}/workspaces/ws-dev`]: errorResponse(500),
    });

    await expect(reconciler.verify("ws-dev", "Source")).rejects.toThrow("Cannot access source workspace ws-dev: 500");
  });
});
