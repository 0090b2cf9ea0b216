/**
 * Fabric API client
 *
 * Thin REST wrapper over the Fabric v1 API. Every call resolves to an
 * ApiResult; only token acquisition failures are thrown, since without a
 * token nothing else can proceed.
 */

import type { Logger } from "winston";
import type { ZodType, ZodTypeDef } from "zod";
import type { HttpClient } from "#/core";
import type { TokenSource } from "#/auth";
import type { WorkspaceRole } from "#/schemas";
import {
  CreatedItemSchema,
  RoleAssignmentListSchema,
  WorkspaceListSchema,
  WorkspaceSchema,
} from "#/schemas";
import { errorMessage } from "#/errors";
import { FABRIC_API_URL, ITEM_CREATE_TIMEOUT_MS, READ_TIMEOUT_MS, USER_AGENT } from "#/constants";
import type {
  ApiResult,
  CreatedItem,
  CreateItemRequest,
  CreateWorkspaceRequest,
  FabricApi,
  FabricClientOptions,
  Principal,
  RoleAssignmentInfo,
  WorkspaceInfo,
} from "./fabric.types";

type HttpMethod = "GET" | "POST";

interface RawResponse {
  status: number;
  text: string;
}

type RawResult = { ok: true; response: RawResponse } | { ok: false; status: number; body: string; error: string };

interface Page<Item> {
  value: Item[];
  continuationUri?: string | null;
}

const DEFAULT_MAX_PAGES = 100;

export class FabricClient implements FabricApi {
  private readonly baseUrl: string;
  private readonly readTimeoutMs: number;
  private readonly itemTimeoutMs: number;
  private readonly maxPages: number;

  constructor(
    private readonly tokens: TokenSource,
    private readonly http: HttpClient,
    private readonly logger: Logger,
    options: FabricClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? FABRIC_API_URL).replace(/\/+$/, "");
    this.readTimeoutMs = options.readTimeoutMs ?? READ_TIMEOUT_MS;
    this.itemTimeoutMs = options.itemTimeoutMs ?? ITEM_CREATE_TIMEOUT_MS;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  }

  async getWorkspace(workspaceId: string): Promise<ApiResult<WorkspaceInfo>> {
    const raw = await this.send("GET", this.url(`/workspaces/${encodeURIComponent(workspaceId)}`), this.readTimeoutMs);
    return this.parse(raw, WorkspaceSchema);
  }

  async listWorkspaces(): Promise<ApiResult<WorkspaceInfo[]>> {
    return this.collectPages(this.url("/workspaces"), WorkspaceListSchema, "workspaces");
  }

  async createWorkspace(request: CreateWorkspaceRequest): Promise<ApiResult<WorkspaceInfo>> {
    const raw = await this.send("POST", this.url("/workspaces"), this.readTimeoutMs, request);
    return this.parse(raw, WorkspaceSchema);
  }

  async listRoleAssignments(workspaceId: string): Promise<ApiResult<RoleAssignmentInfo[]>> {
    return this.collectPages(
      this.url(`/workspaces/${encodeURIComponent(workspaceId)}/roleAssignments`),
      RoleAssignmentListSchema,
      "role assignments"
    );
  }

  async createRoleAssignment(
    workspaceId: string,
    principal: Principal,
    role: WorkspaceRole
  ): Promise<ApiResult<null>> {
    const raw = await this.send(
      "POST",
      this.url(`/workspaces/${encodeURIComponent(workspaceId)}/roleAssignments`),
      this.readTimeoutMs,
      { principal, role }
    );
    if (!raw.ok) return raw;
    return { ok: true, status: raw.response.status, data: null };
  }

  async createItem(workspaceId: string, request: CreateItemRequest): Promise<ApiResult<CreatedItem | null>> {
    const raw = await this.send(
      "POST",
      this.url(`/workspaces/${encodeURIComponent(workspaceId)}/items`),
      this.itemTimeoutMs,
      request
    );
    if (!raw.ok) return raw;

    // 202 Accepted carries no body; a 201 body that doesn't look like an item
    // still counts as created
    const item = CreatedItemSchema.safeParse(parseJson(raw.response.text));
    return { ok: true, status: raw.response.status, data: item.success ? item.data : null };
  }

  /**
   * Follow `continuationUri` links until the listing ends or `maxPages` is
   * reached. A failed page fails the whole listing.
   */
  private async collectPages<Item, Input>(
    firstUrl: string,
    schema: ZodType<Page<Item>, ZodTypeDef, Input>,
    label: string
  ): Promise<ApiResult<Item[]>> {
    const items: Item[] = [];
    let next: string | null | undefined = firstUrl;
    let status = 200;

    for (let page = 0; next && page < this.maxPages; page++) {
      const raw = await this.send("GET", next, this.readTimeoutMs);
      const parsed = this.parse(raw, schema);
      if (!parsed.ok) return parsed;

      status = parsed.status;
      items.push(...parsed.data.value);
      next = parsed.data.continuationUri;
    }

    if (next) {
      this.logger.warn(`Listing of ${label} truncated after ${this.maxPages} page(s); later entries are not visible`);
    }

    return { ok: true, status, data: items };
  }

  private url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  private async getHeaders(): Promise<Record<string, string>> {
    const token = await this.tokens.acquire();
    return {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
      "User-Agent": USER_AGENT,
    };
  }

  private async send(method: HttpMethod, url: string, timeoutMs: number, body?: unknown): Promise<RawResult> {
    const headers = await this.getHeaders();
    this.logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.http.fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      const message = errorMessage(err);
      this.logger.debug(`${method} ${url} failed: ${message}`);
      return { ok: false, status: 0, body: "", error: `Request failed: ${message}` };
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      return { ok: false, status: response.status, body: "", error: `Failed to read response: ${errorMessage(err)}` };
    }

    this.logger.debug(`${method} ${url} -> ${response.status}`);

    if (!response.ok) {
      return {
        ok: false,
        status: response.status,
        body: text,
        error: `${response.status} ${response.statusText}`.trim(),
      };
    }

    return { ok: true, response: { status: response.status, text } };
  }

  private parse<Output, Input>(
    raw: RawResult,
    schema: ZodType<Output, ZodTypeDef, Input>
  ): ApiResult<Output> {
    if (!raw.ok) return raw;

    const { status, text } = raw.response;
    const parsed = schema.safeParse(parseJson(text));
    if (!parsed.success) {
      return { ok: false, status, body: text, error: "Unexpected response shape from Fabric API" };
    }
    return { ok: true, status, data: parsed.data };
  }
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
