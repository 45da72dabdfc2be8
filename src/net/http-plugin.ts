import type { BridgeContext } from "../context.js";
import { describeError } from "../errors/diagnostic.js";
import { IdCounter } from "../handles/handle-registry.js";
import { bytesValue, type HostValue } from "../handles/host-values.js";
import { PendingTable } from "../handles/pending-table.js";
import type { HostFetchInit, HostFetchResponse } from "../host/host.js";
import type { CallTable } from "../plugins/plugin.js";

export const HTTP_METHODS = ["POST", "PUT", "GET", "DELETE"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export const NO_RESPONSE = -1;

const EMPTY = new Uint8Array(0);

function methodFromCode(code: number): HttpMethod | null {
  return HTTP_METHODS[code] ?? null;
}

function requestBody(value: HostValue | null): string | Uint8Array | undefined {
  if (value === null) return undefined;
  if (value.kind === "string") return value.value;
  if (value.kind === "bytes") return value.value;
  return undefined;
}

/**
 * Request/response bridge. A failed request still settles, with an empty
 * body, so the guest's poll always ends.
 */
export class HttpBridge {
  private readonly requests = new PendingTable<Uint8Array>(new IdCounter(0));

  constructor(private readonly ctx: BridgeContext) {}

  get inFlight(): number {
    return this.requests.size;
  }

  /** Start a request and return its id. */
  request(method: HttpMethod, url: string, headers: Record<string, string>, body?: string | Uint8Array): number {
    const id = this.requests.open();
    const fetch = this.ctx.host.fetch;
    if (fetch === undefined) {
      this.ctx.log.warnOnce("http-unavailable", "missing-capability", "host has no HTTP support");
      this.requests.settle(id, EMPTY);
      return id;
    }

    const init: HostFetchInit = { method, headers };
    if (body !== undefined && method !== "GET") init.body = body;

    const fail = (message: string, detail?: unknown): void => {
      this.ctx.log.error("async-failure", `${method} ${url} (request ${id}) failed: ${message}`, detail);
      this.requests.settle(id, EMPTY);
    };

    let pending: Promise<HostFetchResponse>;
    try {
      pending = fetch(url, init);
    } catch (e) {
      fail(describeError(e), e);
      return id;
    }
    pending
      .then(async (response) => {
        if (!response.ok) {
          fail(`HTTP ${response.status}`);
          return;
        }
        const data = await response.arrayBuffer();
        this.requests.settle(id, new Uint8Array(data));
      })
      .catch((e: unknown) => fail(describeError(e), e));
    return id;
  }

  /** The response body exactly once after completion, undefined otherwise. */
  take(id: number): Uint8Array | undefined {
    return this.requests.take(id);
  }

  register(table: CallTable): void {
    const values = this.ctx.hostValues;
    table.defineAll({
      http_make_request: (methodCode, urlHandle, bodyHandle, headersHandle) => {
        const url = values.consumeString(urlHandle, "http_make_request");
        const body = requestBody(values.consume(bodyHandle, "http_make_request"));
        const headers = values.consumeStringRecord(headersHandle, "http_make_request");
        const method = methodFromCode(methodCode);
        if (method === null || url === null) {
          const id = this.requests.open();
          this.ctx.log.error(
            "async-failure",
            method === null
              ? `http_make_request: unknown method code ${methodCode}`
              : "http_make_request: the URL handle does not hold a string",
          );
          this.requests.settle(id, EMPTY);
          return id;
        }
        return this.request(method, url, headers, body);
      },
      http_try_recv: (id) => {
        const data = this.take(id);
        return data === undefined ? NO_RESPONSE : values.wrap(bytesValue(data));
      },
    });
  }
}
