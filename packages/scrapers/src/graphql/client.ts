/**
 * HTTP client for the event platform's GraphQL endpoint.
 *
 * One instance per run, configured explicitly; there is no shared state
 * between instances. Malformed list responses are downgraded to empty
 * pages so upstream shape drift stalls the collector instead of killing it.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { AttendeeDetail } from "@attendee-sync/core";
import { MalformedResponseError, TransportError } from "../errors.js";
import type { DetailSource, FirstPage, NextPage, PageSource } from "../scraper.js";
import { decodeUpstreamResponse, expectDetail, expectListPage } from "./decode.js";
import {
  listPeopleOperation,
  personDetailOperation,
  type PersistedOperation,
} from "./operations.js";

export const USER_AGENT = "attendee-sync/0.1";

/** Everything needed to talk to one event's people view. */
export interface PlatformConfig {
  endpoint: URL;
  /** Sent with every request (authorization, cookie, client headers). */
  staticHeaders: Record<string, string>;
  /** Page size the platform uses; only used to estimate page counts. */
  pageSizeHint: number;
  /** Pause after each list page. */
  rateLimitDelayMs: number;
  eventId: string;
  viewId: string;
  listQueryHash: string;
  detailQueryHash: string;
  requestTimeoutMs: number;
  /** Extra attempts after a retryable TransportError. 0 disables retries. */
  retries: number;
  retryBaseDelayMs: number;
}

export type FetchImpl = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface GraphqlClientDeps {
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<void>;
}

function preview(value: string, max = 200): string {
  const trimmed = value.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}

/** Connection failures, timeouts, 429 and 5xx are worth another try; other 4xx are not. */
function isRetryable(err: TransportError): boolean {
  return err.status === undefined || err.status === 429 || err.status >= 500;
}

export class GraphqlClient implements PageSource, DetailSource {
  private readonly fetchImpl: FetchImpl;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: PlatformConfig,
    deps: GraphqlClientDeps = {},
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
  }

  async fetchFirstPage(): Promise<FirstPage> {
    const payload = await this.post([
      listPeopleOperation(this.config.viewId, this.config.listQueryHash),
    ]);
    try {
      const page = expectListPage(decodeUpstreamResponse(payload));
      return {
        records: page.records,
        cursor: page.endCursor,
        hasMore: page.hasNextPage,
        expectedTotal: page.totalCount,
      };
    } catch (err) {
      if (!(err instanceof MalformedResponseError)) throw err;
      console.warn(`⚠️  Malformed first page (${err.message}); treating as empty`);
      return { records: [], cursor: null, hasMore: false, expectedTotal: null };
    }
  }

  async fetchNextPage(cursor: string): Promise<NextPage> {
    const payload = await this.post([
      listPeopleOperation(this.config.viewId, this.config.listQueryHash, cursor),
    ]);
    try {
      const page = expectListPage(decodeUpstreamResponse(payload));
      return { records: page.records, cursor: page.endCursor, hasMore: page.hasNextPage };
    } catch (err) {
      if (!(err instanceof MalformedResponseError)) throw err;
      // Keep the same cursor so the collector's empty-page counter decides when to give up
      console.warn(`⚠️  Malformed page (${err.message}); treating as empty`);
      return { records: [], cursor, hasMore: true };
    }
  }

  async fetchAttendeeDetail(id: string): Promise<AttendeeDetail | null> {
    const payload = await this.post([
      personDetailOperation(id, this.config.eventId, this.config.detailQueryHash),
    ]);
    try {
      return expectDetail(decodeUpstreamResponse(payload)).detail;
    } catch (err) {
      if (!(err instanceof MalformedResponseError)) throw err;
      console.warn(`⚠️  No detail for ${id}: ${err.message}`);
      return null;
    }
  }

  /** POST a batch, retrying retryable transport failures with exponential backoff. */
  private async post(operations: PersistedOperation[]): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.postOnce(operations);
      } catch (err) {
        if (!(err instanceof TransportError) || !isRetryable(err) || attempt >= this.config.retries) {
          throw err;
        }
        const wait = this.config.retryBaseDelayMs * 2 ** attempt;
        console.warn(
          `⚠️  ${err.message}; retrying in ${wait}ms (${attempt + 1}/${this.config.retries})`,
        );
        await this.sleep(wait);
      }
    }
  }

  private async postOnce(operations: PersistedOperation[]): Promise<unknown> {
    const url = this.config.endpoint;
    let res: Response;
    let body: string;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          "User-Agent": USER_AGENT,
          ...this.config.staticHeaders,
        },
        body: JSON.stringify(operations),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
      body = await res.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Request to ${url.host} failed: ${reason}`, undefined, { cause: err });
    }

    if (!res.ok) {
      throw new TransportError(`${url.host} answered ${res.status}: ${preview(body)}`, res.status);
    }

    try {
      return JSON.parse(body);
    } catch {
      // Not JSON at all: decodes to an ErrorResponse like any other malformed payload
      return null;
    }
  }
}
