import { describe, it, expect, vi } from "vitest";
import { FakeSnippetServer } from "@snipstash/testkit";
import { ApiClient, buildUrl, redactHeaders } from "./api-client.js";
import {
  AuthRequiredError,
  InvalidResponseError,
  NetworkError,
  NotFoundError,
  RateLimitedError,
  RequestFailedError,
  ServerError,
  UnauthorizedError,
} from "./errors.js";
import { LoginResponseSchema, PageSchema } from "./schemas.js";
import { SDK_VERSION } from "./version.js";
import type { FetchLike } from "./types.js";

const auth = async () => ({ serverUrl: "https://snippets.test/", token: "test-key" });

function respondWith(status: number, body: string | null = null, headers: Record<string, string> = {}): ApiClient {
  const fetch: FetchLike = async () => new Response(body, { status, headers });
  return new ApiClient({ credentials: auth, fetch });
}

const listRequest = { method: "GET", path: "/snippets", query: { page: 1, page_size: 5 } } as const;

describe("ApiClient", () => {
  describe("request building", () => {
    it("should send the bearer token and JSON accept header", async () => {
      const server = new FakeSnippetServer({ tokens: ["test-key"] });
      server.seed({ title: "first" });
      const client = new ApiClient({ credentials: auth, fetch: server.fetch });

      const page = await client.request(listRequest, PageSchema);

      expect(page.total).toBe(1);
      expect(page.items[0]?.title).toBe("first");
      const [req] = server.requests;
      expect(req?.url.toString()).toBe("https://snippets.test/snippets?page=1&page_size=5");
      expect(req?.headers.get("authorization")).toBe("Bearer test-key");
      expect(req?.headers.get("accept")).toBe("application/json");
      expect(req?.headers.get("user-agent")).toBe(`snipstash/${SDK_VERSION}`);
    });

    it("should encode JSON bodies with a content type", async () => {
      const fetch = vi.fn<FetchLike>(async () => new Response('{"token":"abc"}', { status: 200 }));
      const client = new ApiClient({ credentials: auth, fetch });

      const result = await client.request(
        { method: "POST", path: "/auth/login", body: { json: { username: "u" } } },
        LoginResponseSchema
      );

      expect(result).toEqual({ token: "abc" });

      const init = fetch.mock.calls[0]?.[1];
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe('{"username":"u"}');
      expect(init?.headers).toMatchObject({ "Content-Type": "application/json" });
    });

    it("should omit the Authorization header without a token", async () => {
      const fetch = vi.fn<FetchLike>(async () => new Response(null, { status: 204 }));
      const client = new ApiClient({ credentials: auth, fetch }).withoutCredentials("https://other.test");

      await client.requestNoContent({ method: "DELETE", path: "/snippets/1" });

      const [url, init] = fetch.mock.calls[0] ?? [];
      expect(url).toBe("https://other.test/snippets/1");
      expect(init?.headers).not.toHaveProperty("Authorization");
    });

    it("should use fixed credentials from withCredentials", async () => {
      const fetch = vi.fn<FetchLike>(async () => new Response(null, { status: 204 }));
      const client = new ApiClient({ credentials: auth, fetch }).withCredentials({
        serverUrl: "https://x.tld",
        token: "other-key",
      });

      await client.requestNoContent({ method: "DELETE", path: "/snippets/2" });

      const [url, init] = fetch.mock.calls[0] ?? [];
      expect(url).toBe("https://x.tld/snippets/2");
      expect(init?.headers).toMatchObject({ Authorization: "Bearer other-key" });
    });

    it("should not call fetch when credentials are missing", async () => {
      const fetch = vi.fn<FetchLike>();
      const client = new ApiClient({
        credentials: async () => {
          throw new AuthRequiredError();
        },
        fetch,
      });

      await expect(client.request(listRequest, PageSchema)).rejects.toBeInstanceOf(AuthRequiredError);
      expect(fetch).not.toHaveBeenCalled();
    });
  });

  describe("error classification", () => {
    it("should map 401 to UnauthorizedError with the server message", async () => {
      const error = await respondWith(401, '{"error":"Invalid API key"}')
        .request(listRequest, PageSchema)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UnauthorizedError);
      expect(error).toMatchObject({ kind: "unauthorized", message: "Invalid API key" });
    });

    it("should map 404 to NotFoundError", async () => {
      await expect(respondWith(404).request(listRequest, PageSchema)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should carry the Retry-After value verbatim on 429", async () => {
      const error = await respondWith(429, "", { "Retry-After": "120" })
        .request(listRequest, PageSchema)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ retryAfter: "120", remedy: "Retry after: 120" });
    });

    it("should leave retryAfter undefined when the header is absent", async () => {
      const error = await respondWith(429).request(listRequest, PageSchema).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ retryAfter: undefined });
    });

    it("should map 5xx to ServerError with status and body", async () => {
      const error = await respondWith(503, "maintenance").request(listRequest, PageSchema).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ status: 503, body: "maintenance", message: "Server error (HTTP 503)" });
    });

    it("should map other statuses to RequestFailedError", async () => {
      const error = await respondWith(400, '{"message":"title is required"}')
        .request(listRequest, PageSchema)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toMatchObject({ status: 400, message: "title is required" });
    });

    it("should map transport failures to NetworkError", async () => {
      const client = new ApiClient({
        credentials: auth,
        fetch: async () => {
          throw new TypeError("fetch failed");
        },
      });

      const error = await client.request(listRequest, PageSchema).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ timedOut: false, method: "GET" });
    });

    it("should abort and report a timeout", async () => {
      const server = new FakeSnippetServer({ tokens: ["test-key"] });
      server.failWhen({ match: () => true, hang: true });
      const client = new ApiClient({ credentials: auth, fetch: server.fetch, timeoutMs: 20 });

      const error = await client.request(listRequest, PageSchema).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ timedOut: true });
    });

    it("should reject a body that is not JSON", async () => {
      await expect(respondWith(200, "<html>").request(listRequest, PageSchema)).rejects.toBeInstanceOf(
        InvalidResponseError
      );
    });

    it("should reject a body that does not match the schema", async () => {
      const error = await respondWith(200, '{"items":"nope"}')
        .request(listRequest, PageSchema)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvalidResponseError);
      expect(error).toMatchObject({ kind: "invalid_response" });
    });

    it("should reject an empty success body when one is expected", async () => {
      await expect(respondWith(204).request(listRequest, PageSchema)).rejects.toBeInstanceOf(
        InvalidResponseError
      );
    });
  });
});

describe("buildUrl", () => {
  it("should join server URL, path and query", () => {
    expect(buildUrl("https://x.tld/api/", "/snippets/search", { q: "a b", sort: "newest", search_code: false })).toBe(
      "https://x.tld/api/snippets/search?q=a+b&sort=newest&search_code=false"
    );
  });

  it("should skip undefined query values", () => {
    expect(buildUrl("https://x.tld", "/snippets", { page: undefined })).toBe("https://x.tld/snippets");
  });
});

describe("redactHeaders", () => {
  it("should hide the bearer token", () => {
    expect(redactHeaders({ Authorization: "Bearer test-key", Accept: "application/json" })).toEqual({
      Authorization: "Bearer **",
      Accept: "application/json",
    });
  });

  it("should hide every character of other secret headers", () => {
    expect(redactHeaders({ "X-Api-Key": "test-secret", Authorization: "test-secret" })).toEqual({
      "X-Api-Key": "**",
      Authorization: "**",
    });
  });
});
