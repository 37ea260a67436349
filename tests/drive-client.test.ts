/**
 * Unit tests for the Drive REST client, against a stubbed fetch.
 */
import { Readable } from "node:stream";
import { describe, test, expect, vi } from "vitest";
import { ConfigurationError, TransportError } from "../src/core/exceptions.js";
import { DriveClient, FOLDER_MIME_TYPE } from "../src/drive/client.js";
import { DriveCredentialFactory } from "../src/drive/credentials.js";

function makeClient() {
  const fetchMock = vi.fn<typeof fetch>();
  const client = new DriveClient({ accessToken: "test-token", fetch: fetchMock });
  return { client, fetchMock };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("DriveClient.createFolder", () => {
  test("posts folder metadata with the bearer token", async () => {
    const { client, fetchMock } = makeClient();
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "new-folder" }));

    const id = await client.createFolder("Trip", "parent-1");

    expect(id).toBe("new-folder");
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://www.googleapis.com/drive/v3/files?fields=id");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-token");
    expect(JSON.parse(String(init?.body))).toEqual({
      name: "Trip",
      mimeType: FOLDER_MIME_TYPE,
      parents: ["parent-1"],
    });
  });

  test("omits parents at the root", async () => {
    const { client, fetchMock } = makeClient();
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "top" }));

    await client.createFolder("MigratedContent");

    const init = fetchMock.mock.calls[0][1];
    expect(JSON.parse(String(init?.body))).toEqual({
      name: "MigratedContent",
      mimeType: FOLDER_MIME_TYPE,
    });
  });

  test("uses a configured API base URL", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ id: "x" }));
    const client = new DriveClient({
      accessToken: "test-token",
      apiBaseUrl: "http://drive.test/v3/",
      fetch: fetchMock,
    });

    await client.createFolder("A");

    expect(fetchMock.mock.calls[0][0]).toBe("http://drive.test/v3/files?fields=id");
  });
});

describe("DriveClient.createFile", () => {
  test("opens a resumable session then streams the body", async () => {
    const { client, fetchMock } = makeClient();
    fetchMock
      .mockResolvedValueOnce(
        new Response(null, { status: 200, headers: { Location: "https://upload.test/s/1" } }),
      )
      .mockResolvedValueOnce(jsonResponse({ id: "new-file" }));
    const content = Readable.from(["hello"]);

    const id = await client.createFile({ name: "a.txt", parents: ["p1"] }, content);

    expect(id).toBe("new-file");
    const [sessionUrl, sessionInit] = fetchMock.mock.calls[0];
    expect(sessionUrl).toBe(
      "https://www.googleapis.com/upload/drive/v3/files?uploadType=resumable&fields=id",
    );
    expect(JSON.parse(String(sessionInit?.body))).toEqual({ name: "a.txt", parents: ["p1"] });

    const [uploadUrl, uploadInit] = fetchMock.mock.calls[1];
    expect(uploadUrl).toBe("https://upload.test/s/1");
    expect(uploadInit?.method).toBe("PUT");
    expect(uploadInit?.body).toBe(content);
    expect(uploadInit?.duplex).toBe("half");
  });

  test("a session without Location is a transport error", async () => {
    const { client, fetchMock } = makeClient();
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }));

    await expect(client.createFile({ name: "a.txt" })).rejects.toThrow(TransportError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("DriveClient errors", () => {
  test("client errors are not retryable", async () => {
    const { client, fetchMock } = makeClient();
    fetchMock.mockResolvedValueOnce(
      new Response("insufficient permissions", { status: 403, statusText: "Forbidden" }),
    );

    const err = await client.createFolder("A").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      status: 403,
      retryable: false,
      kind: "transport",
      message:
        "Transport failed (403): POST https://www.googleapis.com/drive/v3/files?fields=id Forbidden: insufficient permissions",
    });
  });

  test.each([429, 500, 503])("status %i is retryable", async (status) => {
    const { client, fetchMock } = makeClient();
    fetchMock.mockResolvedValueOnce(new Response("busy", { status }));

    await expect(client.createFolder("A")).rejects.toMatchObject({ status, retryable: true });
  });

  test("network failures are retryable transport errors", async () => {
    const { client, fetchMock } = makeClient();
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(client.createFolder("A")).rejects.toMatchObject({
      name: "TransportError",
      status: null,
      retryable: true,
      message: "Transport failed: fetch failed",
    });
  });

  test("a response without an id is rejected", async () => {
    const { client, fetchMock } = makeClient();
    fetchMock.mockResolvedValueOnce(jsonResponse({ kind: "drive#file" }));

    await expect(client.createFolder("A")).rejects.toThrow(TransportError);
  });

  test("a success response that is not JSON is a transport error", async () => {
    const { client, fetchMock } = makeClient();
    fetchMock.mockResolvedValueOnce(new Response("not json", { status: 200 }));

    const err = await client.createFolder("A").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      status: 200,
      retryable: false,
      message: "Transport failed (200): response is not JSON",
    });
  });
});

describe("DriveCredentialFactory", () => {
  test("builds a Drive client from an access token", () => {
    const client = new DriveCredentialFactory().createClient({ accessToken: "test-token" });
    expect(client).toBeInstanceOf(DriveClient);
  });

  test("requires an access token", () => {
    expect(() => new DriveCredentialFactory().createClient({ accessToken: "" })).toThrow(
      ConfigurationError,
    );
  });
});
