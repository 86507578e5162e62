import { describe, expect, it, vi, type Mock } from "vitest";

import type { LinkedInConfig } from "../config.js";
import { AuthError, NetworkError } from "../errors.js";
import type { FetchFn, Logger } from "../types/index.js";
import { LinkedInPublisher, buildUgcPost, toPersonUrn } from "./linkedin.js";

const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

const API = "https://linkedin.example.test/v2";
const UPLOAD_URL = "https://upload.example.test/asset/1";
const ASSET = "urn:li:digitalmediaAsset:C4D00";

function config(overrides: Partial<LinkedInConfig> = {}): LinkedInConfig {
  return { accessToken: "test-access-token", apiBaseUrl: API, ...overrides };
}

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

function idToken(claims: Record<string, unknown>): string {
  const encode = (value: unknown) => Buffer.from(JSON.stringify(value)).toString("base64url");
  return `${encode({ alg: "none" })}.${encode(claims)}.signature`;
}

const registerBody = {
  value: {
    asset: ASSET,
    uploadMechanism: {
      "com.linkedin.digitalmedia.uploading.MediaUploadHttpRequest": { uploadUrl: UPLOAD_URL },
    },
  },
};

type Handler = (url: string, init?: RequestInit) => Response | Promise<Response>;

function publisherWith(handler: Handler, overrides: Partial<LinkedInConfig> = {}) {
  const fetch = vi.fn<FetchFn>(async (url, init) => handler(url, init));
  return { publisher: new LinkedInPublisher(config(overrides), logger, fetch), fetch };
}

function ugcBody(fetch: Mock<FetchFn>) {
  const call = fetch.mock.calls.find(([url]) => url === `${API}/ugcPosts`);
  return JSON.parse(String(call?.[1]?.body));
}

describe("toPersonUrn", () => {
  it("adds the prefix to raw ids and keeps existing URNs", () => {
    expect(toPersonUrn("abc123")).toBe("urn:li:person:abc123");
    expect(toPersonUrn(" urn:li:person:abc123 ")).toBe("urn:li:person:abc123");
  });
});

describe("resolveAuthorUrn", () => {
  it("uses the configured URN without a request", async () => {
    const { publisher, fetch } = publisherWith(() => jsonResponse(500, {}), { personUrn: "abc123" });

    await expect(publisher.resolveAuthorUrn()).resolves.toBe("urn:li:person:abc123");
    expect(fetch).not.toHaveBeenCalled();
  });

  it("looks up the profile once and caches the result", async () => {
    const { publisher, fetch } = publisherWith(() => jsonResponse(200, { id: "abc123" }));

    await expect(publisher.resolveAuthorUrn()).resolves.toBe("urn:li:person:abc123");
    await expect(publisher.resolveAuthorUrn()).resolves.toBe("urn:li:person:abc123");
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(`${API}/me`);
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-access-token",
      "X-Restli-Protocol-Version": "2.0.0",
    });
  });

  it("falls back to the id token subject when the profile is forbidden", async () => {
    const { publisher } = publisherWith(() => jsonResponse(403, { message: "Not enough permissions" }), {
      idToken: idToken({ sub: "abc123", name: "Octo" }),
    });

    await expect(publisher.resolveAuthorUrn()).resolves.toBe("urn:li:person:abc123");
  });

  it("raises AuthError on 403 without another source", async () => {
    const { publisher } = publisherWith(() => jsonResponse(403, { message: "Not enough permissions" }));

    await expect(publisher.resolveAuthorUrn()).rejects.toBeInstanceOf(AuthError);
  });

  it("raises NetworkError on other statuses", async () => {
    const { publisher } = publisherWith(() => jsonResponse(502, { message: "Bad gateway" }));

    await expect(publisher.resolveAuthorUrn()).rejects.toBeInstanceOf(NetworkError);
  });
});

describe("buildUgcPost", () => {
  it("builds a public text-only post", () => {
    expect(buildUgcPost("urn:li:person:abc123", "Hello")).toEqual({
      author: "urn:li:person:abc123",
      lifecycleState: "PUBLISHED",
      specificContent: {
        "com.linkedin.ugc.ShareContent": {
          shareCommentary: { text: "Hello" },
          shareMediaCategory: "NONE",
        },
      },
      visibility: { "com.linkedin.ugc.MemberNetworkVisibility": "PUBLIC" },
    });
  });

  it("attaches the media asset", () => {
    const content = buildUgcPost("urn:li:person:abc123", "Hello", ASSET).specificContent["com.linkedin.ugc.ShareContent"];

    expect(content.shareMediaCategory).toBe("IMAGE");
    expect(content.media).toEqual([{ status: "READY", media: ASSET }]);
  });
});

describe("LinkedInPublisher.publish", () => {
  it("registers, uploads and posts with the image", async () => {
    const { publisher, fetch } = publisherWith((url) => {
      if (url === `${API}/assets?action=registerUpload`) return jsonResponse(200, registerBody);
      if (url === UPLOAD_URL) return new Response(null, { status: 201 });
      if (url === `${API}/ugcPosts`) return jsonResponse(201, { id: "urn:li:share:1" }, { "x-restli-id": "urn:li:share:1" });
      return jsonResponse(404, {});
    }, { personUrn: "abc123" });

    const result = await publisher.publish("Hello", { kind: "base64", base64: "aGVsbG8=" });

    expect(result).toEqual({ postId: "urn:li:share:1", imageIncluded: true });
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      `${API}/assets?action=registerUpload`,
      UPLOAD_URL,
      `${API}/ugcPosts`,
    ]);

    const register = JSON.parse(String(fetch.mock.calls[0][1]?.body));
    expect(register.registerUploadRequest.owner).toBe("urn:li:person:abc123");
    expect(register.registerUploadRequest.recipes).toEqual(["urn:li:digitalmediaRecipe:feedshare-image"]);

    const uploaded = fetch.mock.calls[1][1]?.body;
    expect(Buffer.isBuffer(uploaded) && uploaded.toString("utf-8")).toBe("hello");

    const content = ugcBody(fetch).specificContent["com.linkedin.ugc.ShareContent"];
    expect(content.shareMediaCategory).toBe("IMAGE");
    expect(content.media).toEqual([{ status: "READY", media: ASSET }]);
  });

  it("downloads URL payloads before uploading", async () => {
    const { publisher, fetch } = publisherWith((url) => {
      if (url === `${API}/assets?action=registerUpload`) return jsonResponse(200, registerBody);
      if (url === "https://cdn.example.test/image.png") return new Response(Buffer.from("png-bytes"), { status: 200 });
      if (url === UPLOAD_URL) return new Response(null, { status: 201 });
      return jsonResponse(201, { id: "urn:li:share:2" });
    }, { personUrn: "abc123" });

    const result = await publisher.publish("Hello", { kind: "url", url: "https://cdn.example.test/image.png" });

    expect(result.imageIncluded).toBe(true);
    const upload = fetch.mock.calls.find(([url]) => url === UPLOAD_URL);
    const body = upload?.[1]?.body;
    expect(Buffer.isBuffer(body) && body.toString("utf-8")).toBe("png-bytes");
  });

  it("posts text-only when registration fails", async () => {
    const { publisher, fetch } = publisherWith((url) => {
      if (url === `${API}/assets?action=registerUpload`) return jsonResponse(403, { message: "no" });
      return jsonResponse(201, { id: "urn:li:share:3" });
    }, { personUrn: "abc123" });

    const result = await publisher.publish("Hello", { kind: "base64", base64: "aGVsbG8=" });

    expect(result).toEqual({
      postId: "urn:li:share:3",
      imageIncluded: false,
      imageDegradation: 'image upload failed: LinkedIn upload registration responded with 403: {"message":"no"}',
    });
    const content = ugcBody(fetch).specificContent["com.linkedin.ugc.ShareContent"];
    expect(content.shareMediaCategory).toBe("NONE");
    expect(content.media).toBeUndefined();
  });

  it("posts text-only when the byte upload fails", async () => {
    const { publisher, fetch } = publisherWith((url) => {
      if (url === `${API}/assets?action=registerUpload`) return jsonResponse(200, registerBody);
      if (url === UPLOAD_URL) throw new TypeError("socket hang up");
      return jsonResponse(201, { id: "urn:li:share:4" });
    }, { personUrn: "abc123" });

    const result = await publisher.publish("Hello", { kind: "base64", base64: "aGVsbG8=" });

    expect(result.imageIncluded).toBe(false);
    expect(ugcBody(fetch).specificContent["com.linkedin.ugc.ShareContent"].shareMediaCategory).toBe("NONE");
  });

  it("reports an empty payload as degraded upload", async () => {
    const { publisher } = publisherWith((url) => {
      if (url === `${API}/assets?action=registerUpload`) return jsonResponse(200, registerBody);
      return jsonResponse(201, {});
    }, { personUrn: "abc123" });

    const outcome = await publisher.uploadImage({ kind: "dataUri", mimeType: "image/png", base64: "" });

    expect(outcome.status).toBe("degraded");
  });

  it("fails the publish on a non-2xx post response and logs the body", async () => {
    const { publisher } = publisherWith(() => jsonResponse(422, { message: "duplicate post" }), {
      personUrn: "abc123",
    });

    await expect(publisher.publish("Hello")).rejects.toBeInstanceOf(NetworkError);
    expect(logger.error).toHaveBeenCalledWith('LinkedIn API error 422: {"message":"duplicate post"}');
  });

  it("does not attempt an upload when the identity cannot be resolved", async () => {
    const { publisher, fetch } = publisherWith(() => jsonResponse(403, {}));

    await expect(publisher.publish("Hello", { kind: "base64", base64: "aGVsbG8=" })).rejects.toBeInstanceOf(AuthError);
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});
