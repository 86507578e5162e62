import type { LinkedInConfig } from "../config.js";
import { AuthError, NetworkError, errorMessage, httpError } from "../errors.js";
import type { FetchFn, ImagePayload, Logger, StageOutcome } from "../types/index.js";
import { describeImagePayload, materializeImage } from "./image-payload.js";
import { decodeIdTokenSubject } from "./linkedin-oauth.js";

export const PERSON_URN_PREFIX = "urn:li:person:";
const FEEDSHARE_IMAGE_RECIPE = "urn:li:digitalmediaRecipe:feedshare-image";
const UPLOAD_MECHANISM = "com.linkedin.digitalmedia.uploading.MediaUploadHttpRequest";
const SHARE_CONTENT = "com.linkedin.ugc.ShareContent";

/**
 * Prefixes a raw member id; values that already carry the prefix pass through.
 */
export function toPersonUrn(rawId: string): string {
  const id = rawId.trim();
  return id.startsWith(PERSON_URN_PREFIX) ? id : `${PERSON_URN_PREFIX}${id}`;
}

export interface UgcPostPayload {
  author: string;
  lifecycleState: "PUBLISHED";
  specificContent: {
    [SHARE_CONTENT]: {
      shareCommentary: { text: string };
      shareMediaCategory: "IMAGE" | "NONE";
      media?: Array<{ status: "READY"; media: string }>;
    };
  };
  visibility: { "com.linkedin.ugc.MemberNetworkVisibility": "PUBLIC" };
}

type ShareContent = UgcPostPayload["specificContent"][typeof SHARE_CONTENT];

export function buildUgcPost(author: string, text: string, assetUrn?: string): UgcPostPayload {
  const content: ShareContent = {
    shareCommentary: { text },
    shareMediaCategory: assetUrn ? "IMAGE" : "NONE",
  };
  if (assetUrn) {
    content.media = [{ status: "READY", media: assetUrn }];
  }

  return {
    author,
    lifecycleState: "PUBLISHED",
    specificContent: { [SHARE_CONTENT]: content },
    visibility: { "com.linkedin.ugc.MemberNetworkVisibility": "PUBLIC" },
  };
}

export interface RegisteredUpload {
  uploadUrl: string;
  assetUrn: string;
}

export interface PublishResult {
  postId: string;
  imageIncluded: boolean;
  /** Why an offered image was left out of the post */
  imageDegradation?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readPath(value: unknown, keys: readonly string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Client for the LinkedIn v2 UGC API: author lookup, image upload and posting.
 */
export class LinkedInPublisher {
  private readonly fetchFn: FetchFn;
  private authorUrn?: string;

  constructor(
    private readonly config: LinkedInConfig,
    private readonly logger: Logger,
    fetchFn?: FetchFn
  ) {
    this.fetchFn = fetchFn ?? globalThis.fetch.bind(globalThis);
  }

  private headers(json: boolean = true): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.accessToken}`,
      "X-Restli-Protocol-Version": "2.0.0",
      ...(json ? { "Content-Type": "application/json" } : {}),
    };
  }

  private async send(what: string, url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchFn(url, init);
    } catch (error) {
      throw new NetworkError(`Network error while ${what}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Returns the author URN from configuration, the profile endpoint or the id token.
   */
  async resolveAuthorUrn(): Promise<string> {
    if (this.authorUrn) {
      return this.authorUrn;
    }

    if (this.config.personUrn) {
      this.authorUrn = toPersonUrn(this.config.personUrn);
      return this.authorUrn;
    }

    const response = await this.send("fetching the LinkedIn profile", `${this.config.apiBaseUrl}/me`, {
      method: "GET",
      headers: this.headers(false),
    });

    if (response.ok) {
      const id = readPath(await response.json().catch(() => null), ["id"]);
      if (typeof id !== "string" || !id) {
        throw new NetworkError("LinkedIn profile response has no id");
      }
      this.authorUrn = toPersonUrn(id);
      return this.authorUrn;
    }

    const body = await response.text().catch(() => "");
    const subject = this.config.idToken ? decodeIdTokenSubject(this.config.idToken) : null;
    if (subject) {
      this.logger.info("Profile lookup failed, using the id token subject");
      this.authorUrn = toPersonUrn(subject);
      return this.authorUrn;
    }

    if (response.status === 403) {
      throw new AuthError(
        "GET /v2/me returned 403: the token lacks profile access. Set LINKEDIN_PERSON_URN " +
          "(urn:li:person:<id>) or LINKEDIN_ID_TOKEN from an OpenID sign-in.",
        { status: 403 }
      );
    }
    throw httpError("LinkedIn profile lookup", response.status, body);
  }

  async registerUpload(owner: string): Promise<RegisteredUpload> {
    const response = await this.send("registering the image upload", `${this.config.apiBaseUrl}/assets?action=registerUpload`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({
        registerUploadRequest: {
          recipes: [FEEDSHARE_IMAGE_RECIPE],
          owner,
          serviceRelationships: [{ relationshipType: "OWNER", identifier: "urn:li:userGeneratedContent" }],
        },
      }),
    });
    if (!response.ok) {
      throw httpError("LinkedIn upload registration", response.status, await response.text().catch(() => ""));
    }

    const body: unknown = await response.json().catch(() => null);
    const uploadUrl = readPath(body, ["value", "uploadMechanism", UPLOAD_MECHANISM, "uploadUrl"]);
    const assetUrn = readPath(body, ["value", "asset"]);
    if (typeof uploadUrl !== "string" || typeof assetUrn !== "string") {
      throw new NetworkError("LinkedIn upload registration response has no upload URL or asset");
    }
    return { uploadUrl, assetUrn };
  }

  async uploadBytes(uploadUrl: string, bytes: Buffer): Promise<void> {
    const response = await this.send("uploading the image", uploadUrl, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.config.accessToken}` },
      body: bytes,
    });
    if (!response.ok) {
      throw httpError("LinkedIn image upload", response.status, await response.text().catch(() => ""));
    }
  }

  /**
   * Registers, materializes and uploads an image. Any failure is returned as
   * degraded so the post can still go out as text.
   */
  async uploadImage(image: ImagePayload): Promise<StageOutcome<string>> {
    try {
      const owner = await this.resolveAuthorUrn();
      this.logger.info(`Registering image upload for ${owner}...`);
      const { uploadUrl, assetUrn } = await this.registerUpload(owner);

      this.logger.info(`Preparing ${describeImagePayload(image)}...`);
      const bytes = await materializeImage(image, this.fetchFn);

      this.logger.info(`Uploading image (${bytes.length} bytes)...`);
      await this.uploadBytes(uploadUrl, bytes);
      this.logger.info(`Image uploaded, asset: ${assetUrn}`);
      return { status: "produced", value: assetUrn };
    } catch (error) {
      const reason = `image upload failed: ${errorMessage(error)}`;
      this.logger.warn(`${reason}. Continuing with a text-only post`);
      return { status: "degraded", reason };
    }
  }

  async publishPost(text: string, assetUrn?: string): Promise<PublishResult> {
    const author = await this.resolveAuthorUrn();
    this.logger.info(assetUrn ? `Posting with image ${assetUrn}` : "Posting text-only (no image)");

    const response = await this.send("creating the post", `${this.config.apiBaseUrl}/ugcPosts`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(buildUgcPost(author, text, assetUrn)),
    });
    this.logger.info(`LinkedIn API response status: ${response.status}`);

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      this.logger.error(`LinkedIn API error ${response.status}: ${body}`);
      throw httpError("LinkedIn post creation", response.status, body);
    }

    const postId = response.headers.get("x-restli-id") ?? readPath(await response.json().catch(() => ({})), ["id"]);
    return { postId: typeof postId === "string" ? postId : "", imageIncluded: Boolean(assetUrn) };
  }

  /**
   * Full publish attempt: author, optional image upload, then the post itself.
   * Only the upload may degrade; author and post failures are thrown.
   */
  async publish(text: string, image?: ImagePayload): Promise<PublishResult> {
    await this.resolveAuthorUrn();
    const upload = image ? await this.uploadImage(image) : undefined;
    const result = await this.publishPost(text, upload?.status === "produced" ? upload.value : undefined);
    return upload?.status === "degraded" ? { ...result, imageDegradation: upload.reason } : result;
  }
}
