import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { EXIT_FAILURE, EXIT_OK, createProgram, describeFailure, handleSignals, main } from "./cli.js";
import { ConfigError, NetworkError } from "./errors.js";
import type { FetchFn, Logger } from "./types/index.js";
import { WorkflowStageError } from "./workflow.js";

const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

describe("describeFailure", () => {
  it("uses the stage message for workflow failures", () => {
    const error = new WorkflowStageError("Step 6: Publish post", 2500, new Error("boom"));

    expect(describeFailure(error)).toBe("Step 6: Publish post failed after 2.50s: boom");
  });

  it("names application errors", () => {
    expect(describeFailure(new NetworkError("timeout"))).toBe("NetworkError: timeout");
  });

  it("falls back for anything else", () => {
    expect(describeFailure("bad")).toBe("Fatal error: bad");
  });
});

describe("createProgram", () => {
  let output: string[];

  beforeEach(() => {
    output = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      output.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("prints the authorization URL", async () => {
    vi.stubEnv("LINKEDIN_CLIENT_ID", "test-client");
    vi.stubEnv("LINKEDIN_CLIENT_SECRET", "test-secret");
    vi.stubEnv("LINKEDIN_REDIRECT_URI", "http://localhost:8000/callback");

    await createProgram(logger).parseAsync(["node", "commit-digest", "auth-url"]);

    expect(output).toHaveLength(1);
    const url = new URL(output[0].trim());
    expect(url.searchParams.get("client_id")).toBe("test-client");
  });

  it("fails the run before any request when credentials are missing", async () => {
    for (const key of ["GITHUB_TOKEN", "GITHUB_USERNAME", "LLM_API_KEY", "LINKEDIN_ACCESS_TOKEN"]) {
      vi.stubEnv(key, "");
    }

    await expect(createProgram(logger).parseAsync(["node", "commit-digest", "run"])).rejects.toBeInstanceOf(
      ConfigError
    );
  });
});

describe("main", () => {
  const argv = ["node", "commit-digest", "run", "--no-image"];

  beforeEach(() => {
    vi.stubEnv("GITHUB_TOKEN", "test-github-token");
    vi.stubEnv("GITHUB_USERNAME", "octo");
    vi.stubEnv("LLM_API_KEY", "test-llm-key");
    vi.stubEnv("LINKEDIN_ACCESS_TOKEN", "test-linkedin-token");
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  function stubGitHub(status: number, body: unknown) {
    const fetch = vi.fn<FetchFn>(
      async () => new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } })
    );
    vi.stubGlobal("fetch", fetch);
    return fetch;
  }

  it("exits 0 when there is nothing to post", async () => {
    const fetch = stubGitHub(200, []);

    await expect(main(argv)).resolves.toBe(EXIT_OK);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(new URL(fetch.mock.calls[0][0]).pathname).toBe("/users/octo/repos");
  });

  it("exits non-zero when a stage fails", async () => {
    stubGitHub(401, { message: "Bad credentials" });

    await expect(main(argv)).resolves.toBe(EXIT_FAILURE);
  });

  it("exits non-zero on missing configuration", async () => {
    vi.stubEnv("GITHUB_TOKEN", "");
    const fetch = stubGitHub(200, []);

    await expect(main(argv)).resolves.toBe(EXIT_FAILURE);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("leaves no signal handlers behind", async () => {
    stubGitHub(200, []);
    const before = process.listenerCount("SIGINT");

    await main(argv);

    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});

describe("handleSignals", () => {
  function addedListener(signal: "SIGINT" | "SIGTERM", before: readonly Function[]) {
    const added = process.listeners(signal).filter((listener) => !before.includes(listener));
    expect(added).toHaveLength(1);
    return added[0];
  }

  it.each([
    ["SIGINT", 130],
    ["SIGTERM", 143],
  ] as const)("exits with the conventional code on %s", (signal, code) => {
    const exit = vi.fn<(code: number) => void>();
    const before = process.listeners(signal);
    const remove = handleSignals(logger, exit);

    addedListener(signal, before)(signal);

    expect(exit).toHaveBeenCalledWith(code);
    expect(logger.warn).toHaveBeenCalledWith(`Workflow interrupted (${signal})`);
    remove();
    expect(process.listeners(signal)).toEqual(before);
  });
});
