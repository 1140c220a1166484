import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { readFileSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CONFIG_DEFAULTS } from "../types.js";
import type { AuthEvent } from "../types.js";
import {
  datasetFetch,
  validateAndMergeConfig,
  parseSiteProfile,
  ConfigError,
  SeedUnreachableError,
  WordPressFormAdapter,
} from "../sdk/index.js";
import {
  binaryResponse,
  htmlResponse,
  redirectResponse,
  requestedUrls,
  routeFetch,
  TEST_CLIENT_CONFIG,
} from "./helpers.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const LOGIN_URL = "https://data.test/wp-login.php";

const LOGIN_PAGE = `<html><body>
  <form id="loginform" action="${LOGIN_URL}" method="post">
    <input type="text" name="log">
    <input type="password" name="pwd">
    <input type="submit" name="wp-submit" value="Log In">
  </form>
</body></html>`;

// ---------------------------------------------------------------------------
// 1. validateAndMergeConfig
// ---------------------------------------------------------------------------
describe("validateAndMergeConfig", () => {
  describe("validation", () => {
    it("should reject an empty url", () => {
      expect(() => validateAndMergeConfig({ url: "" })).toThrow(ConfigError);
      expect(() => validateAndMergeConfig({ url: "" })).toThrow('datasetFetch: "url" Invalid url');
    });

    it("should reject non-http(s) URLs", () => {
      expect(() => validateAndMergeConfig({ url: "ftp://data.test/" })).toThrow(
        'datasetFetch: "url" must be an http(s) URL',
      );
    });

    it("should require loginUrl when credentials are given", () => {
      expect(() =>
        validateAndMergeConfig({
          url: "https://data.test/",
          credentials: { username: "reader", password: "test-secret" },
        }),
      ).toThrow('datasetFetch: "loginUrl" is required when credentials are given');
    });

    it("should reject a negative maxDepth", () => {
      expect(() => validateAndMergeConfig({ url: "https://data.test/", maxDepth: -1 })).toThrow(
        'datasetFetch: "maxDepth" Number must be greater than or equal to 0',
      );
    });

    it("should reject extensions without a leading dot", () => {
      expect(() =>
        validateAndMergeConfig({ url: "https://data.test/", fileExtensions: [".csv", "zip"] }),
      ).toThrow('datasetFetch: "fileExtensions.1" extensions look like ".zip"');
    });

    it("should list every problem in one message", () => {
      expect(() =>
        validateAndMergeConfig({ url: "ftp://data.test/", maxPages: 0 }),
      ).toThrow(
        'datasetFetch: "url" must be an http(s) URL; "maxPages" Number must be greater than 0',
      );
    });

    it("should accept a custom form adapter instance", () => {
      const adapter = new WordPressFormAdapter();
      const config = validateAndMergeConfig({ url: "https://data.test/", formAdapter: adapter });
      expect(config.formAdapter).toBe(adapter);
    });
  });

  describe("merging", () => {
    it("should apply CONFIG_DEFAULTS for a minimal config", () => {
      const config = validateAndMergeConfig({ url: "https://data.test/" });
      expect(config).toEqual({ ...CONFIG_DEFAULTS, url: "https://data.test/" });
    });

    it("should trim the url", () => {
      expect(validateAndMergeConfig({ url: "  https://data.test/  " }).url).toBe("https://data.test/");
    });

    it("should let user values win over defaults", () => {
      const config = validateAndMergeConfig({
        url: "https://data.test/",
        maxDepth: 1,
        outputStructure: "flat",
        pageKeywords: ["hcpcs"],
      });
      expect(config.maxDepth).toBe(1);
      expect(config.outputStructure).toBe("flat");
      expect(config.pageKeywords).toEqual(["hcpcs"]);
      expect(config.maxPages).toBe(CONFIG_DEFAULTS.maxPages);
    });

    it("should keep defaults for keys set to undefined", () => {
      const config = validateAndMergeConfig({
        url: "https://data.test/",
        maxDepth: undefined,
        maxPages: undefined,
        pageTimeout: undefined,
        outputDir: undefined,
      });
      expect(config.maxDepth).toBe(3);
      expect(config.maxPages).toBe(500);
      expect(config.pageTimeout).toBe(30_000);
      expect(config.outputDir).toBe("./datasets");
    });

    it("should lower-case file extensions", () => {
      const config = validateAndMergeConfig({ url: "https://data.test/", fileExtensions: [".ZIP", ".Csv"] });
      expect(config.fileExtensions).toEqual([".zip", ".csv"]);
    });

    it("should pass callbacks through untouched", () => {
      const onError = vi.fn();
      expect(validateAndMergeConfig({ url: "https://data.test/", onError }).onError).toBe(onError);
    });
  });
});

// ---------------------------------------------------------------------------
// 2. parseSiteProfile
// ---------------------------------------------------------------------------
describe("parseSiteProfile", () => {
  it("should accept the bundled LOINC profile", () => {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../profiles/loinc.json", import.meta.url), "utf-8"),
    );

    const profile = parseSiteProfile(raw);

    expect(profile.formAdapter).toBe("wordpress");
    expect(profile.loginUrl).toBe("https://loinc.org/wp-login.php");
    expect(profile.seeds).toHaveLength(2);
    expect(profile.outputStructure).toBe("flat");
  });

  it("should accept the bundled HCPCS profile", () => {
    const raw: unknown = JSON.parse(
      readFileSync(new URL("../../profiles/cms-hcpcs.json", import.meta.url), "utf-8"),
    );

    expect(parseSiteProfile(raw).outputStructure).toBe("mirror");
  });

  it("should reject unknown keys", () => {
    expect(() => parseSiteProfile({ url: "https://data.test/", mode: "smart" }, "site.json")).toThrow(
      "Invalid site profile site.json: Unrecognized key(s) in object: 'mode'",
    );
  });

  it("should reject an unknown adapter", () => {
    expect(() => parseSiteProfile({ formAdapter: "drupal" })).toThrow(ConfigError);
  });

  it("should accept an empty profile", () => {
    expect(parseSiteProfile({})).toEqual({});
  });
});

// ---------------------------------------------------------------------------
// 3. datasetFetch
// ---------------------------------------------------------------------------
describe("datasetFetch", () => {
  let tempDir: string;
  const originalFetch = globalThis.fetch;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "sdk-test-"));
  });

  afterEach(async () => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  /** Config shared by the end-to-end runs. */
  function runConfig() {
    return {
      ...TEST_CLIENT_CONFIG,
      url: "https://data.test/downloads/",
      outputDir: tempDir,
      pageDelay: 0,
      downloadDelay: 0,
      maxDepth: 1,
    };
  }

  it("should log in, then crawl and download with the session", async () => {
    const mockFetch = routeFetch({
      [LOGIN_URL]: (init) =>
        init?.method === "POST"
          ? redirectResponse("https://data.test/wp-admin/", 302, {
              "set-cookie": "wordpress_logged_in=reader; Path=/",
            })
          : htmlResponse(LOGIN_PAGE),
      "https://data.test/wp-admin/": htmlResponse("<html>Dashboard</html>"),
      "https://data.test/downloads/": htmlResponse('<a href="/files/codes.zip">Codes</a>'),
      "https://data.test/files/codes.zip": binaryResponse("PK", "application/zip"),
    });
    globalThis.fetch = mockFetch;
    const events: AuthEvent[] = [];

    const result = await datasetFetch({
      ...runConfig(),
      loginUrl: LOGIN_URL,
      credentials: { username: "reader", password: "test-secret" },
      formAdapter: "wordpress",
      onAuth: (event) => events.push(event),
    });

    expect(result.authenticated).toBe(true);
    expect(result.stats.totalDownloaded).toBe(1);
    expect(result.stats.totalBytes).toBe(2);
    expect(await readFile(join(tempDir, "files", "codes.zip"), "utf-8")).toBe("PK");
    expect(events.map((e) => [e.step, e.ok])).toEqual([["login", true]]);
    expect(requestedUrls(mockFetch)).toEqual([
      LOGIN_URL,
      LOGIN_URL,
      "https://data.test/wp-admin/",
      "https://data.test/downloads/",
      "https://data.test/files/codes.zip",
    ]);
    expect(new Headers(mockFetch.mock.calls[4][1]?.headers).get("referer")).toBe("https://data.test/");
  });

  it("should carry on unauthenticated after a failed login and skip login-page bodies", async () => {
    const loginWall = "<html><body>Please log in to download</body></html>";
    globalThis.fetch = routeFetch({
      [LOGIN_URL]: () => htmlResponse(LOGIN_PAGE),
      "https://data.test/downloads/": htmlResponse('<a href="/files/codes.zip">Codes</a>'),
      "https://data.test/files/codes.zip": htmlResponse(loginWall),
    });
    const events: AuthEvent[] = [];

    const result = await datasetFetch({
      ...runConfig(),
      loginUrl: LOGIN_URL,
      credentials: { username: "reader", password: "wrong" },
      formAdapter: "wordpress",
      onAuth: (event) => events.push(event),
    });

    expect(result.authenticated).toBe(false);
    expect(events).toEqual([
      {
        step: "login",
        url: LOGIN_URL,
        ok: false,
        detail: `Login not confirmed; response URL: ${LOGIN_URL}`,
      },
    ]);
    expect(result.downloads).toEqual([
      {
        status: "skip",
        url: "https://data.test/files/codes.zip",
        path: join(tempDir, "files", "codes.zip"),
        reason: `response is HTML (${loginWall.length} bytes), likely a login or error page`,
      },
    ]);
    expect(result.stats.totalDownloaded).toBe(0);
  });

  it("should seed the session from a cookie file", async () => {
    const cookieFile = join(tempDir, "cookies.txt");
    await writeFile(
      cookieFile,
      "# Netscape HTTP Cookie File\nexample.com\tFALSE\t/\tTRUE\t0\tsessionid\ttest-session\n",
    );
    const mockFetch = routeFetch({
      "https://example.com/downloads/": htmlResponse("<html></html>"),
    });
    globalThis.fetch = mockFetch;

    const result = await datasetFetch({
      ...runConfig(),
      url: "https://example.com/downloads/",
      outputDir: join(tempDir, "out"),
      cookieFile,
    });

    expect(result.authenticated).toBe(true);
    expect(new Headers(mockFetch.mock.calls[0][1]?.headers).get("cookie")).toBe("sessionid=test-session");
  });

  it("should fail with ConfigError for an unreadable cookie file", async () => {
    const mockFetch = routeFetch({});
    globalThis.fetch = mockFetch;
    const missing = join(tempDir, "missing.txt");

    const error = await datasetFetch({ ...runConfig(), cookieFile: missing }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    const message = error instanceof ConfigError ? error.message : "";
    expect(message.startsWith(`Cannot read cookie file ${missing}: `)).toBe(true);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("should reject an invalid config before any request", async () => {
    const mockFetch = routeFetch({});
    globalThis.fetch = mockFetch;

    await expect(datasetFetch({ url: "not a url" })).rejects.toThrow(ConfigError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("should propagate SeedUnreachableError", async () => {
    globalThis.fetch = routeFetch({});

    await expect(datasetFetch(runConfig())).rejects.toThrow(SeedUnreachableError);
  });
});
