import { describe, it, expect } from "vitest";
import {
  extractResources,
  extractFromDocument,
  parseHtml,
  resolveHref,
  ParseError,
} from "../fetcher/link-extractor.js";
import {
  fileUrlPattern,
  hasFileExtension,
  pathHasKeyword,
  urlMatchesAny,
} from "../fetcher/classify.js";

const PAGE_URL = "https://data.test/docs/";

/** Wrap body markup in a minimal HTML document. */
function page(body: string, head = ""): string {
  return `<!DOCTYPE html><html><head>${head}</head><body>${body}</body></html>`;
}

// ---------------------------------------------------------------------------
// 1. resolveHref
// ---------------------------------------------------------------------------
describe("resolveHref", () => {
  it("should resolve relative hrefs against the base", () => {
    expect(resolveHref("report.pdf", PAGE_URL)).toBe("https://data.test/docs/report.pdf");
    expect(resolveHref("../index.html", PAGE_URL)).toBe("https://data.test/index.html");
  });

  it("should strip fragments and keep query strings", () => {
    expect(resolveHref("/get?file=codes.zip#top", PAGE_URL)).toBe(
      "https://data.test/get?file=codes.zip",
    );
  });

  it.each(["#section", "mailto:help@data.test", "javascript:void(0)", "tel:+1555", "data:text/plain,hi"])(
    "should drop %s",
    (href) => {
      expect(resolveHref(href, PAGE_URL)).toBeUndefined();
    },
  );

  it("should drop non-http schemes", () => {
    expect(resolveHref("ftp://data.test/codes.zip", PAGE_URL)).toBeUndefined();
  });

  it("should drop empty and missing hrefs", () => {
    expect(resolveHref("", PAGE_URL)).toBeUndefined();
    expect(resolveHref("   ", PAGE_URL)).toBeUndefined();
    expect(resolveHref(null, PAGE_URL)).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// 2. classify helpers
// ---------------------------------------------------------------------------
describe("hasFileExtension", () => {
  it("should match known extensions case-insensitively", () => {
    expect(hasFileExtension("https://data.test/files/Codes.ZIP")).toBe(true);
  });

  it("should ignore the query string", () => {
    expect(hasFileExtension("https://data.test/get/data.zip?v=2")).toBe(true);
    expect(hasFileExtension("https://data.test/get?file=data.zip")).toBe(false);
  });

  it("should not match directories or unknown extensions", () => {
    expect(hasFileExtension("https://data.test/files/")).toBe(false);
    expect(hasFileExtension("https://data.test/files/setup.exe")).toBe(false);
  });

  it("should use the given extension list", () => {
    expect(hasFileExtension("https://data.test/codes.owl", [".owl"])).toBe(true);
    expect(hasFileExtension("https://data.test/codes.zip", [".owl"])).toBe(false);
  });

  it("should return false for unparseable URLs", () => {
    expect(hasFileExtension("not a url.zip")).toBe(false);
  });
});

describe("pathHasKeyword", () => {
  it("should match keywords in the path only", () => {
    expect(pathHasKeyword("https://data.test/Downloads/list", ["download"])).toBe(true);
    expect(pathHasKeyword("https://download.data.test/about", ["download"])).toBe(false);
  });

  it("should accept everything for an empty keyword list", () => {
    expect(pathHasKeyword("https://data.test/about", [])).toBe(true);
  });
});

describe("urlMatchesAny", () => {
  it("should match substrings of the whole URL", () => {
    expect(urlMatchesAny("https://data.test/file-access/download-id/42/", ["download-id"])).toBe(true);
    expect(urlMatchesAny("https://data.test/about/", ["download-id"])).toBe(false);
  });
});

describe("fileUrlPattern", () => {
  it("should find absolute file URLs in free text", () => {
    const text = 'load("https://cdn.data.test/a/codes.csv"); other https://data.test/b.zip, done';
    expect(Array.from(text.matchAll(fileUrlPattern([".csv", ".zip"])), (m) => m[0])).toEqual([
      "https://cdn.data.test/a/codes.csv",
      "https://data.test/b.zip",
    ]);
  });

  it("should not match an extension followed by more letters", () => {
    const text = "see https://data.test/a.zipper for details";
    expect(Array.from(text.matchAll(fileUrlPattern([".zip"])))).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 3. extractResources
// ---------------------------------------------------------------------------
describe("extractResources", () => {
  it("should classify a file link and a keyword page link", () => {
    const html = page('<a href="report.pdf">Report</a> <a href="more/">More docs</a>');

    const refs = extractResources(html, PAGE_URL, { pageKeywords: ["docs"] });

    expect(refs).toEqual([
      { url: "https://data.test/docs/report.pdf", kind: "file", via: "traversal" },
      { url: "https://data.test/docs/more/", kind: "page", via: "traversal" },
    ]);
  });

  it("should classify known extensions as files regardless of keywords", () => {
    const html = page('<a href="/archive/2024/codes.zip">zip</a>');

    const refs = extractResources(html, PAGE_URL, { pageKeywords: ["nothing-matches"] });

    expect(refs).toEqual([
      { url: "https://data.test/archive/2024/codes.zip", kind: "file", via: "traversal" },
    ]);
  });

  it("should drop links matching neither an extension nor a keyword", () => {
    const html = page('<a href="/about">About</a> <a href="/downloads/">Downloads</a>');

    const refs = extractResources(html, PAGE_URL, { pageKeywords: ["download"] });

    expect(refs.map((r) => r.url)).toEqual(["https://data.test/downloads/"]);
  });

  it("should keep every http(s) link as a page when pageKeywords is empty", () => {
    const html = page('<a href="/about">About</a> <a href="https://other.test/x">x</a>');

    const refs = extractResources(html, PAGE_URL, { pageKeywords: [] });

    expect(refs.map((r) => [r.url, r.kind])).toEqual([
      ["https://data.test/about", "page"],
      ["https://other.test/x", "page"],
    ]);
  });

  it("should deduplicate links, keeping document order", () => {
    const html = page(
      '<a href="b.csv">b</a><a href="a.csv">a</a><a href="b.csv#notes">b again</a>',
    );

    const refs = extractResources(html, PAGE_URL);

    expect(refs.map((r) => r.url)).toEqual([
      "https://data.test/docs/b.csv",
      "https://data.test/docs/a.csv",
    ]);
  });

  it("should honor <base href>", () => {
    const html = page('<a href="codes.zip">zip</a>', '<base href="https://mirror.data.test/files/">');

    const refs = extractResources(html, PAGE_URL);

    expect(refs[0].url).toBe("https://mirror.data.test/files/codes.zip");
  });

  it("should include image-map areas", () => {
    const html = page('<map name="m"><area href="/maps/region.pdf"></map>');

    expect(extractResources(html, PAGE_URL).map((r) => r.url)).toEqual([
      "https://data.test/maps/region.pdf",
    ]);
  });

  it("should skip mailto, javascript and fragment links", () => {
    const html = page(
      '<a href="mailto:help@data.test">mail</a><a href="javascript:go()">js</a><a href="#top">top</a>',
    );

    expect(extractResources(html, PAGE_URL, { pageKeywords: [] })).toEqual([]);
  });

  it("should find file URLs embedded in scripts and data attributes", () => {
    const html = page(
      '<div data-src="https://cdn.data.test/tables/codes.xlsx"></div>' +
        '<script>window.dl = "https://cdn.data.test/tables/all.zip";</script>',
    );

    expect(extractResources(html, PAGE_URL)).toEqual([
      { url: "https://cdn.data.test/tables/codes.xlsx", kind: "file", via: "traversal" },
      { url: "https://cdn.data.test/tables/all.zip", kind: "file", via: "traversal" },
    ]);
  });

  it("should treat forms posting to a download endpoint as pages", () => {
    const html = page(
      '<form action="/file-access/download-id/42/" method="post"></form>' +
        '<form action="/search"></form>',
    );

    expect(extractResources(html, PAGE_URL, { pageKeywords: ["nothing"] })).toEqual([
      { url: "https://data.test/file-access/download-id/42/", kind: "page", via: "traversal" },
    ]);
  });

  it("should use custom download keywords for form actions", () => {
    const html = page('<form action="/fetch-data"></form>');

    const refs = extractResources(html, PAGE_URL, { pageKeywords: ["none"], downloadKeywords: ["fetch"] });

    expect(refs.map((r) => r.url)).toEqual(["https://data.test/fetch-data"]);
  });

  it("should tag references with the given origin", () => {
    const html = page('<a href="codes.zip">zip</a>');

    expect(extractResources(html, PAGE_URL, { via: "terms" })[0].via).toBe("terms");
  });

  it("should use the configured extension list", () => {
    const html = page('<a href="codes.owl">owl</a><a href="codes.zip">zip</a>');

    const refs = extractResources(html, PAGE_URL, { fileExtensions: [".owl"], pageKeywords: ["none"] });

    expect(refs.map((r) => r.url)).toEqual(["https://data.test/docs/codes.owl"]);
  });
});

// ---------------------------------------------------------------------------
// 4. extractFromDocument / parseHtml
// ---------------------------------------------------------------------------
describe("extractFromDocument", () => {
  it("should work on an already-parsed document", () => {
    const html = page('<a href="report.pdf">Report</a>');
    const document = parseHtml(html, PAGE_URL);

    expect(extractFromDocument(document, html, PAGE_URL)).toEqual([
      { url: "https://data.test/docs/report.pdf", kind: "file", via: "traversal" },
    ]);
  });
});

describe("ParseError", () => {
  it("should carry the URL", () => {
    const error = new ParseError("bad html", PAGE_URL);
    expect(error.name).toBe("ParseError");
    expect(error.url).toBe(PAGE_URL);
    expect(error).toBeInstanceOf(Error);
  });
});
