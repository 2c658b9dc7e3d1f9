import { describe, expect, it } from "vitest";
import { ParseError } from "../src/errors";
import { extractRecords, nextPageUrl, parseLinkHeader } from "../src/pagination";
import type { PageResponse } from "../src/transport";

function response(url: string, link?: string): PageResponse {
  return {
    url,
    status: 200,
    headers: new Headers(link ? { Link: link } : {}),
    body: [],
  };
}

describe("parseLinkHeader", () => {
  it("maps each relation to its target", () => {
    const links = parseLinkHeader(
      '<https://api.example.com/log?page=2>; rel="next", <https://api.example.com/log?page=5>; rel="last"',
    );

    expect(links.get("next")).toBe("https://api.example.com/log?page=2");
    expect(links.get("last")).toBe("https://api.example.com/log?page=5");
    expect(links.size).toBe(2);
  });

  it("matches relations case-insensitively and accepts unquoted values", () => {
    const links = parseLinkHeader("<https://api.example.com/a>; rel=Next");
    expect(links.get("next")).toBe("https://api.example.com/a");
  });

  it("splits space-separated relations", () => {
    const links = parseLinkHeader('<https://api.example.com/b>; rel="next last"');
    expect(links.get("next")).toBe("https://api.example.com/b");
    expect(links.get("last")).toBe("https://api.example.com/b");
  });

  it("ignores other parameters", () => {
    const links = parseLinkHeader('<https://api.example.com/c>; title="page two"; rel="next"');
    expect(links.get("next")).toBe("https://api.example.com/c");
  });

  it("keeps the first target when a relation repeats", () => {
    const links = parseLinkHeader(
      '<https://api.example.com/1>; rel="next", <https://api.example.com/2>; rel="next"',
    );
    expect(links.get("next")).toBe("https://api.example.com/1");
  });

  it("returns an empty map for a missing header", () => {
    expect(parseLinkHeader(null).size).toBe(0);
    expect(parseLinkHeader("").size).toBe(0);
  });
});

describe("nextPageUrl", () => {
  it("returns the next link unchanged when absolute", () => {
    const next = nextPageUrl(
      response(
        "https://api.example.com/log",
        '<https://api.example.com/log?after=abc&before=>; rel="next"',
      ),
    );
    expect(next).toBe("https://api.example.com/log?after=abc&before=");
  });

  it("resolves a relative link against the request URL", () => {
    const next = nextPageUrl(
      response("https://api.example.com/enterprises/acme/audit-log?page=1", '</enterprises/acme/audit-log?page=2>; rel="next"'),
    );
    expect(next).toBe("https://api.example.com/enterprises/acme/audit-log?page=2");
  });

  it("returns null on the last page", () => {
    expect(
      nextPageUrl(response("https://api.example.com/log", '<https://api.example.com/log?page=1>; rel="first"')),
    ).toBeNull();
    expect(nextPageUrl(response("https://api.example.com/log"))).toBeNull();
  });
});

describe("extractRecords", () => {
  it("returns a bare array as-is", () => {
    const records = [{ action: "git.clone" }, { action: "repo.create" }];
    expect(extractRecords(records)).toEqual(records);
  });

  it("treats an empty body as no records", () => {
    expect(extractRecords(null)).toEqual([]);
    expect(extractRecords([])).toEqual([]);
    expect(extractRecords({})).toEqual([]);
  });

  it("unwraps an enveloped list", () => {
    const body = {
      total_count: 2,
      incomplete_results: false,
      items: [{ id: 1 }, { id: 2 }],
    };
    expect(extractRecords(body)).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it("rejects a body that holds no list", () => {
    expect(() => extractRecords({ message: "hello" })).toThrow(ParseError);
    expect(() => extractRecords("text")).toThrow(ParseError);
  });

  it("rejects array items that are not objects", () => {
    expect(() => extractRecords([{ id: 1 }, 2], "https://api.example.com/log")).toThrow(
      "Item 1 of the page is not a JSON object",
    );
  });
});
