import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WriteError } from "../src/errors";
import { defaultOutputPath, escapeCsvField, flattenRecord, toCsv, toJson, write } from "../src/writer";

describe("toCsv", () => {
  it("takes columns from the first record and leaves missing fields empty", () => {
    expect(toCsv([{ a: 1, b: 2 }, { a: 3 }])).toBe("a,b\n1,2\n3,\n");
  });

  it("drops keys the first record does not have", () => {
    expect(toCsv([{ a: 1 }, { a: 2, extra: "x" }])).toBe("a\n1\n2\n");
  });

  it("collects every key with the union column mode", () => {
    expect(toCsv([{ a: 1 }, { b: 2, a: 3 }], { columns: "union" })).toBe("a,b\n1,\n3,2\n");
  });

  it("writes nothing for an empty result set", () => {
    expect(toCsv([])).toBe("");
  });

  it("flattens nested objects and serializes arrays", () => {
    const csv = toCsv([
      {
        action: "repo.create",
        actor_location: { country_code: "NL" },
        topics: ["a", "b"],
        note: null,
      },
    ]);
    expect(csv).toBe('action,actor_location_country_code,topics,note\nrepo.create,NL,"[""a"",""b""]",\n');
  });

  it("quotes fields with separators, quotes or newlines", () => {
    expect(toCsv([{ msg: 'say "hi", then\nleave', ok: true }])).toBe(
      'msg,ok\n"say ""hi"", then\nleave",true\n',
    );
  });

  it("keeps a __proto__ key as a column", () => {
    const record: Record<string, unknown> = JSON.parse('{"__proto__":"p","a":1}');
    expect(toCsv([record])).toBe("__proto__,a\np,1\n");
  });
});

describe("escapeCsvField", () => {
  it("leaves plain fields alone", () => {
    expect(escapeCsvField("git.clone")).toBe("git.clone");
  });

  it("quotes a carriage return", () => {
    expect(escapeCsvField("a\rb")).toBe('"a\rb"');
  });
});

describe("flattenRecord", () => {
  it("joins nested keys with underscores", () => {
    expect(flattenRecord({ a: { b: { c: 1 } }, d: 2 })).toEqual({ a_b_c: 1, d: 2 });
  });

  it("lets the later of two colliding paths win", () => {
    expect(flattenRecord({ a_b: 1, a: { b: 2 } })).toEqual({ a_b: 2 });
    expect(flattenRecord({ a: { b: 2 }, a_b: 1 })).toEqual({ a_b: 1 });
  });
});

describe("toJson", () => {
  it("writes an empty array for no records", () => {
    expect(toJson([])).toBe("[]\n");
  });

  it("keeps field order as received", () => {
    expect(toJson([{ z: 1, a: 2 }])).toBe('[\n  {\n    "z": 1,\n    "a": 2\n  }\n]\n');
  });
});

describe("defaultOutputPath", () => {
  it("stamps the local date and time", () => {
    const now = new Date(2025, 2, 18, 9, 5, 7);
    expect(defaultOutputPath("csv", now)).toBe("audit_log_20250318_090507.csv");
    expect(defaultOutputPath("json", now)).toBe("audit_log_20250318_090507.json");
  });
});

describe("write", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "audit-log-writer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes CSV to the given path", async () => {
    const path = join(dir, "out.csv");

    const written = await write([{ a: 1, b: 2 }, { a: 3 }], "csv", path);

    expect(written).toBe(path);
    expect(await readFile(path, "utf8")).toBe("a,b\n1,2\n3,\n");
  });

  it("round-trips records through JSON", async () => {
    const path = join(dir, "out.json");
    const records = [
      { action: "git.clone", actor: "octo", created_at: 1710720000000 },
      { action: "repo.create", data: { visibility: "private" } },
    ];

    await write(records, "json", path);

    expect(JSON.parse(await readFile(path, "utf8"))).toEqual(records);
  });

  it("overwrites an existing file", async () => {
    const path = join(dir, "out.json");
    await writeFile(path, "old contents", "utf8");

    await write([], "json", path);

    expect(await readFile(path, "utf8")).toBe("[]\n");
  });

  it("writes an empty CSV file for no records", async () => {
    const path = join(dir, "empty.csv");

    await write([], "csv", path);

    expect(await readFile(path, "utf8")).toBe("");
  });

  it("fails with WriteError when the directory does not exist", async () => {
    const path = join(dir, "missing", "out.json");

    const error = await write([{ a: 1 }], "json", path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toMatchObject({ path });
  });

  it("leaves no temporary file behind after a failed rename", async () => {
    const path = join(dir, "taken");
    await mkdir(path);

    await expect(write([{ a: 1 }], "json", path)).rejects.toThrow(WriteError);
    expect(await readdir(dir)).toEqual(["taken"]);
  });
});
