import { describe, it, expect, vi, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadOrganizerSettings } from "../config/loader.js";
import type { Logger } from "../types/logger.js";
import { organizeExport } from "./organize.js";

const fsControl = vi.hoisted(() => ({ failUtimes: false }));

vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return {
    ...actual,
    utimesSync: (...args: Parameters<typeof actual.utimesSync>) => {
      if (fsControl.failUtimes) throw new Error("EPERM: operation not permitted");
      actual.utimesSync(...args);
    },
  };
});

const silent: Logger = { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} };

afterEach(() => {
  fsControl.failUtimes = false;
});

describe("organizeExport when timestamps cannot be kept", () => {
  it("removes the copy and reports copy_failed", async () => {
    const dir = await mkdtemp(join(tmpdir(), "proton-export-"));
    await writeFile(
      join(dir, "labels.json"),
      JSON.stringify({ Version: 1, Payload: [{ ID: "0", Name: "Inbox", Type: 3 }] })
    );
    await writeFile(join(dir, "a.metadata.json"), JSON.stringify({ LabelIDs: ["0"] }));
    await writeFile(join(dir, "a.eml"), "Subject: a\r\n\r\n");
    fsControl.failUtimes = true;

    const result = organizeExport({ exportDir: dir, settings: loadOrganizerSettings() }, silent);

    expect(result.processed).toBe(0);
    expect(result.failures).toEqual([
      {
        ok: false,
        file: "a.metadata.json",
        error: "Error copying a.eml to Inbox: EPERM: operation not permitted",
        errorType: "copy_failed",
      },
    ]);
    expect(existsSync(join(dir, "organized_emails", "Inbox", "a.eml"))).toBe(false);
  });
});
