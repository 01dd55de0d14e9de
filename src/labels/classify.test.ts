import { describe, it, expect } from "vitest";
import { classifyLabels, isNumericLabelId } from "./classify.js";
import type { LabelDictionary, LabelRecord } from "./dictionary.js";

function dict(records: LabelRecord[]): LabelDictionary {
  return new Map(records.map((r) => [r.id, r]));
}

const dictionary = dict([
  { id: "1", name: "Inbox", kind: "folder", kindCode: 3 },
  { id: "2", name: "Sent", kind: "folder", kindCode: 3 },
  { id: "5", name: "All Mail", kind: "tag", kindCode: 1 },
  { id: "user123", name: "Personal", kind: "folder", kindCode: 3 },
  { id: "user456", name: "Work", kind: "folder", kindCode: 3 },
  { id: "tag789", name: "Important", kind: "tag", kindCode: 1 },
  { id: "odd42x", name: "Calendar", kind: "unknown", kindCode: 4 },
]);

describe("isNumericLabelId", () => {
  it("treats all-digit ids as numeric", () => {
    expect(isNumericLabelId("1")).toBe(true);
    expect(isNumericLabelId("123")).toBe(true);
    expect(isNumericLabelId("0")).toBe(true);
  });

  it("treats anything else as complex", () => {
    expect(isNumericLabelId("abc123")).toBe(false);
    expect(isNumericLabelId("aBc123DeF==")).toBe(false);
    expect(isNumericLabelId("12 ")).toBe(false);
    expect(isNumericLabelId("-1")).toBe(false);
    expect(isNumericLabelId("")).toBe(false);
  });
});

describe("classifyLabels", () => {
  it("splits mixed labels by shape and kind", () => {
    const partition = classifyLabels(["1", "user123", "5", "tag789"], dictionary);
    expect(partition).toEqual({
      userFolders: [{ id: "user123", name: "Personal" }],
      systemFolders: [{ id: "1", name: "Inbox" }],
      userTags: [{ id: "tag789", name: "Important" }],
      systemTags: [{ id: "5", name: "All Mail" }],
      unrecognized: [],
    });
  });

  it("puts ids missing from the dictionary in unrecognized", () => {
    const partition = classifyLabels(["1", "unknown_label", "999"], dictionary);
    expect(partition.systemFolders).toEqual([{ id: "1", name: "Inbox" }]);
    expect(partition.unrecognized).toEqual([
      { id: "unknown_label", reason: "missing" },
      { id: "999", reason: "missing" },
    ]);
  });

  it("puts labels of an unknown kind in unrecognized with their name and code", () => {
    const partition = classifyLabels(["odd42x"], dictionary);
    expect(partition.unrecognized).toEqual([
      { id: "odd42x", reason: "unknown_kind", name: "Calendar", kindCode: 4 },
    ]);
  });

  it("returns five empty lists for an email without labels", () => {
    expect(classifyLabels([], dictionary)).toEqual({
      userFolders: [],
      systemFolders: [],
      userTags: [],
      systemTags: [],
      unrecognized: [],
    });
  });

  it("places every id in exactly one category", () => {
    const ids = ["1", "2", "5", "user123", "user456", "tag789", "odd42x", "ghost", "77"];
    const partition = classifyLabels(ids, dictionary);
    const placed = [
      ...partition.userFolders,
      ...partition.systemFolders,
      ...partition.userTags,
      ...partition.systemTags,
      ...partition.unrecognized,
    ].map((l) => l.id);
    expect([...placed].sort()).toEqual([...ids].sort());
  });

  it("counts a repeated id once", () => {
    const partition = classifyLabels(["user123", "user123"], dictionary);
    expect(partition.userFolders).toEqual([{ id: "user123", name: "Personal" }]);
  });

  it("decides shape from the id alone, whatever the dictionary says", () => {
    const asTag = classifyLabels(["42"], dict([{ id: "42", name: "X", kind: "tag", kindCode: 1 }]));
    const asFolder = classifyLabels(["42"], dict([{ id: "42", name: "X", kind: "folder", kindCode: 3 }]));
    expect(asTag.systemTags).toHaveLength(1);
    expect(asFolder.systemFolders).toHaveLength(1);
  });
});
