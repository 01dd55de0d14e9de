import { describe, it, expect } from "vitest";
import { createConsoleLogger } from "./console-logger.js";

describe("createConsoleLogger", () => {
  it("writes level, message and properties", () => {
    const lines: string[] = [];
    const logger = createConsoleLogger(false, (line) => lines.push(line));
    logger.info("Loaded 3 label mappings", { folders: 2, tags: 1 });
    logger.warn("Email file not found", { file: "a.metadata.json" });
    expect(lines).toEqual([
      "INFO - Loaded 3 label mappings folders=2 tags=1",
      "WARNING - Email file not found file=a.metadata.json",
    ]);
  });

  it("drops debug lines unless debug is on", () => {
    const lines: string[] = [];
    createConsoleLogger(false, (line) => lines.push(line)).debug("hidden");
    expect(lines).toEqual([]);
  });

  it("timestamps every line in debug mode", () => {
    const lines: string[] = [];
    createConsoleLogger(true, (line) => lines.push(line)).debug("shown", { ids: ["1", "2"] });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z - DEBUG - shown ids=\["1","2"\]$/);
  });
});
