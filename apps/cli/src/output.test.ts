import { afterEach, describe, expect, it, vi } from "vitest";

import { printErrorLine, printLine } from "./output.js";

describe("printLine", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("joins non-empty parts with a space", () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    printLine("1", "", "change planned.");
    printLine();

    expect(stdout.mock.calls.map(([chunk]) => chunk)).toEqual(["1 change planned.\n", "\n"]);
  });

  it("writes errors to stderr", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    printErrorLine("Error:", "Directory request failed");

    expect(stderr.mock.calls.map(([chunk]) => chunk)).toEqual(["Error: Directory request failed\n"]);
  });
});
