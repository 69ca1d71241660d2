import { describe, it, expect } from "vitest";
import {
  TEST_FILE_STRATEGIES,
  commentFilenameFence,
  extractFiles,
  headingFence,
  inlineFilenameFence,
} from "../agents/fileExtraction.js";

const FENCE = "```";

describe("headingFence", () => {
  it("extracts files announced with a ### heading", () => {
    const text = `Here you go.\n\n### src/app.py\n${FENCE}python\nprint("hi")\n${FENCE}\n\n### README.md\n${FENCE}\n# Todo\n${FENCE}`;
    expect(headingFence.extract(text)).toEqual([
      { path: "src/app.py", content: 'print("hi")' },
      { path: "README.md", content: "# Todo" },
    ]);
  });

  it("keeps the first occurrence of a repeated path", () => {
    const text = `### a.py\n${FENCE}\none\n${FENCE}\n### a.py\n${FENCE}\ntwo\n${FENCE}`;
    expect(headingFence.extract(text)).toEqual([{ path: "a.py", content: "one" }]);
  });
});

describe("inlineFilenameFence", () => {
  it("reads File: labels", () => {
    const text = `File: main.go\n${FENCE}go\npackage main\n${FENCE}`;
    expect(inlineFilenameFence.extract(text)).toEqual([{ path: "main.go", content: "package main" }]);
  });

  it("reads bold file names", () => {
    const text = `**utils/helpers.ts**\n${FENCE}ts\nexport const x = 1;\n${FENCE}`;
    expect(inlineFilenameFence.extract(text)).toEqual([{ path: "utils/helpers.ts", content: "export const x = 1;" }]);
  });
});

describe("commentFilenameFence", () => {
  it("reads a file name from the first comment line inside the fence", () => {
    const text = `${FENCE}python\n# main.py\nprint(1)\n${FENCE}\n${FENCE}js\n// lib/index.js\nmodule.exports = {};\n${FENCE}`;
    expect(commentFilenameFence.extract(text)).toEqual([
      { path: "main.py", content: "print(1)" },
      { path: "lib/index.js", content: "module.exports = {};" },
    ]);
  });
});

describe("extractFiles", () => {
  it("first strategy with results wins", () => {
    const text = `### first.py\n${FENCE}\na = 1\n${FENCE}\n\n${FENCE}python\n# second.py\nb = 2\n${FENCE}`;
    expect(extractFiles(text).map((f) => f.path)).toEqual(["first.py"]);
  });

  it("falls back to comment-embedded names when nothing else matches", () => {
    const text = `Some explanation.\n\n${FENCE}python\n# app.py\nprint("ok")\n${FENCE}`;
    expect(extractFiles(text)).toEqual([{ path: "app.py", content: 'print("ok")' }]);
  });

  it("returns an empty list for plain prose", () => {
    expect(extractFiles("No code here, just an explanation.")).toEqual([]);
  });

  it("test strategies pick test-named files before generic inline names", () => {
    const text = `config.json\n${FENCE}\n{}\n${FENCE}\n\n**test_todo.py**\n${FENCE}python\ndef test_add():\n    assert True\n${FENCE}`;
    expect(extractFiles(text, TEST_FILE_STRATEGIES)).toEqual([
      { path: "test_todo.py", content: "def test_add():\n    assert True" },
    ]);
  });
});
