import { describe, expect, it } from "vitest";

import { composeCommand, hasRunnableFiles, quoteShellArg, toContainerCommand } from "./CommandComposer.js";
import type { StagedFile } from "./types.js";

const defaults = { interpreter: "python", shell: "bash" };

function file(name: string, executionMode: StagedFile["executionMode"]): StagedFile {
  return { name, content: "", executionMode };
}

describe("composeCommand", () => {
  it("runs interpreted and shell files in order", () => {
    const command = composeCommand(
      [file("a.py", "interpreted"), file("lib/data.json", "none"), file("b.sh", "shell")],
      defaults,
    );
    expect(command).toBe("python a.py && bash b.sh");
  });

  it("prepends a silenced setup step", () => {
    const command = composeCommand([file("a.py", "interpreted")], { ...defaults, setupCommand: "pip install numpy" });
    expect(command).toBe("(pip install numpy) > /dev/null 2>&1 && python a.py");
  });

  it("ignores a blank setup command", () => {
    expect(composeCommand([file("a.py", "interpreted")], { ...defaults, setupCommand: "   " })).toBe("python a.py");
  });

  it("is empty without runnable files even when setup is configured", () => {
    expect(composeCommand([file("notes.txt", "none")], { ...defaults, setupCommand: "true" })).toBe("");
    expect(composeCommand([], defaults)).toBe("");
  });

  it("keeps a leading dash from being read as an option", () => {
    const command = composeCommand([file("-i.py", "interpreted"), file("-x run.sh", "shell")], defaults);
    expect(command).toBe("python ./-i.py && bash './-x run.sh'");
  });

  it("uses the configured interpreter and shell", () => {
    const command = composeCommand([file("a.py", "interpreted"), file("b.sh", "shell")], {
      interpreter: "python3",
      shell: "sh",
    });
    expect(command).toBe("python3 a.py && sh b.sh");
  });

  it("quotes names outside the safe character set", () => {
    expect(composeCommand([file("my script.py", "interpreted")], defaults)).toBe("python 'my script.py'");
  });
});

describe("quoteShellArg", () => {
  it("leaves safe names untouched", () => {
    expect(quoteShellArg("dir/sub-1/file_2.py")).toBe("dir/sub-1/file_2.py");
  });

  it("escapes embedded single quotes", () => {
    expect(quoteShellArg("it's.py")).toBe("'it'\\''s.py'");
  });

  it("neutralizes shell metacharacters", () => {
    expect(quoteShellArg("a.py; rm -rf /")).toBe("'a.py; rm -rf /'");
  });
});

describe("hasRunnableFiles", () => {
  it("detects runnable modes", () => {
    expect(hasRunnableFiles([file("x", "none")])).toBe(false);
    expect(hasRunnableFiles([file("x", "none"), file("y", "shell")])).toBe(true);
  });
});

describe("toContainerCommand", () => {
  it("passes the line as a single bash argument", () => {
    expect(toContainerCommand("python a.py && bash b.sh")).toEqual(["bash", "-c", "python a.py && bash b.sh"]);
  });
});
