import { describe, expect, it } from "vitest";

import { UnsupportedShellError } from "../core/errors.js";
import { detectShell, parseShellTarget } from "./targets.js";

describe("parseShellTarget", () => {
  it("accepts names and executable aliases case-insensitively", () => {
    expect(parseShellTarget("ZSH")).toBe("zsh");
    expect(parseShellTarget("pwsh")).toBe("powershell");
    expect(parseShellTarget("cmd.exe")).toBe("cmd");
  });

  it("rejects unsupported shells", () => {
    expect(() => parseShellTarget("tcsh")).toThrow(UnsupportedShellError);
    expect(() => parseShellTarget("tcsh")).toThrow('Unsupported shell "tcsh".');
  });
});

describe("detectShell", () => {
  it("follows SHELL when it names a supported shell", () => {
    expect(detectShell({ SHELL: "/usr/bin/zsh" }, "linux")).toBe("zsh");
    expect(detectShell({ SHELL: "/opt/homebrew/bin/fish" }, "darwin")).toBe("fish");
    expect(detectShell({ SHELL: "C:\\Program Files\\Git\\bin\\bash.exe" }, "win32")).toBe("bash");
  });

  it("falls back to PowerShell, then the platform default", () => {
    expect(detectShell({ PSModulePath: "C:\\Modules" }, "win32")).toBe("powershell");
    expect(detectShell({}, "win32")).toBe("cmd");
    expect(detectShell({ SHELL: "/bin/tcsh" }, "linux")).toBe("bash");
  });
});
