import { describe, expect, it } from "vitest";

import { generateHookScript } from "./hook.js";
import { SHELL_TARGETS } from "./targets.js";

describe("generateHookScript", () => {
  it("renders a hook for every supported shell", () => {
    for (const shell of SHELL_TARGETS) {
      const script = generateHookScript(shell);

      expect(script.endsWith("\n")).toBe(true);
      expect(script).toContain(`env --shell ${shell}`);
    }
  });

  it("applies the defaults when bash starts", () => {
    const lines = generateHookScript("bash").trimEnd().split("\n");

    expect(lines[lines.length - 1]).toBe('eval "$(command "envswitch" env --shell bash)"');
  });

  it("quotes a custom command for the target shell", () => {
    expect(generateHookScript("zsh", { bin: "/opt/my tools/envswitch" })).toContain(
      'command "/opt/my tools/envswitch" "$@"',
    );
    expect(generateHookScript("fish", { bin: "/opt/it's/envswitch" })).toContain(
      "command '/opt/it\\'s/envswitch' $argv",
    );
    expect(generateHookScript("bash", { bin: "$(touch /tmp/pwned)" })).toContain(
      'command "\\$(touch /tmp/pwned)" "$@"',
    );
  });

  it("falls back to the default command for a blank bin", () => {
    expect(generateHookScript("cmd", { bin: "  " })).toContain(
      '@"envswitch" env --shell cmd > "%TEMP%\\envswitch-activate.cmd"',
    );
  });
});
