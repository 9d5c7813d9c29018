import path from "node:path";
import { describe, expect, it } from "vitest";
import { applyEnvOverrides } from "../../src/main";
import { settings } from "../helpers";

describe("applyEnvOverrides", () => {
  it("leaves settings alone without overrides", () => {
    const base = settings({ state: { path: "state/a.json", fallbackPaths: ["/tmp/a.json"] } });

    expect(applyEnvOverrides(base, {})).toEqual(base);
  });

  it("takes state paths and the control token from the environment", () => {
    const next = applyEnvOverrides(settings(), {
      MONITOR_STATE_PATH: " /var/lib/fleetwarden/state.json ",
      MONITOR_STATE_FALLBACK: "/tmp/fw.json, ,relative/fw.json",
      MONITOR_CONTROL_TOKEN: "test-secret"
    });

    expect(next.state).toEqual({
      path: "/var/lib/fleetwarden/state.json",
      fallbackPaths: ["/tmp/fw.json", path.resolve("relative/fw.json")]
    });
    expect(next.control.authToken).toBe("test-secret");
    expect(next.control.port).toBe(7787);
  });
});
