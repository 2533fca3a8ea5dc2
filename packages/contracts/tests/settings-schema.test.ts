import { describe, expect, it } from "vitest";
import { DEFAULT_KEYBINDINGS, isValidKey, parseSettings } from "@crawl/contracts";

describe("parseSettings", () => {
  it("fills every field from defaults for an empty object", () => {
    const res = parseSettings({});
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.difficulty).toBe("Normal");
    expect(res.value.defaultDifficulty).toBe("Normal");
    expect(res.value.musicVolume).toBe(50);
    expect(res.value.skipLogo).toBe(false);
    expect(res.value.keybindings).toEqual(DEFAULT_KEYBINDINGS);
  });

  it("replaces unknown difficulty values with Normal", () => {
    const res = parseSettings({ difficulty: "Nightmare", defaultDifficulty: "Hard" });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.difficulty).toBe("Normal");
    expect(res.value.defaultDifficulty).toBe("Hard");
  });

  it("clamps volumes into [0, 100]", () => {
    const res = parseSettings({ musicVolume: 140, soundVolume: -3 });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.musicVolume).toBe(100);
    expect(res.value.soundVolume).toBe(0);
  });

  it("keeps valid rebinds and resets malformed keys per action", () => {
    const res = parseSettings({
      keybindings: { moveUp: "Up", attack: "MiddleClick", pause: "Escape" },
    });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.keybindings.moveUp).toBe("Up");
    expect(res.value.keybindings.attack).toBe("LeftClick");
    expect(res.value.keybindings.pause).toBe("Escape");
    expect(res.value.keybindings.dash).toBe("Space");
  });

  it("rejects a payload that is not an object", () => {
    const res = parseSettings("volume=11");
    expect(res.success).toBe(false);
    expect(res.error.code).toBe("SETTINGS_INVALID");
  });
});

describe("isValidKey", () => {
  it("accepts letters, digits, named keys and mouse buttons", () => {
    expect(isValidKey("W")).toBe(true);
    expect(isValidKey("7")).toBe(true);
    expect(isValidKey("Return")).toBe(true);
    expect(isValidKey("RightClick")).toBe(true);
  });

  it("rejects lowercase and unknown names", () => {
    expect(isValidKey("w")).toBe(false);
    expect(isValidKey("F13")).toBe(false);
    expect(isValidKey("")).toBe(false);
  });
});
