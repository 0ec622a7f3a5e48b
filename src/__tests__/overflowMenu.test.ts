import { describe, expect, it } from "vitest";

import { INITIAL_MENU_STATE, transitionMenu, type MenuEvent, type MenuState } from "../toolbar";

describe("transitionMenu", () => {
  it("starts closed", () => {
    expect(INITIAL_MENU_STATE).toBe("closed");
  });

  it("opens on trigger and toggles back on a second trigger", () => {
    expect(transitionMenu("closed", "trigger")).toBe("open");
    expect(transitionMenu("open", "trigger")).toBe("closed");
  });

  it("closes after an entry is selected", () => {
    expect(transitionMenu("open", "entrySelected")).toBe("closed");
  });

  it("closes on dismiss and stays closed when already closed", () => {
    expect(transitionMenu("open", "dismiss")).toBe("closed");
    expect(transitionMenu("closed", "dismiss")).toBe("closed");
  });

  it.each<[MenuState, MenuEvent]>([
    ["open", "expanded"],
    ["closed", "expanded"],
  ])("is closed after switching to expanded from %s", (state, event) => {
    expect(transitionMenu(state, event)).toBe("closed");
  });
});
