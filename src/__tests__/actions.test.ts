import { describe, expect, it, vi } from "vitest";

import {
  ActionRegistry,
  defineActions,
  DuplicateActionError,
  InvalidActionError,
  UnknownActionError,
} from "../toolbar";

describe("defineActions", () => {
  const base = [
    { id: "bold", label: "Bold", icon: "bold" },
    { id: "italic", label: "Italic", icon: "italic" },
    { id: "underline", label: "Underline", icon: "underline" },
  ];

  it("keeps registration order", () => {
    const registry = defineActions(base);
    expect(registry.size).toBe(3);
    expect(registry.list().map((a) => a.id)).toEqual(["bold", "italic", "underline"]);
  });

  it("looks actions up by id", () => {
    const registry = defineActions(base);
    expect(registry.has("italic")).toBe(true);
    expect(registry.get("italic")?.label).toBe("Italic");
    expect(registry.get("missing")).toBeUndefined();
    expect(registry.require("bold").icon).toBe("bold");
  });

  it("throws UnknownActionError from require() for a missing id", () => {
    const registry = defineActions(base);
    expect(() => registry.require("missing")).toThrow(UnknownActionError);
    expect(() => registry.require("missing")).toThrow('Unknown toolbar action "missing"');
  });

  it("rejects duplicate ids", () => {
    expect(() => defineActions([...base, { id: "bold", label: "Bold again", icon: "bold" }])).toThrow(
      DuplicateActionError
    );
  });

  it("rejects blank ids", () => {
    expect(() => defineActions([{ id: "  ", label: "Nothing", icon: "more" }])).toThrow(
      InvalidActionError
    );
  });

  it("freezes registered actions and is unaffected by later edits to the input", () => {
    const input = [{ id: "bold", label: "Bold", icon: "bold", onActivate: vi.fn() }];
    const registry = defineActions(input);

    input.push({ id: "late", label: "Late", icon: "more", onActivate: vi.fn() });
    input[0].label = "Changed";

    expect(registry.size).toBe(1);
    expect(registry.require("bold").label).toBe("Bold");
    expect(Object.isFrozen(registry.require("bold"))).toBe(true);
    expect(Object.isFrozen(registry.list())).toBe(true);
  });
});

describe("ActionRegistry", () => {
  it("applies the same checks when constructed directly", () => {
    const first = vi.fn();
    const second = vi.fn();

    expect(
      () =>
        new ActionRegistry([
          { id: "bold", label: "Bold", icon: "bold", onActivate: first },
          { id: "bold", label: "Bold", icon: "bold", onActivate: second },
        ])
    ).toThrow('Duplicate toolbar action "bold"');
    expect(() => new ActionRegistry([{ id: "", label: "Empty", icon: "more" }])).toThrow(
      InvalidActionError
    );
  });

  it("freezes actions passed to the constructor", () => {
    const registry = new ActionRegistry([{ id: "bold", label: "Bold", icon: "bold" }]);
    expect(Object.isFrozen(registry.require("bold"))).toBe(true);
    expect(Object.isFrozen(registry.list())).toBe(true);
  });
});
