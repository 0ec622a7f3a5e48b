import { describe, expect, it } from "vitest";

import {
  formattingReducer,
  initialFormatting,
  MAX_ACTIVITY,
  MAX_HISTORY,
  type FormattingEvent,
} from "../lib/formatting";

function run(...events: FormattingEvent[]) {
  return events.reduce(formattingReducer, initialFormatting);
}

describe("formattingReducer", () => {
  it("toggles a mark and records it", () => {
    const s = run({ type: "toggle", mark: "bold" });
    expect(s.current.bold).toBe(true);
    expect(s.past).toHaveLength(1);
    expect(s.activity).toEqual(["bold"]);
  });

  it("undoes and redoes toggles", () => {
    const toggled = run({ type: "toggle", mark: "bold" }, { type: "toggle", mark: "italic" });

    const undone = formattingReducer(toggled, { type: "undo" });
    expect(undone.current).toEqual({ bold: true, italic: false, underline: false, strikethrough: false });

    const redone = formattingReducer(undone, { type: "redo" });
    expect(redone.current).toEqual(toggled.current);
    expect(redone.future).toEqual([]);
  });

  it("clears the redo stack after a new toggle", () => {
    const s = run(
      { type: "toggle", mark: "bold" },
      { type: "undo" },
      { type: "toggle", mark: "underline" }
    );
    expect(s.future).toEqual([]);
    expect(s.current).toEqual({ bold: false, italic: false, underline: true, strikethrough: false });
  });

  it("keeps formatting unchanged when there is nothing to undo or redo", () => {
    const s = run({ type: "undo" }, { type: "redo" });
    expect(s.current).toEqual(initialFormatting.current);
    expect(s.activity).toEqual(["redo", "undo"]);
  });

  it("keeps only the most recent activity entries", () => {
    const events = Array.from({ length: MAX_ACTIVITY + 3 }, (): FormattingEvent => ({
      type: "toggle",
      mark: "italic",
    }));
    expect(run(...events).activity).toHaveLength(MAX_ACTIVITY);
  });

  it("drops the oldest undo snapshots past the history limit", () => {
    const toggles = Array.from({ length: MAX_HISTORY + 3 }, (): FormattingEvent => ({
      type: "toggle",
      mark: "bold",
    }));
    const s = run(...toggles);
    expect(s.past).toHaveLength(MAX_HISTORY);

    const undos = Array.from({ length: MAX_HISTORY + 1 }, (): FormattingEvent => ({ type: "undo" }));
    const rewound = undos.reduce(formattingReducer, s);

    // The three oldest snapshots are gone: the earliest reachable state has bold on.
    expect(rewound.past).toEqual([]);
    expect(rewound.current.bold).toBe(true);
    expect(rewound.future).toHaveLength(MAX_HISTORY);
  });
});
