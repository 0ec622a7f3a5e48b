// =============================================================================
// Text formatting state (editor page)
// =============================================================================

export type Mark = "bold" | "italic" | "underline" | "strikethrough";

export type Formatting = Record<Mark, boolean>;

export type FormattingEvent =
  | { type: "toggle"; mark: Mark }
  | { type: "undo" }
  | { type: "redo" };

/**
 * Current formatting plus undo/redo stacks and a short activity trail.
 * `activity` holds the most recent event names, newest first.
 */
export type FormattingState = {
  current: Formatting;
  past: Formatting[];
  future: Formatting[];
  activity: string[];
};

export const MAX_ACTIVITY = 10;

/** Undo depth; the oldest snapshot is dropped past this. */
export const MAX_HISTORY = 50;

export const initialFormatting: FormattingState = {
  current: { bold: false, italic: false, underline: false, strikethrough: false },
  past: [],
  future: [],
  activity: [],
};

function record(activity: string[], entry: string): string[] {
  return [entry, ...activity].slice(0, MAX_ACTIVITY);
}

function pushPast(past: Formatting[], entry: Formatting): Formatting[] {
  return [...past, entry].slice(-MAX_HISTORY);
}

/**
 * Reducer for `useReducer`.
 *
 * - toggle: flips one mark, pushes the previous state to `past` (at most
 *   `MAX_HISTORY` entries), clears `future`
 * - undo / redo: move between stacks; with an empty stack nothing changes
 *   except the activity trail
 */
export function formattingReducer(state: FormattingState, event: FormattingEvent): FormattingState {
  switch (event.type) {
    case "toggle":
      return {
        current: { ...state.current, [event.mark]: !state.current[event.mark] },
        past: pushPast(state.past, state.current),
        future: [],
        activity: record(state.activity, event.mark),
      };

    case "undo": {
      const prev = state.past[state.past.length - 1];
      if (!prev) return { ...state, activity: record(state.activity, "undo") };

      return {
        current: prev,
        past: state.past.slice(0, -1),
        future: [state.current, ...state.future],
        activity: record(state.activity, "undo"),
      };
    }

    case "redo": {
      const [next, ...rest] = state.future;
      if (!next) return { ...state, activity: record(state.activity, "redo") };

      return {
        current: next,
        past: pushPast(state.past, state.current),
        future: rest,
        activity: record(state.activity, "redo"),
      };
    }
  }
}
