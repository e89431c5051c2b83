export type Action =
  | { type: "Tick" }
  | { type: "Resize"; width: number; height: number }
  | { type: "Quit" }
  | { type: "FocusNext" }
  | { type: "FocusPrev" }
  | { type: "Up" }
  | { type: "Down" }
  | { type: "Top" }
  | { type: "Bottom" }
  | { type: "Submit" }
  | { type: "Update" }
  | { type: "NextTab" }
  | { type: "PrevTab" }
  | { type: "FilterStart" }
  | { type: "FilterInput"; text: string }
  | { type: "FilterBackspace" }
  | { type: "FilterEnd"; keep: boolean };

export type ActionType = Action["type"];

const BROADCAST: ReadonlySet<ActionType> = new Set<ActionType>(["Update", "Resize", "Tick"]);

export function isBroadcast(action: Action): boolean {
  return BROADCAST.has(action.type);
}
