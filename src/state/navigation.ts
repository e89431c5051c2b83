import { listOperations, type OperationEntry, type SpecDocument } from "../types.js";
import { SharedState } from "./sharedState.js";

export type NavigationState = {
  readonly document: SpecDocument;
  readonly operations: readonly OperationEntry[];
  readonly selected: number | null;
};

export type NavigationHandle = SharedState<NavigationState>;

export function createNavigation(document: SpecDocument, selected: number | null = null): NavigationHandle {
  const operations = listOperations(document);
  const initial = selected !== null && selected >= 0 && selected < operations.length ? selected : null;
  return new SharedState<NavigationState>({ document, operations, selected: initial });
}

export function activeOperation(state: NavigationState): OperationEntry | null {
  if (state.selected === null) {
    return null;
  }
  return state.operations[state.selected] ?? null;
}

export function selectOperation(state: NavigationState, index: number | null): NavigationState {
  if (index === null || index < 0 || index >= state.operations.length) {
    return { ...state, selected: null };
  }
  return { ...state, selected: index };
}

export function operationLabel(entry: OperationEntry): string {
  return `${entry.method.toUpperCase()} ${entry.path}`;
}
