export type LoadCheckState =
  | { status: "not_started"; checked: readonly string[]; pending: readonly string[] }
  | { status: "in_progress"; checked: readonly string[]; pending: readonly string[] }
  | { status: "done"; checked: readonly string[]; pending: readonly string[] }
  | { status: "failed"; checked: readonly string[]; pending: readonly string[]; failedTarget: string };

export type LoadCheckEvent = { type: "passed"; targetId: string } | { type: "failed"; targetId: string };

export function createLoadCheckState(targetIds: readonly string[]): LoadCheckState {
  if (targetIds.length === 0) {
    throw new Error("A load check needs at least one target.");
  }
  return { status: "not_started", checked: [], pending: [...targetIds] };
}

/**
 * Targets are checked strictly in order; `done` and `failed` are terminal.
 */
export function transitionLoadCheck(state: LoadCheckState, event: LoadCheckEvent): LoadCheckState {
  if (state.status === "done" || state.status === "failed") {
    throw new Error(`Load check already ${state.status}; cannot apply "${event.type}" for ${event.targetId}.`);
  }
  const [next, ...rest] = state.pending;
  if (next !== event.targetId) {
    throw new Error(`Expected load check of ${next ?? "nothing"}, got ${event.targetId}.`);
  }

  if (event.type === "failed") {
    return { status: "failed", checked: state.checked, pending: rest, failedTarget: event.targetId };
  }
  const checked = [...state.checked, event.targetId];
  return rest.length === 0
    ? { status: "done", checked, pending: [] }
    : { status: "in_progress", checked, pending: rest };
}

function pascalCase(id: string): string {
  return id
    .split("-")
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/** NotStarted, EntryChecked, AuthChecked, ... or Failed. */
export function describeLoadCheckState(state: LoadCheckState): string {
  if (state.status === "not_started") {
    return "NotStarted";
  }
  if (state.status === "failed") {
    return "Failed";
  }
  const last = state.checked[state.checked.length - 1];
  return last ? `${pascalCase(last)}Checked` : "NotStarted";
}
