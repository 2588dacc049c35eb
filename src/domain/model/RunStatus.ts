/**
 * Finite state machine for one invocation of the mutation engine.
 *
 * Valid transitions:
 * - `INIT` → `RESUMING`
 * - `RESUMING` → `RUNNING`
 * - `RUNNING` → `CHECKPOINTING` | `DONE`
 * - `CHECKPOINTING` → `INTERRUPTED`
 * - `DONE`, `INTERRUPTED` → (terminal)
 */
export const RunStatus = {
  INIT: 'INIT',
  RESUMING: 'RESUMING',
  RUNNING: 'RUNNING',
  CHECKPOINTING: 'CHECKPOINTING',
  DONE: 'DONE',
  INTERRUPTED: 'INTERRUPTED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.INIT]: [RunStatus.RESUMING],
  [RunStatus.RESUMING]: [RunStatus.RUNNING],
  [RunStatus.RUNNING]: [RunStatus.CHECKPOINTING, RunStatus.DONE],
  [RunStatus.CHECKPOINTING]: [RunStatus.INTERRUPTED],
  [RunStatus.DONE]: [],
  [RunStatus.INTERRUPTED]: [],
};

/** Check whether a state transition is valid according to the run lifecycle FSM. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** `true` for states a run never leaves. */
export function isTerminal(status: RunStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
