/**
 * State Machine - submission orchestrator state transitions
 *
 * Defines valid transitions for one submission attempt and a guard
 * function that enforces them.
 */

/**
 * Orchestrator states
 */
export type OrchestratorState = 'idle' | 'validating' | 'submitting' | 'completed';

/**
 * Error thrown when an invalid state transition is attempted
 */
export class InvalidStateTransitionError extends Error {
  public readonly from: OrchestratorState;
  public readonly to: OrchestratorState;

  constructor(from: OrchestratorState, to: OrchestratorState) {
    super(`Invalid state transition: '${from}' → '${to}'`);
    this.name = 'InvalidStateTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Valid transitions.
 *
 *   idle ──► validating ──► submitting ──► completed
 *    ▲           │                            │
 *    └───────────┴────────────────────────────┘
 *
 * A failed validation pass returns straight to idle; every completed
 * submission returns to idle.
 */
export const VALID_TRANSITIONS: ReadonlyMap<
  OrchestratorState,
  ReadonlySet<OrchestratorState>
> = new Map([
  ['idle', new Set<OrchestratorState>(['validating'])],
  ['validating', new Set<OrchestratorState>(['idle', 'submitting'])],
  ['submitting', new Set<OrchestratorState>(['completed'])],
  ['completed', new Set<OrchestratorState>(['idle'])],
]);

/**
 * Assert that a state transition is valid.
 *
 * @throws {InvalidStateTransitionError} If the transition is not allowed
 */
export function assertValidTransition(from: OrchestratorState, to: OrchestratorState): void {
  const validTargets = VALID_TRANSITIONS.get(from);
  if (!validTargets || !validTargets.has(to)) {
    throw new InvalidStateTransitionError(from, to);
  }
}
