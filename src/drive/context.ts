// Execution context guard.
//
// The orchestrating process ("flow") coordinates workers but must not move
// drive data itself; workers ("work") may. The context is an explicit object
// handed to each Drive rather than ambient process state.

export type ExecutionContextKind = 'flow' | 'work';

export interface ExecutionContext {
  readonly kind: ExecutionContextKind;
  /** True when the caller runs as the coordinating process. */
  currentContextIsCoordinator(): boolean;
}

export function createExecutionContext(kind: ExecutionContextKind): ExecutionContext {
  return Object.freeze({
    kind,
    currentContextIsCoordinator: () => kind === 'flow',
  });
}

export const WORK_CONTEXT = createExecutionContext('work');
export const FLOW_CONTEXT = createExecutionContext('flow');
