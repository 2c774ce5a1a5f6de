/**
 * Commit/undo lifecycle of a single Board.
 *
 * This is deliberately a two-state machine, not a history: at most one
 * mutation episode is pending at a time, and undo reverts to the state at the
 * start of that episode only.
 *
 * An episode opens on the first `place` or `clearRows` after the last
 * commit/undo. That transition is the only moment a snapshot is taken.
 *
 * A freshly constructed board starts uncommitted with no snapshot (it has not
 * been started with `newGame`). Undo from that state is a programmer error.
 */

export type BoardMutationKind = 'place' | 'clear_rows';

export interface CommittedState {
  kind: 'committed';
}

export interface UncommittedState {
  kind: 'uncommitted';
  /** Mutation that opened the episode, or 'construction' before newGame. */
  openedBy: BoardMutationKind | 'construction';
  /** True once a snapshot backs this episode. */
  hasSnapshot: boolean;
}

export type BoardCommitState = CommittedState | UncommittedState;

export type UndoDecision = 'noop' | 'restore' | 'no_backup';

export interface MutationTransition {
  state: BoardCommitState;
  /** The caller must copy the live grid into the backup before mutating. */
  takeSnapshot: boolean;
}

export function makeInitialCommitState(): BoardCommitState {
  return { kind: 'uncommitted', openedBy: 'construction', hasSnapshot: false };
}

export function makeCommittedState(): BoardCommitState {
  return { kind: 'committed' };
}

/**
 * Transition taken at the start of every `place` and `clearRows`.
 */
export function beginMutation(
  previous: BoardCommitState,
  mutation: BoardMutationKind
): MutationTransition {
  if (previous.kind === 'committed') {
    return {
      state: { kind: 'uncommitted', openedBy: mutation, hasSnapshot: true },
      takeSnapshot: true,
    };
  }
  return { state: previous, takeSnapshot: false };
}

export function decideUndo(state: BoardCommitState): UndoDecision {
  if (state.kind === 'committed') {
    return 'noop';
  }
  return state.hasSnapshot ? 'restore' : 'no_backup';
}

export function isCommitted(state: BoardCommitState): state is CommittedState {
  return state.kind === 'committed';
}
