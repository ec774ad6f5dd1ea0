export type ProtocolViolationCode =
  | 'point_in_progress'
  | 'unexpected_serve_outcome'
  | 'unexpected_return_outcome'
  | 'unexpected_rally_outcome'
  | 'match_over'
  | 'match_tiebreak_server_required'
  | 'match_tiebreak_not_pending'
  | 'set_not_found';

export class ProtocolViolationError extends Error {
  constructor(
    message: string,
    public readonly code: ProtocolViolationCode
  ) {
    super(message);
    this.name = 'ProtocolViolationError';
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) throw new InvariantViolationError(message);
}
