// Engine error kinds. Everything except StatePersistenceFailureError is local to the caller.

export type TableErrorCode =
  | 'NOT_YOUR_TURN'
  | 'INVALID_ACTION'
  | 'INSUFFICIENT_PLAYERS'
  | 'DECK_EXHAUSTED'
  | 'STATE_PERSISTENCE_FAILURE'
  | 'TABLE_NOT_FOUND'
  | 'SEAT_NOT_OWNED';

export class TableEngineError extends Error {
  readonly code: TableErrorCode;

  constructor(code: TableErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotYourTurnError extends TableEngineError {
  constructor(seat: number, toActSeat: number | null) {
    super('NOT_YOUR_TURN', `Seat ${seat} cannot act now (seat to act: ${toActSeat ?? 'none'})`);
  }
}

export class InvalidActionError extends TableEngineError {
  constructor(message: string) {
    super('INVALID_ACTION', message);
  }
}

export class InsufficientPlayersError extends TableEngineError {
  constructor(eligible: number) {
    super('INSUFFICIENT_PLAYERS', `At least 2 eligible seats are required, found ${eligible}`);
  }
}

/** Should be unreachable with at most 8 seats and a 52-card deck. */
export class DeckExhaustedError extends TableEngineError {
  constructor(requested: number, remaining: number) {
    super('DECK_EXHAUSTED', `Cannot deal ${requested} cards from a deck of ${remaining}`);
  }
}

export class StatePersistenceFailureError extends TableEngineError {
  constructor(message: string, cause?: unknown) {
    super('STATE_PERSISTENCE_FAILURE', message);
    this.cause = cause;
  }
}

export class TableNotFoundError extends TableEngineError {
  constructor(tableId: string) {
    super('TABLE_NOT_FOUND', `Table ${tableId} not found`);
  }
}

// A player acting for, or starting a table from, a seat that is not theirs
export class SeatNotOwnedError extends TableEngineError {
  constructor(playerId: string, seat?: number) {
    super(
      'SEAT_NOT_OWNED',
      seat === undefined
        ? `Player ${playerId} has no seat at this table`
        : `Seat ${seat} does not belong to player ${playerId}`
    );
  }
}

export function isTableEngineError(err: unknown): err is TableEngineError {
  return err instanceof TableEngineError;
}
