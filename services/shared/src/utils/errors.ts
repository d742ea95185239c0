// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

// Validation errors: raised before any write

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class FractionOutOfRangeError extends DomainError {
     constructor(
          message: string,
          public readonly partialUnits: number,
          public readonly limit: number
     ) {
          super(message, 'FRACTION_OUT_OF_RANGE', 400);
     }
}

export class InvalidItemConfigurationError extends DomainError {
     constructor(
          public readonly sku: string,
          message: string
     ) {
          super(`Item ${sku}: ${message}`, 'INVALID_ITEM_CONFIGURATION', 422);
     }
}

export class InvalidOverrideError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_OVERRIDE', 400);
     }
}

export class InvalidPeriodError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_PERIOD', 400);
     }
}

export class UnsupportedVoiceActionError extends DomainError {
     constructor(public readonly action: string) {
          super(`Voice action "${action}" is not supported`, 'UNSUPPORTED_VOICE_ACTION', 400);
     }
}

// State errors: workflow preconditions

export class LineLockedError extends DomainError {
     constructor(
          public readonly lineId: number,
          public readonly periodId: number
     ) {
          super(
               `Stocktake line ${lineId} belongs to closed period ${periodId}`,
               'LINE_LOCKED',
               409
          );
     }
}

export class PeriodLockedError extends DomainError {
     constructor(
          public readonly periodId: number,
          message: string = `Period ${periodId} is closed`
     ) {
          super(message, 'PERIOD_LOCKED', 409);
     }
}

export class NotClosedError extends DomainError {
     constructor(public readonly periodId: number) {
          super(`Period ${periodId} is not closed`, 'NOT_CLOSED', 409);
     }
}

export class IncompleteCountError extends DomainError {
     constructor(
          public readonly periodId: number,
          public readonly uncountedSkus: string[]
     ) {
          super(
               `Period ${periodId} has ${uncountedSkus.length} uncounted line(s): ${uncountedSkus.join(', ')}`,
               'INCOMPLETE_COUNT',
               409
          );
     }
}

export class StocktakeAlreadyExistsError extends DomainError {
     constructor(
          public readonly periodId: number,
          public readonly stocktakeId: number
     ) {
          super(
               `Period ${periodId} already has stocktake ${stocktakeId}`,
               'STOCKTAKE_ALREADY_EXISTS',
               409
          );
     }
}

// Concurrency errors: the caller may retry

export class ConflictingTransitionError extends DomainError {
     constructor(public readonly periodId: number) {
          super(
               `Another close/reopen is in progress for period ${periodId}`,
               'CONFLICTING_TRANSITION',
               409
          );
     }
}

// Matching errors at the voice boundary

export interface MatchContender {
     itemId: number;
     name: string;
     score: number;
}

export class AmbiguousItemError extends DomainError {
     constructor(
          public readonly itemIdentifier: string,
          public readonly contenders: MatchContender[]
     ) {
          super(
               `"${itemIdentifier}" matches ${contenders.map((c) => c.name).join(' / ')}`,
               'AMBIGUOUS_ITEM',
               409
          );
     }
}

export class NoMatchError extends DomainError {
     constructor(public readonly itemIdentifier: string) {
          super(`No stocktake item matches "${itemIdentifier}"`, 'NO_MATCH', 404);
     }
}

// Lookups

export class PeriodNotFoundError extends DomainError {
     constructor(public readonly periodId: number) {
          super(`Period ${periodId} not found`, 'PERIOD_NOT_FOUND', 404);
     }
}

export class StocktakeNotFoundError extends DomainError {
     constructor(message: string) {
          super(message, 'STOCKTAKE_NOT_FOUND', 404);
     }
}

export class LineNotFoundError extends DomainError {
     constructor(public readonly lineId: number) {
          super(`Stocktake line ${lineId} not found`, 'LINE_NOT_FOUND', 404);
     }
}
