// Error taxonomy shared by shapes, board and solver adapter

/** Base class for every error raised by the puzzle */
export class PuzzleError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PuzzleError';
  }
}

/** Malformed cell coordinates given to a shape or grid */
export class InvalidGeometryError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidGeometryError';
  }
}

/** A cell-set that no canonical configuration of the shape reproduces */
export class InvalidPlacementError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidPlacementError';
  }
}

export class IllegalPickError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IllegalPickError';
  }
}

export class IllegalReleaseError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IllegalReleaseError';
  }
}

/** Items of an inventory or saved layout start at illegal placements */
export class InitialConfigurationError extends IllegalReleaseError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InitialConfigurationError';
  }
}

/** Operation not allowed in the board's current state (picked, already won) */
export class InvalidStateError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidStateError';
  }
}

export class NoItemError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NoItemError';
  }
}

export class NoSolutionError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NoSolutionError';
  }
}

/** Momentos could not be restored; the board is left in an unknown state */
export class InconsistentStateError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InconsistentStateError';
  }
}

export class InvalidInventoryError extends PuzzleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidInventoryError';
  }
}
