/**
 * Error taxonomy for the constraint codec. Every failure aborts the whole
 * decode/encode call; nothing here is retried or recovered from.
 */
export abstract class ConstraintCodecError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedShapeCodeError extends ConstraintCodecError {
  readonly code = 'UNSUPPORTED_SHAPE_CODE';

  constructor(readonly shapeCode: number) {
    super(`AFIX with m=${shapeCode} is not implemented`);
  }
}

export class UnsupportedDofCodeError extends ConstraintCodecError {
  readonly code = 'UNSUPPORTED_DOF_CODE';

  constructor(readonly dofCode: number) {
    super(`AFIX with n=${dofCode} is not implemented`);
  }
}

export class MalformedDirectiveError extends ConstraintCodecError {
  readonly code = 'MALFORMED_DIRECTIVE';

  constructor(
    readonly reason: string,
    readonly lineNumber?: number
  ) {
    super(lineNumber === undefined ? reason : `Line ${lineNumber}: ${reason}`);
  }
}

export class AttachmentCycleError extends ConstraintCodecError {
  readonly code = 'ATTACHMENT_CYCLE';

  constructor(readonly path: readonly string[]) {
    super(`Attached atoms form a cycle: ${path.join(' -> ')}`);
  }
}

export class RecordCountMismatchError extends ConstraintCodecError {
  readonly code = 'RECORD_COUNT_MISMATCH';

  constructor(
    readonly table: string,
    readonly expected: number,
    readonly actual: number,
    detail?: string
  ) {
    super(`${table} holds ${actual} rows where ${expected} were expected${detail ? ` (${detail})` : ''}`);
  }
}

export class MissingRefineInstructionsError extends ConstraintCodecError {
  readonly code = 'MISSING_REFINE_INSTRUCTIONS';

  constructor(searched: readonly string[] = []) {
    super(
      searched.length > 0
        ? `No refine instructions (${searched.join(', ')}) found`
        : 'No refine instructions supplied'
    );
  }
}

/**
 * Raised by the encoder when an atom cannot be placed so that the emitted
 * stream decodes back to the same record.
 */
export class UnrepresentableGraphError extends ConstraintCodecError {
  readonly code = 'UNREPRESENTABLE_GRAPH';

  constructor(
    readonly label: string,
    reason: string,
    subject: 'atom' | 'constraint' = 'atom'
  ) {
    super(`Cannot encode ${subject} ${label}: ${reason}`);
  }
}
