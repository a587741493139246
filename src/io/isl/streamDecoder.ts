import { MalformedDirectiveError } from '../../errors';
import { type AtomRecord, normalizeLabel } from '../../models/atom';
import { ConstraintCatalogue, type ConstraintDef } from '../../models/constraint';
import { DirectiveStack } from './directiveStack';
import type { AtomInstructionLine, IslLine, OpaqueInstructionLine } from './instructionReader';

/**
 * Resolves the 1-based scattering-type index of an atom line to an element symbol
 */
export type AtomTypeLookup = (typeIndex: number) => string | undefined;

export interface DecodeResult {
  atoms: AtomRecord[];
  constraints: ConstraintDef[];
  /** Instructions other than AFIX, verbatim and in stream order */
  instructions: OpaqueInstructionLine[];
}

export interface StreamDecoderOptions {
  normalizeLabels?: boolean;
}

/**
 * Reads AFIX groups off an instruction stream into per-atom constraint records
 */
export class StreamDecoder {
  private readonly normalizeLabels: boolean;

  constructor(options: StreamDecoderOptions = {}) {
    this.normalizeLabels = options.normalizeLabels ?? true;
  }

  decode(lines: readonly IslLine[], atomTypeLookup: AtomTypeLookup): DecodeResult {
    const stack = new DirectiveStack();
    const catalogue = new ConstraintCatalogue();
    const atoms: AtomRecord[] = [];
    const instructions: OpaqueInstructionLine[] = [];
    const seen = new Set<string>();

    for (const line of lines) {
      switch (line.kind) {
        case 'directive':
          stack.applyDirective(line.m, line.n);
          break;
        case 'instruction':
          instructions.push(line);
          break;
        case 'atom': {
          const atom = this.decodeAtom(line, stack, catalogue, atomTypeLookup);
          if (seen.has(atom.label)) {
            throw new MalformedDirectiveError(`duplicate atom label ${atom.label}`, line.lineNumber);
          }
          seen.add(atom.label);
          atoms.push(atom);
          break;
        }
      }
    }

    return { atoms, constraints: catalogue.toArray(), instructions };
  }

  private decodeAtom(
    line: AtomInstructionLine,
    stack: DirectiveStack,
    catalogue: ConstraintCatalogue,
    atomTypeLookup: AtomTypeLookup
  ): AtomRecord {
    const { atom: fields, lineNumber } = line;
    const element = atomTypeLookup(fields.typeIndex);
    if (!element) {
      throw new MalformedDirectiveError(
        `atom ${fields.label} references unknown scattering type ${fields.typeIndex}`,
        lineNumber
      );
    }
    const label = this.normalizeLabels ? normalizeLabel(fields.label, element) : fields.label;

    const placement = stack.placeAtom(label, element, lineNumber);
    const base = {
      label,
      element,
      typeIndex: fields.typeIndex,
      fractionalCoordinates: fields.coordinates,
      occupancy: fields.occupancy,
      displacement: fields.displacement,
    };
    if (!placement.constrained) {
      return { ...base, attachedTo: null, constraint: null };
    }

    const def = catalogue.register(placement.shapeCode, placement.dofCode);
    return {
      ...base,
      attachedTo: placement.attachedTo,
      constraint: { id: def.id, positionIndex: placement.positionIndex },
    };
  }
}
