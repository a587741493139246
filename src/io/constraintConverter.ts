import { type Config, loadConfig } from '../config';
import {
  MissingRefineInstructionsError,
  RecordCountMismatchError,
  UnrepresentableGraphError,
} from '../errors';
import { type Logger, createLogger } from '../logger';
import {
  type AtomRecord,
  type Displacement,
  DEFAULT_OCCUPANCY,
  DEFAULT_UISO,
  capitalizeElement,
} from '../models/atom';
import type { RecordTable } from '../models/cifBlock';
import { type ConstraintDef, createConstraintDef, parseConstraintId } from '../models/constraint';
import { formatNumber } from './isl/atomLine';
import { GraphEncoder } from './isl/graphEncoder';
import { InstructionReader, UNSUPPORTED_KEYWORDS, scatteringTypes } from './isl/instructionReader';
import { type AtomTypeLookup, type DecodeResult, StreamDecoder } from './isl/streamDecoder';
import { parseCifNumber } from './parsers/cifParser';

const ATOM_SITE_LABEL = '_atom_site.label';
const ANISO_LABEL = '_atom_site_aniso.label';
const ANISO_COLUMNS = ['u_11', 'u_22', 'u_33', 'u_23', 'u_13', 'u_12'].map(
  (suffix) => `_atom_site_aniso.${suffix}`
);
const NONE = '.';
const GENERATED_TITLE = 'TITL atom list rebuilt from constraint columns';

export interface ConstraintConverterOptions {
  config?: Config;
  logger?: Logger;
}

export interface BlockConversion extends DecodeResult {
  /** Name of the item the instruction text was read from */
  instructionItem: string;
  /** Whether the instruction text was left in the block */
  retained: boolean;
}

function isNone(value: string | undefined): boolean {
  return value === undefined || value === NONE || value === '?' || value.trim() === '';
}

function sameLabels(expected: readonly string[], actual: readonly string[]): string | null {
  const wanted = new Set(expected);
  const present = new Set(actual);
  const missing = expected.find((label) => !present.has(label));
  if (missing !== undefined) {
    return `${missing} is missing from the table`;
  }
  const extra = actual.find((label) => !wanted.has(label));
  if (extra !== undefined) {
    return `${extra} is not in the refine instructions`;
  }
  return actual.length === present.size ? null : 'the table repeats a label';
}

/**
 * Converts between AFIX instruction text and constraint columns of a record table
 */
export class ConstraintConverter {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly reader = new InstructionReader();
  private readonly decoder: StreamDecoder;
  private readonly encoder: GraphEncoder;

  constructor(options: ConstraintConverterOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger ?? createLogger(this.config.logLevel);
    this.decoder = new StreamDecoder({ normalizeLabels: this.config.normalizeLabels });
    this.encoder = new GraphEncoder({ lineWidth: this.config.lineWidth });
  }

  /**
   * Decode instruction text. Without a lookup, scattering types come from its SFAC instructions.
   */
  decode(instructions: string | null | undefined, atomTypeLookup?: AtomTypeLookup): DecodeResult {
    if (instructions === null || instructions === undefined || instructions.trim() === '') {
      throw new MissingRefineInstructionsError();
    }
    const lines = this.reader.read(instructions);
    let lookup = atomTypeLookup;
    if (!lookup) {
      const types = scatteringTypes(lines);
      lookup = (typeIndex) => types[typeIndex - 1];
    }

    const result = this.decoder.decode(lines, lookup);
    this.logger.debug(
      { atoms: result.atoms.length, constraints: result.constraints.map((def) => def.id) },
      'decoded refine instructions'
    );
    return result;
  }

  encode(atoms: readonly AtomRecord[], constraints: readonly ConstraintDef[]): string {
    const text = this.encoder.encode(atoms, constraints).join('\n');
    this.logger.debug(
      { atoms: atoms.length, constraints: constraints.map((def) => def.id) },
      'encoded constraint records'
    );
    return text;
  }

  /**
   * Decode the refine instructions embedded in a block into its atom site
   * columns and the constraint catalogue table.
   */
  applyToBlock(block: RecordTable): BlockConversion {
    const found = this.instructionText(block);
    if (!found) {
      throw new MissingRefineInstructionsError(this.config.instructionItems);
    }
    const { name: instructionItem, text } = found;
    const result = this.decode(text);
    const byLabel = new Map(result.atoms.map((atom) => [atom.label, atom]));

    const labels = block.getColumn(ATOM_SITE_LABEL) ?? [];
    const labelProblem = sameLabels(Array.from(byLabel.keys()), labels);
    if (labelProblem) {
      throw new RecordCountMismatchError('_atom_site', byLabel.size, labels.length, labelProblem);
    }
    const rows = labels.flatMap((label) => byLabel.get(label) ?? []);

    this.writeAtomSite(block, rows);
    this.writeAniso(block, result.atoms);
    this.writeCatalogue(block, result.constraints);

    const scale = result.instructions.find((line) => line.keyword === 'FVAR')?.args[0];
    if (scale !== undefined) {
      block.setItem(this.config.columns.scaleFactor, scale);
    }

    const unsupported = Array.from(
      new Set(
        result.instructions
          .map((line) => line.keyword)
          .filter((keyword) => UNSUPPORTED_KEYWORDS.has(keyword))
      )
    );
    const retained = this.config.retainUnsupportedInstructions && unsupported.length > 0;
    if (retained) {
      this.logger.warn(
        { item: instructionItem, keywords: unsupported },
        'refine instructions kept: they use instructions without a column representation'
      );
    } else {
      block.deleteItem(instructionItem);
    }

    return { ...result, instructionItem, retained };
  }

  /**
   * Instruction text for a block. Text left in the block by applyToBlock is
   * returned as it is; otherwise the atom list is rebuilt from the columns.
   */
  blockToInstructions(block: RecordTable, scatteringTypeOrder?: readonly string[]): string {
    const retained = this.instructionText(block);
    if (retained) {
      this.logger.debug({ item: retained.name }, 'returning retained refine instructions');
      return retained.text;
    }

    const elements = (block.getColumn('_atom_site.type_symbol') ?? []).map(capitalizeElement);
    const types = scatteringTypeOrder
      ? scatteringTypeOrder.map(capitalizeElement)
      : deriveScatteringTypes(elements);
    const { atoms, constraints } = this.readRecords(block, elements, types);

    const lines = [GENERATED_TITLE, `SFAC ${types.join(' ')}`];
    const scale = block.getItem(this.config.columns.scaleFactor);
    if (scale !== undefined && !isNone(scale)) {
      lines.push(`FVAR ${scale}`);
    }
    lines.push(this.encode(atoms, constraints), 'HKLF 4', 'END');
    return lines.join('\n');
  }

  private instructionText(block: RecordTable): { name: string; text: string } | undefined {
    for (const name of this.config.instructionItems) {
      const text = block.getItem(name);
      if (text !== undefined && text.trim() !== '') {
        return { name, text };
      }
    }
    return undefined;
  }

  private writeAtomSite(block: RecordTable, rows: readonly AtomRecord[]): void {
    const { columns, multiplierDecimals } = this.config;
    const column = (pick: (atom: AtomRecord) => string) => rows.map(pick);

    block.setColumn('_atom_site.fract_x', column((atom) => formatNumber(atom.fractionalCoordinates[0])));
    block.setColumn('_atom_site.fract_y', column((atom) => formatNumber(atom.fractionalCoordinates[1])));
    block.setColumn('_atom_site.fract_z', column((atom) => formatNumber(atom.fractionalCoordinates[2])));

    const previousUiso = block.getColumn('_atom_site.u_iso_or_equiv');
    block.setColumn(
      '_atom_site.u_iso_or_equiv',
      rows.map((atom, idx) =>
        atom.displacement.kind === 'isotropic'
          ? formatNumber(atom.displacement.uIso)
          : previousUiso?.[idx] ?? '?'
      )
    );

    block.setColumn(columns.attachedAtom, column((atom) => atom.attachedTo ?? NONE));
    block.setColumn(columns.constraintId, column((atom) => atom.constraint?.id ?? NONE));
    block.setColumn(
      columns.positionIndex,
      column((atom) => (atom.constraint ? String(atom.constraint.positionIndex) : NONE))
    );
    block.setColumn(
      columns.uisoMultiplier,
      column((atom) =>
        atom.displacement.kind === 'multiplier'
          ? atom.displacement.factor.toFixed(multiplierDecimals)
          : NONE
      )
    );
  }

  private writeAniso(block: RecordTable, atoms: readonly AtomRecord[]): void {
    const anisotropic = new Map<string, readonly number[]>();
    for (const atom of atoms) {
      if (atom.displacement.kind === 'anisotropic') {
        anisotropic.set(atom.label, atom.displacement.uij);
      }
    }
    const labels = block.getColumn(ANISO_LABEL);
    if (!labels && anisotropic.size === 0) {
      return;
    }

    const present = labels ?? [];
    const problem = sameLabels(Array.from(anisotropic.keys()), present);
    if (problem) {
      throw new RecordCountMismatchError('_atom_site_aniso', anisotropic.size, present.length, problem);
    }
    ANISO_COLUMNS.forEach((name, component) => {
      block.setColumn(
        name,
        present.map((label) => formatNumber(anisotropic.get(label)?.[component] ?? Number.NaN))
      );
    });
  }

  private writeCatalogue(block: RecordTable, constraints: readonly ConstraintDef[]): void {
    const { columns } = this.config;
    block.setColumn(columns.catalogueId, constraints.map((def) => def.id));
    block.setColumn(columns.catalogueRefinedPars, constraints.map((def) => def.dofPolicy));
    block.setColumn(columns.catalogueInstruction, constraints.map((def) => def.shapeDescription));
  }

  private readRecords(
    block: RecordTable,
    elements: readonly string[],
    types: readonly string[]
  ): { atoms: AtomRecord[]; constraints: ConstraintDef[] } {
    const { columns } = this.config;
    const labels = block.getColumn(ATOM_SITE_LABEL) ?? [];
    const column = (name: string, required: boolean): (string | undefined)[] => {
      const values = block.getColumn(name);
      if (!values) {
        if (required && labels.length > 0) {
          throw new RecordCountMismatchError('_atom_site', labels.length, 0, `${name} is missing`);
        }
        return labels.map(() => undefined);
      }
      return values;
    };

    const fract = ['_atom_site.fract_x', '_atom_site.fract_y', '_atom_site.fract_z'].map((name) =>
      column(name, true)
    );
    const occupancy = column('_atom_site.occupancy', false);
    const uIso = column('_atom_site.u_iso_or_equiv', false);
    const attached = column(columns.attachedAtom, false);
    const ids = column(columns.constraintId, false);
    const positions = column(columns.positionIndex, false);
    const multipliers = column(columns.uisoMultiplier, false);

    const anisoLabels = block.getColumn(ANISO_LABEL) ?? [];
    const anisoValues = ANISO_COLUMNS.map((name) => block.getColumn(name) ?? []);

    const constraints = new Map<string, ConstraintDef>();
    const atoms = labels.map((label, idx): AtomRecord => {
      const element = elements[idx];
      if (element === undefined) {
        throw new RecordCountMismatchError(
          '_atom_site',
          labels.length,
          elements.length,
          '_atom_site.type_symbol is missing'
        );
      }
      const coordinates = fract.map((values) => {
        const value = parseCifNumber(values[idx]);
        if (!Number.isFinite(value)) {
          throw new Error(`Invalid CIF format: ${label} has no numeric fractional coordinates`);
        }
        return value;
      });

      const occ = parseCifNumber(occupancy[idx]);
      const anisoIdx = anisoLabels.indexOf(label);
      let displacement: Displacement;
      const multiplier = multipliers[idx];
      if (multiplier !== undefined && !isNone(multiplier)) {
        const factor = parseCifNumber(multiplier);
        if (!Number.isFinite(factor) || factor <= 0) {
          throw new UnrepresentableGraphError(label, `Uiso multiplier ${multiplier} is not a positive number`);
        }
        displacement = { kind: 'multiplier', factor };
      } else if (anisoIdx >= 0) {
        const uij = anisoValues.map((values) => parseCifNumber(values[anisoIdx]));
        const bad = uij.findIndex((value) => !Number.isFinite(value));
        if (bad >= 0) {
          throw new UnrepresentableGraphError(
            label,
            `${ANISO_COLUMNS[bad]} value ${anisoValues[bad][anisoIdx] ?? '(missing)'} is not numeric`
          );
        }
        const [u11, u22, u33, u23, u13, u12] = uij;
        displacement = { kind: 'anisotropic', uij: [u11, u22, u33, u23, u13, u12] };
      } else {
        const value = parseCifNumber(uIso[idx]);
        displacement = { kind: 'isotropic', uIso: Number.isFinite(value) ? value : DEFAULT_UISO };
      }

      const id = ids[idx];
      let constraint: AtomRecord['constraint'] = null;
      if (id !== undefined && !isNone(id)) {
        if (!constraints.has(id)) {
          const codes = parseConstraintId(id);
          if (!codes) {
            throw new UnrepresentableGraphError(label, `constraint ${id} has no AFIX equivalent`);
          }
          constraints.set(id, { ...createConstraintDef(codes.shapeCode, codes.dofCode), id });
        }
        constraint = { id, positionIndex: Number.parseInt(positions[idx] ?? '', 10) };
      }

      const attachedTo = attached[idx];
      return {
        label,
        element,
        typeIndex: types.indexOf(element) + 1,
        fractionalCoordinates: [coordinates[0], coordinates[1], coordinates[2]],
        // fixed occupancies are written as 10 + value
        occupancy: Number.isFinite(occ) ? 10 + occ : DEFAULT_OCCUPANCY,
        displacement,
        attachedTo: attachedTo === undefined || isNone(attachedTo) ? null : attachedTo,
        constraint,
      };
    });

    const unknownType = atoms.find((atom) => atom.typeIndex === 0);
    if (unknownType) {
      throw new UnrepresentableGraphError(
        unknownType.label,
        `element ${unknownType.element} is not among the scattering types ${types.join(' ')}`
      );
    }
    return { atoms, constraints: Array.from(constraints.values()) };
  }
}

/**
 * Carbon and hydrogen first, then the other elements in order of appearance
 */
export function deriveScatteringTypes(elements: readonly string[]): string[] {
  const present = new Set(elements.map(capitalizeElement));
  const ordered = ['C', 'H'].filter((symbol) => present.has(symbol));
  for (const symbol of present) {
    if (!ordered.includes(symbol)) {
      ordered.push(symbol);
    }
  }
  return ordered;
}
