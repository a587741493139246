import { MalformedDirectiveError } from '../../errors';
import { type AtomRecord, DEFAULT_OCCUPANCY, DEFAULT_UISO, type Displacement } from '../../models/atom';

/**
 * Fields of a single atom instruction:
 * LABEL TYPE_INDEX X Y Z [OCC [U_ISO | U11 U22 U33 U23 U13 U12]]
 */
export interface AtomLine {
  label: string;
  typeIndex: number;
  coordinates: [number, number, number];
  occupancy: number;
  displacement: Displacement;
}

export function parseAtomLine(tokens: readonly string[], lineNumber?: number): AtomLine {
  const label = tokens[0] ?? '';
  if (tokens.length < 5) {
    throw new MalformedDirectiveError(`atom ${label} is missing coordinate fields`, lineNumber);
  }
  if (!/^\d+$/.test(tokens[1])) {
    throw new MalformedDirectiveError(`atom ${label} has an invalid type index '${tokens[1]}'`, lineNumber);
  }

  const values = tokens.slice(2).map((token) => {
    const value = Number(token);
    if (token.trim() === '' || !Number.isFinite(value)) {
      throw new MalformedDirectiveError(`atom ${label} has a non-numeric field '${token}'`, lineNumber);
    }
    return value;
  });

  return {
    label,
    typeIndex: Number.parseInt(tokens[1], 10),
    coordinates: [values[0], values[1], values[2]],
    occupancy: values.length > 3 ? values[3] : DEFAULT_OCCUPANCY,
    displacement: parseDisplacement(values.slice(4), label, lineNumber),
  };
}

function parseDisplacement(values: number[], label: string, lineNumber?: number): Displacement {
  switch (values.length) {
    case 0:
      return { kind: 'isotropic', uIso: DEFAULT_UISO };
    case 1:
      return values[0] < 0
        ? { kind: 'multiplier', factor: -values[0] }
        : { kind: 'isotropic', uIso: values[0] };
    case 6:
      return {
        kind: 'anisotropic',
        uij: [values[0], values[1], values[2], values[3], values[4], values[5]],
      };
    default:
      throw new MalformedDirectiveError(
        `atom ${label} has ${values.length} displacement values, expected 1 or 6`,
        lineNumber
      );
  }
}

/**
 * Shortest text that reads back to the same number, with at least one decimal
 */
export function formatNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function atomLineFields(atom: AtomRecord): string[] {
  const [x, y, z] = atom.fractionalCoordinates;
  const fields = [
    atom.label,
    String(atom.typeIndex),
    formatNumber(x),
    formatNumber(y),
    formatNumber(z),
    formatNumber(atom.occupancy),
  ];

  const displacement = atom.displacement;
  switch (displacement.kind) {
    case 'multiplier':
      fields.push(formatNumber(-displacement.factor));
      break;
    case 'anisotropic':
      fields.push(...displacement.uij.map(formatNumber));
      break;
    case 'isotropic':
      fields.push(formatNumber(displacement.uIso));
      break;
  }
  return fields;
}

/**
 * Join fields with single spaces, breaking into ' =' continued lines no
 * longer than width. Continuation lines are indented by two spaces.
 */
export function wrapInstruction(fields: readonly string[], width: number): string[] {
  const lines: string[] = [];
  let current = fields[0] ?? '';
  for (let i = 1; i < fields.length; i++) {
    const candidate = `${current} ${fields[i]}`;
    const reserve = i < fields.length - 1 ? 2 : 0;
    if (candidate.length + reserve > width) {
      lines.push(`${current} =`);
      current = `  ${fields[i]}`;
    } else {
      current = candidate;
    }
  }
  lines.push(current);
  return lines;
}

export function formatAtomLine(atom: AtomRecord, width: number): string[] {
  return wrapInstruction(atomLineFields(atom), width);
}
