import { MalformedDirectiveError, UnsupportedDofCodeError, UnsupportedShapeCodeError } from '../errors';

/**
 * Geometric idealization selected by the AFIX shape code m
 */
const SHAPE_DESCRIPTIONS: ReadonlyMap<number, string> = new Map<number, string>([
  [0, 'Relative positioning of the atoms was kept fixed.'],
  [1, 'Idealized tertiary C-H with all equal X-C-H angles for all three substituents of C.'],
  [2, 'Idealized secondary CH2 with equal X-C-H and Y-C-H angles and H-C-H adapted to X-C-Y.'],
  [3, 'Idealized CH3 group with tetrahedral angles, staggered with respect to the shortest bond to the attached atom.'],
  [4, 'Aromatic C-H or amide N-H with hydrogen on the external bisector of the X-C-Y or X-N-Y angle.'],
  [5, 'Atoms are fitted to a regular pentagon.'],
  [6, 'Atoms are fitted to a regular hexagon.'],
  [7, 'Atoms are fitted to a regular hexagon.'],
  [8, 'Idealized OH group with tetrahedral X-O-H angle, choosing hydrogen position based on best hydrogen bonding.'],
  [9, 'Idealized terminal X=CH2 or X=NH2+ with hydrogens in the plane of the nearest substituent.'],
  [
    10,
    'Atoms are fitted to generate an idealised pentamethylcyclopentadienyl anion. ' +
    'Atoms with position index 1 to 5 form the cyclopentadienyl group while atoms ' +
    'with position index 6 to 10 are the methyl groups.',
  ],
  [
    11,
    'Atoms are fitted to generate an idealised naphthalene molecule. The position ' +
    'indices follow a symmetrical figure of eight starting with the alpha and then the beta carbon atoms.',
  ],
  [12, 'Idealized disordered methyl group with two positions rotated by 60 degrees.'],
  [13, 'Idealized CH3 group with tetrahedral angles. The atom position with position index 1 defines the torsion angle.'],
  [14, 'Idealized OH group with tetrahedral X-O-H angle. The atom position with position index 1 defines the torsion angle.'],
  [15, 'BH group with hydrogen placed along the negative sum vector of unit vectors of the other bonds to boron.'],
  [16, 'Acetylenic C-H with linear X-C-H.'],
]);

export type DofPolicy = '.' | 'R' | 'RD' | 'RO' | 'RT' | 'RDT' | 'RDO';

// R: rigid group, D: distances, O: orientation, T: torsion
const DOF_POLICIES: ReadonlyMap<number, DofPolicy> = new Map<number, DofPolicy>([
  [1, '.'],
  [3, 'R'],
  [4, 'RD'],
  [6, 'RO'],
  [7, 'RT'],
  [8, 'RDT'],
  [9, 'RDO'],
]);

export const MAX_DIRECTIVE_CODE = 169;

/** Shape codes that position a whole rigid body */
export const WHOLE_BODY_SHAPE_CODES: ReadonlySet<number> = new Set([5, 6, 7, 10, 11]);

/** Dof codes that keep a rigid body rigid; the same codes close the innermost open group */
export const WHOLE_BODY_DOF_CODES: ReadonlySet<number> = new Set([0, 1, 2, 5, 6, 9]);

export const CLOSING_DOF_CODES: ReadonlySet<number> = WHOLE_BODY_DOF_CODES;

export const CLOSE_DOF_CODE = 0;
export const CONTINUATION_DOF_CODE = 5;

/**
 * A group either positions an entire rigid body or places hydrogens on
 * the atom preceding the directive.
 */
export type ShapeCategory = 'wholeBody' | 'hydrogenOnly';

export interface DirectiveCode {
  m: number;
  n: number;
}

export function isSupportedShapeCode(m: number): boolean {
  return SHAPE_DESCRIPTIONS.has(m);
}

export function shapeDescription(m: number): string {
  const description = SHAPE_DESCRIPTIONS.get(m);
  if (description === undefined) {
    throw new UnsupportedShapeCodeError(m);
  }
  return description;
}

export function dofPolicy(n: number): DofPolicy {
  const policy = DOF_POLICIES.get(n);
  if (policy === undefined) {
    throw new UnsupportedDofCodeError(n);
  }
  return policy;
}

export function shapeCategory(m: number, n: number): ShapeCategory {
  return WHOLE_BODY_SHAPE_CODES.has(m) && WHOLE_BODY_DOF_CODES.has(n) ? 'wholeBody' : 'hydrogenOnly';
}

export function splitDirectiveCode(code: number, lineNumber?: number): DirectiveCode {
  if (!Number.isInteger(code) || code < 0 || code > MAX_DIRECTIVE_CODE) {
    throw new MalformedDirectiveError(`AFIX code ${code} is outside 0..${MAX_DIRECTIVE_CODE}`, lineNumber);
  }
  return { m: Math.floor(code / 10), n: code % 10 };
}

export function joinDirectiveCode(m: number, n: number): number {
  return m * 10 + n;
}
