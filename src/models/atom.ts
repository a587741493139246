/**
 * Anisotropic displacement components in instruction order: U11 U22 U33 U23 U13 U12
 */
export type Uij = [number, number, number, number, number, number];

/**
 * How an atom's displacement is described. A multiplier means
 * Uiso = factor x Ueq of the atom it is attached to; instruction files
 * write it as the negated factor.
 */
export type Displacement =
  | { kind: 'isotropic'; uIso: number }
  | { kind: 'anisotropic'; uij: Uij }
  | { kind: 'multiplier'; factor: number };

export interface ConstraintMembership {
  id: string;
  /** 1-based position inside the constraint group's atom list */
  positionIndex: number;
}

/**
 * A single atom of the constraint graph
 */
export interface AtomRecord {
  readonly label: string;
  readonly element: string;
  /** 1-based scattering-type index */
  readonly typeIndex: number;
  readonly fractionalCoordinates: readonly [number, number, number];
  readonly occupancy: number;
  readonly displacement: Displacement;
  readonly attachedTo: string | null;
  readonly constraint: ConstraintMembership | null;
}

export const DEFAULT_OCCUPANCY = 11.0;
export const DEFAULT_UISO = 0.05;

const HYDROGEN_SYMBOLS = new Set(['H', 'D']);

export function isHydrogen(element: string): boolean {
  return HYDROGEN_SYMBOLS.has(element.trim().toUpperCase());
}

export function isoMultiplier(atom: AtomRecord): number | undefined {
  return atom.displacement.kind === 'multiplier' ? atom.displacement.factor : undefined;
}

/**
 * Rewrite the element prefix of a label in the element's own case (PT1 -> Pt1)
 */
export function normalizeLabel(label: string, element: string): string {
  if (element && label.toUpperCase().startsWith(element.toUpperCase())) {
    return element + label.slice(element.length);
  }
  return label;
}

/**
 * Canonical case of an element symbol (PT -> Pt)
 */
export function capitalizeElement(symbol: string): string {
  const trimmed = symbol.trim();
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}
