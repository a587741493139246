import { type DofPolicy, type ShapeCategory, dofPolicy, shapeCategory, shapeDescription } from '../utils/directiveCodes';

export const CONSTRAINT_ID_PREFIX = 'SXL';

/**
 * A distinct (shape, dof) pair used by at least one atom
 */
export interface ConstraintDef {
  readonly id: string;
  readonly shapeCode: number;
  readonly dofCode: number;
  readonly shapeDescription: string;
  readonly dofPolicy: DofPolicy;
}

export function constraintIdFor(shapeCode: number, dofCode: number): string {
  return `${CONSTRAINT_ID_PREFIX}${shapeCode}${dofCode}`;
}

/**
 * Recover the AFIX m and n from a synthetic constraint id, or null if the
 * id was not produced by this codec.
 */
export function parseConstraintId(id: string): { shapeCode: number; dofCode: number } | null {
  const match = id.trim().match(/^SXL(\d{1,3})$/i);
  if (!match) {
    return null;
  }
  const code = Number.parseInt(match[1], 10);
  return { shapeCode: Math.floor(code / 10), dofCode: code % 10 };
}

/**
 * Look both codes up in the directive table; throws for codes it does not know.
 */
export function createConstraintDef(shapeCode: number, dofCode: number): ConstraintDef {
  return {
    id: constraintIdFor(shapeCode, dofCode),
    shapeCode,
    dofCode,
    shapeDescription: shapeDescription(shapeCode),
    dofPolicy: dofPolicy(dofCode),
  };
}

export function categoryOf(def: Pick<ConstraintDef, 'shapeCode' | 'dofCode'>): ShapeCategory {
  return shapeCategory(def.shapeCode, def.dofCode);
}

/**
 * De-duplicated constraint definitions in order of first use
 */
export class ConstraintCatalogue {
  private readonly byId = new Map<string, ConstraintDef>();

  register(shapeCode: number, dofCode: number): ConstraintDef {
    const id = constraintIdFor(shapeCode, dofCode);
    const existing = this.byId.get(id);
    if (existing) {
      return existing;
    }
    const def = createConstraintDef(shapeCode, dofCode);
    this.byId.set(id, def);
    return def;
  }

  get(id: string): ConstraintDef | undefined {
    return this.byId.get(id);
  }

  toArray(): ConstraintDef[] {
    return Array.from(this.byId.values());
  }
}
