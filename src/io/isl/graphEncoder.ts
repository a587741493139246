import { AttachmentCycleError, UnrepresentableGraphError } from '../../errors';
import type { AtomRecord } from '../../models/atom';
import { type ConstraintDef, categoryOf, createConstraintDef } from '../../models/constraint';
import {
  CLOSE_DOF_CODE,
  CLOSING_DOF_CODES,
  CONTINUATION_DOF_CODE,
  joinDirectiveCode,
} from '../../utils/directiveCodes';
import { formatAtomLine } from './atomLine';
import { DirectiveStack, type DirectiveFrame, type Placement } from './directiveStack';

export const DEFAULT_LINE_WIDTH = 80;

export interface GraphEncoderOptions {
  lineWidth?: number;
}

/**
 * Writes constraint records back out as a nested AFIX instruction stream
 */
export class GraphEncoder {
  private readonly lineWidth: number;

  constructor(options: GraphEncoderOptions = {}) {
    this.lineWidth = options.lineWidth ?? DEFAULT_LINE_WIDTH;
  }

  encode(atoms: readonly AtomRecord[], constraints: readonly ConstraintDef[]): string[] {
    const defs = this.checkCatalogue(constraints);
    const byLabel = this.indexAtoms(atoms, defs);
    this.checkCatalogueUse(atoms, defs);
    this.checkForest(atoms, byLabel);

    const children = new Map<string, AtomRecord[]>();
    for (const atom of atoms) {
      if (atom.attachedTo === null) {
        continue;
      }
      const siblings = children.get(atom.attachedTo) ?? [];
      siblings.push(atom);
      children.set(atom.attachedTo, siblings);
    }

    const run = new EncodingRun(defs, children, this.lineWidth);
    for (const atom of atoms) {
      if (atom.attachedTo === null) {
        run.emitSubtree(atom);
      }
    }
    return run.finish();
  }

  /**
   * Every definition must still be known to the directive table and carry
   * the id its directive is read back as
   */
  private checkCatalogue(constraints: readonly ConstraintDef[]): Map<string, ConstraintDef> {
    const defs = new Map<string, ConstraintDef>();
    for (const def of constraints) {
      const { id } = createConstraintDef(def.shapeCode, def.dofCode);
      if (def.id !== id) {
        throw new UnrepresentableGraphError(def.id, `would be read back as ${id}`, 'constraint');
      }
      defs.set(def.id, def);
    }
    return defs;
  }

  private checkCatalogueUse(atoms: readonly AtomRecord[], defs: ReadonlyMap<string, ConstraintDef>): void {
    const used = new Set(atoms.map((atom) => atom.constraint?.id));
    for (const id of defs.keys()) {
      if (!used.has(id)) {
        throw new UnrepresentableGraphError(id, 'no atom uses it', 'constraint');
      }
    }
  }

  private indexAtoms(
    atoms: readonly AtomRecord[],
    defs: ReadonlyMap<string, ConstraintDef>
  ): Map<string, AtomRecord> {
    const byLabel = new Map<string, AtomRecord>();
    for (const atom of atoms) {
      if (byLabel.has(atom.label)) {
        throw new UnrepresentableGraphError(atom.label, 'duplicate label');
      }
      byLabel.set(atom.label, atom);
    }

    for (const atom of atoms) {
      if (atom.attachedTo !== null && !byLabel.has(atom.attachedTo)) {
        throw new UnrepresentableGraphError(atom.label, `attached to unknown atom ${atom.attachedTo}`);
      }
      if (atom.constraint === null) {
        if (atom.attachedTo !== null) {
          throw new UnrepresentableGraphError(atom.label, 'attached to an atom without a constraint');
        }
        continue;
      }
      if (!defs.has(atom.constraint.id)) {
        throw new UnrepresentableGraphError(atom.label, `unknown constraint ${atom.constraint.id}`);
      }
      const { positionIndex } = atom.constraint;
      if (!Number.isInteger(positionIndex) || positionIndex < 1) {
        throw new UnrepresentableGraphError(atom.label, `invalid position index ${positionIndex}`);
      }
    }
    return byLabel;
  }

  private checkForest(atoms: readonly AtomRecord[], byLabel: ReadonlyMap<string, AtomRecord>): void {
    const acyclic = new Set<string>();
    for (const atom of atoms) {
      const path = [atom.label];
      const onPath = new Set(path);
      let next = atom.attachedTo;
      while (next !== null && !acyclic.has(next)) {
        if (onPath.has(next)) {
          throw new AttachmentCycleError([...path.slice(path.indexOf(next)), next]);
        }
        path.push(next);
        onPath.add(next);
        next = byLabel.get(next)?.attachedTo ?? null;
      }
      for (const label of path) {
        acyclic.add(label);
      }
    }
  }
}

/**
 * State of a single encode call: the emitted lines and the directive stack a
 * reader of those lines would hold.
 */
class EncodingRun {
  private readonly lines: string[] = [];
  private readonly stack = new DirectiveStack();

  constructor(
    private readonly defs: ReadonlyMap<string, ConstraintDef>,
    private readonly children: ReadonlyMap<string, readonly AtomRecord[]>,
    private readonly lineWidth: number
  ) {}

  emitSubtree(atom: AtomRecord): void {
    this.prepare(atom);
    this.write(atom);

    const kids = this.children.get(atom.label) ?? [];
    const def = atom.constraint ? this.defFor(atom) : undefined;
    const isAnchor = def !== undefined && categoryOf(def) === 'wholeBody' && atom.attachedTo === null;
    const members = isAnchor ? kids.filter((kid) => kid.constraint?.id === def.id) : [];

    // hydrogen groups ride on this atom, so they go before the rest of its own group
    const groups = new Map<string, AtomRecord[]>();
    for (const kid of kids) {
      if (members.includes(kid)) {
        continue;
      }
      const key = kid.constraint?.id ?? '';
      const group = groups.get(key) ?? [];
      group.push(kid);
      groups.set(key, group);
    }
    for (const group of groups.values()) {
      for (const kid of byPosition(group)) {
        this.emitSubtree(kid);
      }
    }
    for (const member of byPosition(members)) {
      this.emitSubtree(member);
    }
  }

  finish(): string[] {
    this.closeAll();
    return this.lines;
  }

  private prepare(atom: AtomRecord): void {
    if (atom.constraint === null) {
      this.closeAll();
      return;
    }

    const def = this.defFor(atom);
    const { positionIndex } = atom.constraint;
    const category = categoryOf(def);

    if (category === 'wholeBody' && atom.attachedTo === null) {
      if (positionIndex !== 1) {
        throw new UnrepresentableGraphError(
          atom.label,
          `anchor of ${def.id} has position index ${positionIndex} instead of 1`
        );
      }
      this.openGroup(def);
    } else if (category === 'hydrogenOnly' && positionIndex === 1) {
      if (this.stack.lastAtomLabel !== atom.attachedTo) {
        throw new UnrepresentableGraphError(
          atom.label,
          `${def.id} group must directly follow ${atom.attachedTo ?? 'an atom'}`
        );
      }
      this.directive(def.shapeCode, def.dofCode);
    } else {
      this.resumeGroup(atom, def, positionIndex - 1);
    }
  }

  private openGroup(def: ConstraintDef): void {
    if (this.stack.depth >= 2) {
      const trial = this.stack.clone();
      trial.applyDirective(def.shapeCode, CONTINUATION_DOF_CODE);
      if (isFreshFrame(trial.peek(), def)) {
        this.directive(def.shapeCode, CONTINUATION_DOF_CODE);
        return;
      }
    }

    const keep = CLOSING_DOF_CODES.has(def.dofCode) ? 1 : 0;
    while (this.stack.depth > keep) {
      this.directive(0, CLOSE_DOF_CODE);
    }
    this.directive(def.shapeCode, def.dofCode);
  }

  private resumeGroup(atom: AtomRecord, def: ConstraintDef, memberCount: number): void {
    for (let level = 0; level < this.stack.depth; level++) {
      const frame = this.stack.frameAt(level);
      if (
        frame &&
        frame.shapeCode === def.shapeCode &&
        frame.dofCode === def.dofCode &&
        frame.anchorLabel === atom.attachedTo &&
        frame.memberCount === memberCount
      ) {
        for (let i = 0; i < level; i++) {
          this.directive(0, CLOSE_DOF_CODE);
        }
        return;
      }
    }
    throw new UnrepresentableGraphError(
      atom.label,
      `no open ${def.id} group on ${atom.attachedTo ?? '.'} with ${memberCount} atoms to continue`
    );
  }

  private closeAll(): void {
    while (this.stack.depth > 0) {
      this.directive(0, CLOSE_DOF_CODE);
    }
  }

  private directive(m: number, n: number): void {
    this.lines.push(`AFIX ${joinDirectiveCode(m, n)}`);
    this.stack.applyDirective(m, n);
  }

  /**
   * Emit the atom line and check a reader would place it where the record says
   */
  private write(atom: AtomRecord): void {
    this.lines.push(...formatAtomLine(atom, this.lineWidth));
    const placement = this.stack.placeAtom(atom.label, atom.element);

    if (!placement.constrained) {
      if (atom.constraint !== null) {
        throw new UnrepresentableGraphError(atom.label, 'would be read back without a constraint');
      }
      return;
    }
    if (atom.constraint === null) {
      throw new UnrepresentableGraphError(atom.label, `would be read back as ${describe(placement)}`);
    }
    const def = this.defFor(atom);
    if (
      placement.shapeCode !== def.shapeCode ||
      placement.dofCode !== def.dofCode ||
      placement.positionIndex !== atom.constraint.positionIndex ||
      placement.attachedTo !== atom.attachedTo
    ) {
      throw new UnrepresentableGraphError(atom.label, `would be read back as ${describe(placement)}`);
    }
  }

  private defFor(atom: AtomRecord): ConstraintDef {
    const id = atom.constraint?.id;
    const def = id === undefined ? undefined : this.defs.get(id);
    if (!def) {
      throw new UnrepresentableGraphError(atom.label, `unknown constraint ${id ?? '.'}`);
    }
    return def;
  }
}

function byPosition(atoms: readonly AtomRecord[]): AtomRecord[] {
  return atoms
    .slice()
    .sort((a, b) => (a.constraint?.positionIndex ?? 0) - (b.constraint?.positionIndex ?? 0));
}

function isFreshFrame(frame: Readonly<DirectiveFrame> | undefined, def: ConstraintDef): boolean {
  return (
    frame !== undefined &&
    frame.memberCount === 0 &&
    frame.shapeCode === def.shapeCode &&
    frame.dofCode === def.dofCode
  );
}

function describe(placement: Placement): string {
  if (!placement.constrained) {
    return 'unconstrained';
  }
  const code = joinDirectiveCode(placement.shapeCode, placement.dofCode);
  return `AFIX ${code} position ${placement.positionIndex} on ${placement.attachedTo ?? '.'}`;
}
