import { MalformedDirectiveError, UnsupportedShapeCodeError } from '../../errors';
import { isHydrogen } from '../../models/atom';
import {
  CLOSE_DOF_CODE,
  CLOSING_DOF_CODES,
  CONTINUATION_DOF_CODE,
  type ShapeCategory,
  isSupportedShapeCode,
  shapeCategory,
} from '../../utils/directiveCodes';

/**
 * An open AFIX group. shapeCode and dofCode are those of the constraint
 * definition the group assigns, which for a continuation is the resumed one.
 */
export interface DirectiveFrame {
  readonly shapeCode: number;
  readonly dofCode: number;
  readonly category: ShapeCategory;
  anchorLabel: string | null;
  memberCount: number;
}

export type Placement =
  | { constrained: false }
  | {
      constrained: true;
      attachedTo: string | null;
      shapeCode: number;
      dofCode: number;
      positionIndex: number;
    };

function openFrame(shapeCode: number, dofCode: number): DirectiveFrame {
  return {
    shapeCode,
    dofCode,
    category: shapeCategory(shapeCode, dofCode),
    anchorLabel: null,
    memberCount: 0,
  };
}

/**
 * The AFIX state machine shared by the decoder and the encoder's self-check.
 * One instance per stream; nothing here outlives a single decode or encode.
 */
export class DirectiveStack {
  private readonly frames: DirectiveFrame[] = [];
  private lastAtom: string | null = null;

  get depth(): number {
    return this.frames.length;
  }

  get lastAtomLabel(): string | null {
    return this.lastAtom;
  }

  peek(): Readonly<DirectiveFrame> | undefined {
    return this.frames[this.frames.length - 1];
  }

  /** Frame i levels below the top (0 is the top) */
  frameAt(level: number): Readonly<DirectiveFrame> | undefined {
    return this.frames[this.frames.length - 1 - level];
  }

  clone(): DirectiveStack {
    const copy = new DirectiveStack();
    for (const frame of this.frames) {
      copy.frames.push({ ...frame });
    }
    copy.lastAtom = this.lastAtom;
    return copy;
  }

  applyDirective(m: number, n: number): void {
    if (!isSupportedShapeCode(m)) {
      throw new UnsupportedShapeCodeError(m);
    }

    const popped = CLOSING_DOF_CODES.has(n) ? this.frames.pop() : undefined;
    if (n === CLOSE_DOF_CODE) {
      return;
    }

    if (n === CONTINUATION_DOF_CODE) {
      const top = this.peek();
      if (top && top.shapeCode === m) {
        // restart the enclosing group: same definition, new anchor
        this.frames[this.frames.length - 1] = openFrame(top.shapeCode, top.dofCode);
      } else if (popped && popped.shapeCode === m) {
        this.frames.push(openFrame(popped.shapeCode, popped.dofCode));
      } else {
        this.frames.push(openFrame(m, n));
      }
      return;
    }

    this.frames.push(openFrame(m, n));
  }

  placeAtom(label: string, element: string, lineNumber?: number): Placement {
    const top: DirectiveFrame | undefined = this.frames[this.frames.length - 1];
    if (!top) {
      this.lastAtom = label;
      return { constrained: false };
    }
    if (top.category === 'wholeBody' && isHydrogen(element)) {
      // rides on the rigid skeleton, not a pivot of the group
      return { constrained: false };
    }

    let attachedTo: string | null;
    if (top.memberCount === 0) {
      if (top.category === 'wholeBody') {
        top.anchorLabel = label;
        attachedTo = null;
      } else {
        if (this.lastAtom === null) {
          throw new MalformedDirectiveError(`no atom precedes ${label} to attach it to`, lineNumber);
        }
        top.anchorLabel = this.lastAtom;
        attachedTo = this.lastAtom;
      }
    } else {
      attachedTo = top.anchorLabel;
    }

    top.memberCount += 1;
    this.lastAtom = label;
    return {
      constrained: true,
      attachedTo,
      shapeCode: top.shapeCode,
      dofCode: top.dofCode,
      positionIndex: top.memberCount,
    };
  }
}
