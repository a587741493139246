import keywords from '../../data/instructionKeywords.json';
import { MalformedDirectiveError } from '../../errors';
import { capitalizeElement } from '../../models/atom';
import { splitDirectiveCode } from '../../utils/directiveCodes';
import { type AtomLine, parseAtomLine } from './atomLine';

const KNOWN_KEYWORDS: ReadonlySet<string> = new Set(keywords.known);

/**
 * Instructions whose meaning has no place in the relational constraint
 * columns; their presence means the instruction text has to be kept.
 */
export const UNSUPPORTED_KEYWORDS: ReadonlySet<string> = new Set(keywords.unsupported);

const STOP_KEYWORDS = new Set(['HKLF', 'END']);

interface LineSource {
  lineNumber: number;
  text: string;
}

export type DirectiveLine = LineSource & { kind: 'directive'; code: number; m: number; n: number };
export type AtomInstructionLine = LineSource & { kind: 'atom'; atom: AtomLine };
export type OpaqueInstructionLine = LineSource & { kind: 'instruction'; keyword: string; args: string[] };

export type IslLine = DirectiveLine | AtomInstructionLine | OpaqueInstructionLine;

/**
 * Instruction keyword of the first token of a line, or null for atom lines.
 * Only the first four characters are significant (HKLF4, SAME_A).
 */
export function instructionKeyword(token: string): string | null {
  const upper = token.toUpperCase();
  if (KNOWN_KEYWORDS.has(upper)) {
    return upper;
  }
  const head = upper.slice(0, 4);
  return head.length === 4 && KNOWN_KEYWORDS.has(head) ? head : null;
}

/**
 * Splits instruction file text into directive, atom and opaque instruction lines
 */
export class InstructionReader {
  read(content: string): IslLine[] {
    const physical = content.split(/\r?\n/);
    const lines: IslLine[] = [];

    let i = 0;
    while (i < physical.length) {
      const lineNumber = i + 1;
      const chunks = [physical[i]];
      i++;
      while (this.continues(chunks[chunks.length - 1]) && i < physical.length) {
        chunks.push(physical[i]);
        i++;
      }

      const logical = this.joinContinuations(chunks);
      if (!logical) {
        continue;
      }
      const tokens = logical.split(/\s+/);
      const keyword = instructionKeyword(tokens[0]);

      if (keyword === 'TITL') {
        while (i < physical.length && /^\s+\S/.test(physical[i])) {
          chunks.push(physical[i]);
          i++;
        }
      }

      const text = chunks.join('\n');
      if (keyword === 'AFIX') {
        lines.push(this.parseDirective(tokens, lineNumber, text));
      } else if (keyword) {
        lines.push({ kind: 'instruction', keyword, args: tokens.slice(1), lineNumber, text });
        if (STOP_KEYWORDS.has(keyword)) {
          break;
        }
      } else {
        lines.push({ kind: 'atom', atom: parseAtomLine(tokens, lineNumber), lineNumber, text });
      }
    }

    return lines;
  }

  private continues(line: string): boolean {
    return line.trimEnd().endsWith('=');
  }

  private joinContinuations(chunks: string[]): string {
    return chunks
      .map((chunk, idx) => {
        const trimmed = chunk.trim();
        return idx < chunks.length - 1 ? trimmed.slice(0, -1).trim() : trimmed;
      })
      .join(' ')
      .trim();
  }

  private parseDirective(tokens: string[], lineNumber: number, text: string): DirectiveLine {
    const raw = tokens[1];
    if (raw === undefined || !/^[+-]?\d+$/.test(raw)) {
      throw new MalformedDirectiveError(`AFIX without a numeric code: '${text.trim()}'`, lineNumber);
    }
    const code = Number.parseInt(raw, 10);
    const { m, n } = splitDirectiveCode(code, lineNumber);
    return { kind: 'directive', code, m, n, lineNumber, text };
  }
}

/**
 * Element symbols of the SFAC instructions in scattering-type order. The long
 * form (a symbol followed by its scattering factor coefficients) names one
 * element per instruction.
 */
export function scatteringTypes(lines: readonly IslLine[]): string[] {
  const symbols: string[] = [];
  for (const line of lines) {
    if (line.kind !== 'instruction' || line.keyword !== 'SFAC') {
      continue;
    }
    const [first, second] = line.args;
    if (second !== undefined && Number.isFinite(Number(second))) {
      symbols.push(capitalizeElement(first));
    } else {
      symbols.push(...line.args.map(capitalizeElement));
    }
  }
  return symbols;
}
