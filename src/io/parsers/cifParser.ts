import { CifBlock, CifLoop } from '../../models/cifBlock';

const RESERVED_WORD = /^(data_|loop_|save_|global_|stop_)/i;

/**
 * Number held by a CIF value, ignoring a standard uncertainty such as 0.1234(5).
 * Returns NaN for '.', '?' and anything non-numeric.
 */
export function parseCifNumber(value: string | undefined): number {
  const raw = (value || '').trim();
  if (!raw || raw === '.' || raw === '?') {
    return Number.NaN;
  }
  const cleaned = raw.replace(/^['"]|['"]$/g, '');
  const uncertaintyMatch = cleaned.match(
    /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\(\d+\)$/
  );
  const numberPart = uncertaintyMatch ? cleaned.split('(')[0] : cleaned;
  return numberPart.length > 0 ? Number(numberPart) : Number.NaN;
}

/**
 * CIF file format parser (first data block only)
 * Crystallographic Information File
 */
export class CIFParser {
  parse(content: string): CifBlock {
    const lines = content.split(/\r?\n/);
    let block: CifBlock | null = null;

    for (let i = 0; i < lines.length; i++) {
      const raw = lines[i].trim();
      if (!raw || raw.startsWith('#')) {
        continue;
      }
      const lower = raw.toLowerCase();
      if (lower.startsWith('data_')) {
        if (block) {
          break;
        }
        block = new CifBlock(this.stripInlineComment(raw).slice(5));
        continue;
      }
      if (!block) {
        throw new Error(`Invalid CIF format: line ${i + 1} precedes the first data_ block`);
      }

      if (lower === 'loop_' || lower.startsWith('loop_ ')) {
        i = this.parseLoop(lines, i + 1, block) - 1;
      } else if (raw.startsWith('_')) {
        i = this.parseItem(lines, i, block);
      } else {
        throw new Error(`Invalid CIF format: unexpected value '${raw}' on line ${i + 1}`);
      }
    }

    if (!block) {
      throw new Error('Invalid CIF format: no data_ block found');
    }
    return block;
  }

  serialize(block: CifBlock): string {
    const lines: string[] = [];
    lines.push(`data_${block.name}`);
    lines.push('');

    const names = block.itemNames;
    const width = Math.max(0, ...names.map((name) => name.length));
    for (const name of names) {
      const value = block.getItem(name) ?? '?';
      if (this.needsTextField(value)) {
        lines.push(name);
        lines.push(';', ...value.split('\n'), ';');
      } else {
        lines.push(`${name.padEnd(width)} ${this.formatValue(value)}`);
      }
    }

    for (const loop of block.loops) {
      lines.push('');
      lines.push('loop_');
      for (const name of loop.names) {
        lines.push(` ${name}`);
      }
      for (let r = 0; r < loop.rowCount; r++) {
        let current: string[] = [];
        for (const value of loop.row(r)) {
          if (this.needsTextField(value)) {
            if (current.length > 0) {
              lines.push(current.join(' '));
              current = [];
            }
            lines.push(';', ...value.split('\n'), ';');
          } else {
            current.push(this.formatValue(value));
          }
        }
        if (current.length > 0) {
          lines.push(current.join(' '));
        }
      }
    }

    lines.push('');
    return lines.join('\n');
  }

  /**
   * Returns the index of the last line the item consumed
   */
  private parseItem(lines: string[], index: number, block: CifBlock): number {
    const tokens = this.tokenize(this.stripInlineComment(lines[index].trim()));
    const name = tokens[0];
    if (tokens.length >= 2) {
      block.setItem(name, tokens[1]);
      return index;
    }

    for (let j = index + 1; j < lines.length; j++) {
      const raw = lines[j].trim();
      if (!raw || raw.startsWith('#')) {
        continue;
      }
      if (lines[j].startsWith(';')) {
        const field = this.parseMultilineValue(lines, j);
        block.setItem(name, field.value);
        return field.endIndex;
      }
      const next = this.tokenize(this.stripInlineComment(raw));
      if (raw.startsWith('_') || next.length === 0) {
        break;
      }
      block.setItem(name, next[0]);
      return j;
    }
    throw new Error(`Invalid CIF format: ${name} on line ${index + 1} has no value`);
  }

  /**
   * Returns the index of the first line after the loop
   */
  private parseLoop(lines: string[], startIndex: number, block: CifBlock): number {
    const headers: string[] = [];
    let j = startIndex;
    while (j < lines.length) {
      const header = lines[j].trim();
      if (!header || header.startsWith('#')) {
        j++;
        continue;
      }
      if (!header.startsWith('_')) {
        break;
      }
      headers.push(this.stripInlineComment(header).split(/\s+/, 1)[0]);
      j++;
    }

    if (headers.length === 0) {
      throw new Error(`Invalid CIF format: loop_ on line ${startIndex} has no data names`);
    }

    const { rows, nextIndex } = this.parseLoopRows(lines, j, headers.length, headers[0]);
    block.addLoop(
      new CifLoop(headers.map((header, idx) => [header, rows.map((row) => row[idx])]))
    );
    return nextIndex;
  }

  private parseLoopRows(
    lines: string[],
    startIndex: number,
    nColumns: number,
    firstHeader: string
  ): {
    rows: string[][];
    nextIndex: number;
  } {
    const rows: string[][] = [];
    let buffer: string[] = [];
    let i = startIndex;

    for (; i < lines.length; i++) {
      const raw = lines[i].trim();
      const lower = raw.toLowerCase();
      if (raw.startsWith('_') || lower.startsWith('loop_') || lower.startsWith('data_')) {
        break;
      }
      if (raw.length === 0 || raw.startsWith('#')) {
        continue;
      }

      let tokens: string[];
      if (lines[i].startsWith(';')) {
        const field = this.parseMultilineValue(lines, i);
        tokens = [field.value];
        i = field.endIndex;
      } else {
        tokens = this.tokenize(this.stripInlineComment(raw));
      }

      buffer.push(...tokens);
      while (buffer.length >= nColumns) {
        rows.push(buffer.slice(0, nColumns));
        buffer = buffer.slice(nColumns);
      }
    }

    if (buffer.length > 0) {
      throw new Error(
        `Invalid CIF format: loop starting with ${firstHeader} has ${buffer.length} values left over for ${nColumns} columns`
      );
    }
    return { rows, nextIndex: i };
  }

  private stripInlineComment(line: string): string {
    const idx = line.indexOf(' #');
    return idx >= 0 ? line.slice(0, idx).trim() : line;
  }

  private tokenize(line: string): string[] {
    if (!line) {
      return [];
    }
    return (line.match(/(?:'[^']*'|"[^"]*"|\S+)/g) || []).map((token) =>
      token.replace(/^(['"])([\s\S]*)\1$/, '$2')
    );
  }

  /**
   * A ;-delimited text field. Lines are kept as written, indentation included.
   */
  private parseMultilineValue(lines: string[], index: number): { value: string; endIndex: number } {
    const first = lines[index].slice(1);
    const chunks: string[] = first.trim() ? [first] : [];
    for (let i = index + 1; i < lines.length; i++) {
      const line = lines[i];
      if (line.startsWith(';')) {
        return { value: chunks.join('\n'), endIndex: i };
      }
      chunks.push(line);
    }
    throw new Error(`Invalid CIF format: text field starting on line ${index + 1} is not terminated`);
  }

  private needsTextField(value: string): boolean {
    return value.includes('\n') || (value.includes("'") && value.includes('"'));
  }

  private formatValue(value: string): string {
    if (value === '') {
      return "''";
    }
    const needsQuotes =
      /\s/.test(value) || /^[_#$'"[\];]/.test(value) || RESERVED_WORD.test(value);
    if (!needsQuotes) {
      return value;
    }
    return value.includes("'") ? `"${value}"` : `'${value}'`;
  }
}
