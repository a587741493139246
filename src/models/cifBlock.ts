import { RecordCountMismatchError } from '../errors';

/**
 * An ordered table of named values and named columns. The converter only
 * talks to the record store through this interface.
 */
export interface RecordTable {
  getItem(name: string): string | undefined;
  setItem(name: string, value: string): void;
  deleteItem(name: string): boolean;
  getColumn(name: string): string[] | undefined;
  setColumn(name: string, values: readonly string[]): void;
}

/**
 * Category of a data name: everything before the last dot, or the name itself
 * for names without one.
 */
export function dataNameCategory(name: string): string {
  const lowered = name.toLowerCase();
  const idx = lowered.lastIndexOf('.');
  return idx > 0 ? lowered.slice(0, idx) : lowered;
}

/**
 * A loop_ table; all columns have the same number of rows
 */
export class CifLoop {
  private readonly columns = new Map<string, { name: string; values: string[] }>();
  private rows: number | null = null;

  constructor(columns: Array<[string, readonly string[]]> = []) {
    for (const [name, values] of columns) {
      this.setColumn(name, values);
    }
  }

  get category(): string {
    const first = this.columns.values().next();
    return first.done ? '' : dataNameCategory(first.value.name);
  }

  get rowCount(): number {
    return this.rows ?? 0;
  }

  get names(): string[] {
    return Array.from(this.columns.values(), (column) => column.name);
  }

  has(name: string): boolean {
    return this.columns.has(name.toLowerCase());
  }

  getColumn(name: string): string[] | undefined {
    const column = this.columns.get(name.toLowerCase());
    return column ? column.values.slice() : undefined;
  }

  setColumn(name: string, values: readonly string[]): void {
    if (this.rows !== null && values.length !== this.rows) {
      throw new RecordCountMismatchError(this.category || dataNameCategory(name), this.rows, values.length);
    }
    const key = name.toLowerCase();
    const existing = this.columns.get(key);
    this.columns.set(key, { name: existing ? existing.name : name, values: values.slice() });
    this.rows = values.length;
  }

  row(index: number): string[] {
    return Array.from(this.columns.values(), (column) => column.values[index]);
  }
}

/**
 * A single data_ block of a CIF file
 */
export class CifBlock implements RecordTable {
  name: string;
  private readonly items = new Map<string, { name: string; value: string }>();
  private readonly loopList: CifLoop[] = [];

  constructor(name: string = 'block') {
    this.name = name;
  }

  get loops(): readonly CifLoop[] {
    return this.loopList;
  }

  get itemNames(): string[] {
    return Array.from(this.items.values(), (item) => item.name);
  }

  getItem(name: string): string | undefined {
    return this.items.get(name.toLowerCase())?.value;
  }

  setItem(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.items.get(key);
    this.items.set(key, { name: existing ? existing.name : name, value });
  }

  deleteItem(name: string): boolean {
    return this.items.delete(name.toLowerCase());
  }

  addLoop(loop: CifLoop): void {
    this.loopList.push(loop);
  }

  findLoop(name: string): CifLoop | undefined {
    return this.loopList.find((loop) => loop.has(name));
  }

  getColumn(name: string): string[] | undefined {
    return this.findLoop(name)?.getColumn(name);
  }

  setColumn(name: string, values: readonly string[]): void {
    const target =
      this.findLoop(name) ?? this.loopList.find((loop) => loop.category === dataNameCategory(name));
    if (target) {
      target.setColumn(name, values);
      return;
    }
    this.addLoop(new CifLoop([[name, values]]));
  }
}
