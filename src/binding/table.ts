import { ShapeCheckError } from '../error.js';

/**
 * Symbol bindings for one check.
 *
 * Maps each symbol name to the first size seen for it. A binding is
 * never changed once made; a table lives for one call only.
 *
 * @example
 * ```ts
 * const table = new BindingTable({ B: 4 });
 * table.bind('D', 3);
 * table.toRecord();  // { B: 4, D: 3 }
 * ```
 */
export class BindingTable {
  private readonly _sizes = new Map<string, number>();

  /**
   * @param initial - Bindings known before the check; copied, not retained
   */
  constructor(initial?: Readonly<Record<string, number>>) {
    if (initial) {
      for (const [name, size] of Object.entries(initial)) {
        this.bind(name, size);
      }
    }
  }

  /** Number of bound symbols */
  get size(): number {
    return this._sizes.size;
  }

  has(name: string): boolean {
    return this._sizes.has(name);
  }

  /** Size bound to a symbol, or undefined if unbound */
  get(name: string): number | undefined {
    return this._sizes.get(name);
  }

  /**
   * Bind a symbol to a size.
   * Binding a symbol again to the same size is a no-op.
   *
   * @throws ShapeCheckError if the symbol is bound to a different size
   */
  bind(name: string, size: number): void {
    const bound = this._sizes.get(name);
    if (bound !== undefined && bound !== size) {
      throw new ShapeCheckError(`Symbol ${name} is already bound to ${bound}, cannot bind to ${size}`);
    }
    this._sizes.set(name, size);
  }

  entries(): IterableIterator<[string, number]> {
    return this._sizes.entries();
  }

  /** Copy the bindings into a plain object */
  toRecord(): Record<string, number> {
    return Object.fromEntries(this._sizes);
  }
}
