/**
 * Pagination window applied to a query: rows to skip and maximum rows to return.
 */
export class RowBounds {
  static readonly NO_ROW_OFFSET = 0;
  static readonly NO_ROW_LIMIT = Number.MAX_SAFE_INTEGER;
  static readonly DEFAULT = new RowBounds();

  constructor(
    readonly offset: number = RowBounds.NO_ROW_OFFSET,
    readonly limit: number = RowBounds.NO_ROW_LIMIT
  ) {}

  get isDefault(): boolean {
    return this.offset === RowBounds.NO_ROW_OFFSET && this.limit === RowBounds.NO_ROW_LIMIT;
  }

  /**
   * Applies the window to an already fetched row list.
   */
  slice<T>(rows: readonly T[]): T[] {
    if (this.isDefault) {
      return [...rows];
    }
    return rows.slice(this.offset, this.offset + this.limit);
  }
}
