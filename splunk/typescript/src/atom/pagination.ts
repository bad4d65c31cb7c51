/**
 * OpenSearch result window
 * @module splunk-client/atom/pagination
 */

export class Pagination {
  static readonly none = new Pagination(0, 0, 0);

  constructor(
    readonly itemsPerPage: number,
    readonly startIndex: number,
    readonly totalResults: number
  ) {
    Object.freeze(this);
  }

  /**
   * Copy with one field replaced
   */
  with(field: 'itemsPerPage' | 'startIndex' | 'totalResults', value: number): Pagination {
    return new Pagination(
      field === 'itemsPerPage' ? value : this.itemsPerPage,
      field === 'startIndex' ? value : this.startIndex,
      field === 'totalResults' ? value : this.totalResults
    );
  }

  toString(): string {
    return `Pagination(itemsPerPage=${this.itemsPerPage}, startIndex=${this.startIndex}, totalResults=${this.totalResults})`;
  }
}
