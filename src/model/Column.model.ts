/**
 * Column of a markdown table.
 *
 * @template T - Row type rendered by the column
 */
export interface ColumnModel<T extends object> {
  /** Unique column identifier */
  key: string;
  /** Header text */
  label: string;
  /** Renders the cell of one row */
  format: (data: T, index: number) => string | Promise<string>;
  /** Hidden columns are left out of the table */
  isVisible: () => boolean | Promise<boolean>;
}
