import type { IHaveDebugStr } from '../debug.js';

export interface ConstTable<D> extends IHaveDebugStr {
  readonly numRows: number;
  readonly numCols: number;
  getCell(row: number, col: number): D;
}

/**
 * A fixed-width grid of cells, used for rendering
 * transition tables in debug output.
 */
export class Table<D> implements ConstTable<D> {
  private rows: D[][] = [];
  private _numCols: number = 0;
  get numRows() {
    return this.rows.length;
  }
  get numCols() {
    return this._numCols;
  }

  static init<D>(numRows: number, numCols: number, value: () => D) {
    let table: Table<D> = new Table();
    table._numCols = numCols;
    for (let row = 0; row < numRows; row++) {
      table.addRow(value);
    }
    return table;
  }

  /**
   * Add a row to the table where each
   * cell in the row has the given
   * value.
   */
  addRow(value: () => D) {
    let cols: D[] = [];
    for (let c = 0; c < this._numCols; c++) {
      cols.push(value());
    }
    this.rows.push(cols);
  }

  setCell(row: number, col: number, value: D) {
    if (row < 0 || row >= this.rows.length) {
      throw new Error(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${this.rows.length} exclusive`
      );
    }
    if (col < 0 || col >= this._numCols) {
      throw new Error(
        `TableIndexError: Invalid col ${col}. Must be between 0 and ${this._numCols} exclusive`
      );
    }
    this.rows[row][col] = value;
  }

  getCell(row: number, col: number): D {
    return this.rows[row][col];
  }

  /**
   * Render the table with every column right-aligned
   * and padded by two spaces.
   */
  toDebugStr() {
    let out = '';
    let minWidths: number[] = [];
    for (let ci = 0; ci < this.numCols; ci++) {
      let minWidth = 1;
      for (let ri = 0; ri < this.numRows; ri++) {
        minWidth = Math.max(minWidth, `${this.getCell(ri, ci)}`.length);
      }
      minWidths.push(minWidth);
    }

    for (let row = 0; row < this.numRows; row++) {
      for (let col = 0; col < this.numCols; col++) {
        out += `${this.getCell(row, col)}`.padStart(minWidths[col] + 2);
      }
      out += '\n';
    }
    return out;
  }
}
