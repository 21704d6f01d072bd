/**
 * Immutable dense matrix, stored column-major.
 *
 * A feature matrix X is `d × n` with one sample per column, so column-major
 * storage makes every sample a contiguous slice that can be handed out as a
 * view without copying.
 */
import { ConfigError, IndexOutOfRangeError, ShapeError } from "../shared/errors.js";
import type { VectorLike } from "./vector.js";

export class DenseMatrix {
	private readonly _data: Float64Array;
	private readonly _rows: number;
	private readonly _cols: number;

	private constructor(data: Float64Array, rows: number, cols: number) {
		this._data = data;
		this._rows = rows;
		this._cols = cols;
	}

	/**
	 * Builds a matrix whose k-th column is `columns[k]`.
	 * @throws ConfigError if there are no columns or the columns are empty
	 * @throws ShapeError if the columns differ in length
	 */
	static fromColumns(columns: readonly VectorLike[]): DenseMatrix {
		const first = columns[0];
		if (first === undefined || first.length === 0) {
			throw new ConfigError("Matrix needs at least one non-empty column");
		}
		const rows = first.length;
		const data = new Float64Array(rows * columns.length);
		columns.forEach((column, k) => {
			if (column.length !== rows) {
				throw new ShapeError(
					`Column ${k} has length ${column.length}, expected ${rows}`,
					rows,
					column.length,
					{ column: k },
				);
			}
			data.set(Float64Array.from(column), k * rows);
		});
		return new DenseMatrix(data, rows, columns.length);
	}

	/**
	 * Builds a matrix from its rows, the layout `X ∈ R^{d×n}` is usually written in.
	 * @throws ConfigError if there are no rows or the rows are empty
	 * @throws ShapeError if the rows differ in length
	 */
	static fromRows(rows: readonly VectorLike[]): DenseMatrix {
		const first = rows[0];
		if (first === undefined || first.length === 0) {
			throw new ConfigError("Matrix needs at least one non-empty row");
		}
		const cols = first.length;
		const data = new Float64Array(rows.length * cols);
		rows.forEach((row, i) => {
			if (row.length !== cols) {
				throw new ShapeError(
					`Row ${i} has length ${row.length}, expected ${cols}`,
					cols,
					row.length,
					{ row: i },
				);
			}
			for (let k = 0; k < cols; k++) {
				data[k * rows.length + i] = row[k] ?? 0;
			}
		});
		return new DenseMatrix(data, rows.length, cols);
	}

	get rows(): number {
		return this._rows;
	}

	get cols(): number {
		return this._cols;
	}

	/**
	 * Read-only view of column `k`; no copy is made.
	 * @throws IndexOutOfRangeError if `k` is not an integer in [0, cols)
	 */
	column(k: number): VectorLike {
		this.checkColumn(k);
		return this._data.subarray(k * this._rows, (k + 1) * this._rows);
	}

	/** Entry at row `i`, column `k`. */
	get(i: number, k: number): number {
		this.checkColumn(k);
		if (!Number.isInteger(i) || i < 0 || i >= this._rows) {
			throw new IndexOutOfRangeError(`Row index ${i} outside [0, ${this._rows})`, i, this._rows);
		}
		return this._data[k * this._rows + i] ?? Number.NaN;
	}

	private checkColumn(k: number): void {
		if (!Number.isInteger(k) || k < 0 || k >= this._cols) {
			throw new IndexOutOfRangeError(`Column index ${k} outside [0, ${this._cols})`, k, this._cols);
		}
	}
}
