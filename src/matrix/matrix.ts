/** @file matrix.ts */

/**
 *  Dense row-major matrix of 64-bit floats.
 */
export class Matrix {
  readonly rows: number
  readonly cols: number
  readonly data: Float64Array

  // --- constructor guard ---
  constructor(rows: number, cols: number, data?: ArrayLike<number>) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new Error(`Invalid matrix shape ${rows}x${cols}`)
    }
    this.rows = rows
    this.cols = cols

    if (data) {
      if (data.length !== rows * cols) {
        throw new Error(`Data length ${data.length} doesn't match dimensions ${rows}x${cols}`)
      }
      this.data = Float64Array.from(data)
    } else {
      this.data = new Float64Array(rows * cols)
    }
  }

  get(row: number, col: number): number {
    return this.data[row * this.cols + col]
  }

  set(row: number, col: number, value: number): void {
    this.data[row * this.cols + col] = value
  }

  /**
   * View of a single row, writes go through to the matrix.
   */
  row(row: number): Float64Array {
    return this.data.subarray(row * this.cols, (row + 1) * this.cols)
  }

  to2D(): number[][] {
    const out: number[][] = []
    for (let i = 0; i < this.rows; i++) out.push(Array.from(this.row(i)))
    return out
  }

  static filled(rows: number, cols: number, value: number): Matrix {
    const m = new Matrix(rows, cols)
    m.data.fill(value)
    return m
  }

  // --- robust from2D ---
  static from2D(arr: number[][]): Matrix {
    const rows = arr.length
    if (rows === 0) throw new Error('from2D: empty array')
    const cols = arr[0].length
    if (!Number.isInteger(cols) || cols <= 0) throw new Error('from2D: empty inner array')
    for (let i = 1; i < rows; i++) {
      if (arr[i].length !== cols) throw new Error('from2D: ragged rows')
    }
    const data = new Float64Array(rows * cols)
    for (let i = 0; i < rows; i++) {
      const row = arr[i]
      for (let j = 0; j < cols; j++) data[i * cols + j] = row[j]
    }
    return new Matrix(rows, cols, data)
  }
}
