export type GridTableErrorKind =
  | "out_of_range"
  | "not_found"
  | "erase_empty"
  | "invalid_dimensions"

/**
 * Raised synchronously by table operations. A throwing call leaves the
 * table exactly as it was before the call.
 */
export class GridTableError extends Error {
  readonly kind: GridTableErrorKind
  readonly row: number
  readonly col: number

  constructor(kind: GridTableErrorKind, row: number, col: number, message: string) {
    super(message)
    this.name = "GridTableError"
    this.kind = kind
    this.row = row
    this.col = col
  }
}

export function outOfRange(
  row: number,
  col: number,
  rows: number,
  cols: number,
): GridTableError {
  return new GridTableError(
    "out_of_range",
    row,
    col,
    `Cell (${row}, ${col}) is outside of a ${rows}x${cols} table`,
  )
}

export function notFound(row: number, col: number): GridTableError {
  return new GridTableError("not_found", row, col, `Cell (${row}, ${col}) is empty`)
}

export function eraseEmpty(row: number, col: number): GridTableError {
  return new GridTableError(
    "erase_empty",
    row,
    col,
    `Cannot erase empty cell (${row}, ${col})`,
  )
}

export function invalidDimensions(rows: number, cols: number): GridTableError {
  return new GridTableError(
    "invalid_dimensions",
    rows,
    cols,
    `Table dimensions must be non-negative integers, got ${rows}x${cols}`,
  )
}

export function isGridTableError(
  error: unknown,
  kind?: GridTableErrorKind,
): error is GridTableError {
  return (
    error instanceof GridTableError && (kind === undefined || error.kind === kind)
  )
}
