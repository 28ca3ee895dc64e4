import {assert} from "./assert"
import {eraseEmpty, invalidDimensions, notFound, outOfRange} from "./error"

export const DEFAULT_SIZE = 4

/** Lookup entry of a cell that holds no value. */
export const EMPTY = -1

export type GridTableOptions = {
  rows?: number
  cols?: number
  // log lossy resizes through console.warn
  debug?: boolean
}

/**
 * A sparse rows x cols grid. Values live in `dense` with no gaps, `indices`
 * maps every dense slot back to its flattened cell id (`row * cols + col`),
 * and `sparse` maps every cell id to a dense slot or `EMPTY`.
 *
 * Values returned by the accessors and the array returned by `values` are
 * only meaningful until the next call to `set`, `emplace`, `erase`,
 * `setSize` or `reset` on the same table.
 */
export type GridTable<T = unknown> = {
  rows: number
  cols: number
  dense: T[]
  indices: number[]
  sparse: Int32Array
  readonly debug: boolean
}

function checkDimensions(rows: number, cols: number): void {
  if (
    !Number.isInteger(rows) ||
    !Number.isInteger(cols) ||
    rows < 0 ||
    cols < 0
  ) {
    throw invalidDimensions(rows, cols)
  }
}

export function create<T = unknown>(
  options: GridTableOptions = {},
): GridTable<T> {
  const {rows = DEFAULT_SIZE, cols = DEFAULT_SIZE, debug = false} = options
  checkDimensions(rows, cols)
  return {
    rows,
    cols,
    dense: [],
    indices: [],
    sparse: new Int32Array(rows * cols).fill(EMPTY),
    debug,
  }
}

export function make<T = unknown>(rows: number, cols: number): GridTable<T> {
  return create<T>({rows, cols})
}

function cellId(table: GridTable<unknown>, row: number, col: number): number {
  if (
    !Number.isInteger(row) ||
    !Number.isInteger(col) ||
    row < 0 ||
    col < 0 ||
    row >= table.rows ||
    col >= table.cols
  ) {
    throw outOfRange(row, col, table.rows, table.cols)
  }
  return row * table.cols + col
}

function insert<T>(table: GridTable<T>, id: number, value: T): T {
  const denseIndex = table.sparse[id]
  if (denseIndex !== EMPTY) {
    table.dense[denseIndex] = value
    return value
  }
  table.sparse[id] = table.dense.push(value) - 1
  table.indices.push(id)
  return value
}

function swapRemove<K>(array: K[], index: number): void {
  const last = array.length - 1
  array[index] = array[last]
  array.pop()
}

function adopt<T>(table: GridTable<T>, source: GridTable<T>): void {
  table.rows = source.rows
  table.cols = source.cols
  table.dense = source.dense
  table.indices = source.indices
  table.sparse = source.sparse
}

export function size(table: GridTable<unknown>): number {
  return table.rows * table.cols
}

export function dimensions(table: GridTable<unknown>): [rows: number, cols: number] {
  return [table.rows, table.cols]
}

export function count(table: GridTable<unknown>): number {
  return table.dense.length
}

export function isEmpty(table: GridTable<unknown>): boolean {
  return table.dense.length === 0
}

export function contains(
  table: GridTable<unknown>,
  row: number,
  col: number,
): boolean {
  return table.sparse[cellId(table, row, col)] !== EMPTY
}

/**
 * Returns the value at (row, col), or undefined if the cell is empty.
 * Throws an `out_of_range` error for coordinates outside the table.
 */
export function get<T>(
  table: GridTable<T>,
  row: number,
  col: number,
): T | undefined {
  const denseIndex = table.sparse[cellId(table, row, col)]
  return denseIndex === EMPTY ? undefined : table.dense[denseIndex]
}

/**
 * Returns the value at (row, col). Throws a `not_found` error if the cell is
 * empty and an `out_of_range` error for coordinates outside the table.
 */
export function at<T>(table: GridTable<T>, row: number, col: number): T {
  const denseIndex = table.sparse[cellId(table, row, col)]
  if (denseIndex === EMPTY) {
    throw notFound(row, col)
  }
  return table.dense[denseIndex]
}

export function atElse<T, F = T>(
  table: GridTable<T>,
  row: number,
  col: number,
  fallback: F,
): T | F {
  const denseIndex = table.sparse[cellId(table, row, col)]
  return denseIndex === EMPTY ? fallback : table.dense[denseIndex]
}

export function set<T>(
  table: GridTable<T>,
  row: number,
  col: number,
  value: T,
): T {
  return insert(table, cellId(table, row, col), value)
}

/**
 * Stores `factory(...args)` at (row, col). The factory runs only once the
 * coordinates are known to be valid. An existing value is replaced by the
 * newly built one, never rebuilt in place, so it keeps no identity with
 * what was stored before.
 */
export function emplace<T, A extends unknown[]>(
  table: GridTable<T>,
  row: number,
  col: number,
  factory: (...args: A) => T,
  ...args: A
): T {
  const id = cellId(table, row, col)
  return insert(table, id, factory(...args))
}

/**
 * Removes the value at (row, col) by moving the last dense value into its
 * slot. Throws an `erase_empty` error if the cell holds no value.
 */
export function erase(table: GridTable<unknown>, row: number, col: number): void {
  const id = cellId(table, row, col)
  const denseIndex = table.sparse[id]
  if (denseIndex === EMPTY) {
    throw eraseEmpty(row, col)
  }
  swapRemove(table.indices, denseIndex)
  swapRemove(table.dense, denseIndex)
  table.sparse[id] = EMPTY
  if (denseIndex < table.indices.length) {
    table.sparse[table.indices[denseIndex]] = denseIndex
  }
}

/**
 * Changes the dimensions of the table. Values whose coordinates fall outside
 * of the new bounds are discarded. Runs in time linear to `count`, not to the
 * old or new table size.
 * @returns The number of discarded values.
 */
export function setSize<T>(
  table: GridTable<T>,
  rows: number,
  cols: number,
): number {
  checkDimensions(rows, cols)
  if (rows === table.rows && cols === table.cols) {
    return 0
  }
  const next = create<T>({rows, cols, debug: table.debug})
  let dropped = 0
  for (let i = 0; i < table.dense.length; i++) {
    const id = table.indices[i]
    const row = Math.floor(id / table.cols)
    const col = id % table.cols
    if (row < rows && col < cols) {
      insert(next, row * cols + col, table.dense[i])
    } else {
      dropped++
    }
  }
  if (dropped > 0 && table.debug) {
    console.warn(
      `[grid-table] resize ${table.rows}x${table.cols} -> ${rows}x${cols} dropped ${dropped} of ${table.dense.length} values`,
    )
  }
  adopt(table, next)
  return dropped
}

export function reset(table: GridTable<unknown>): void {
  adopt(table, create({rows: table.rows, cols: table.cols}))
}

export function values<T>(table: GridTable<T>): readonly T[] {
  return table.dense
}

export function iterate<T>(table: GridTable<T>): Iterable<T> {
  return {
    [Symbol.iterator]: () => table.dense.values(),
  }
}

/**
 * Visits every value with its coordinates. Iterates backwards, so the
 * iteratee may erase the cell it is visiting.
 */
export function forEach<T>(
  table: GridTable<T>,
  iteratee: (value: T, row: number, col: number) => void,
): void {
  for (let i = table.dense.length - 1; i >= 0; i--) {
    const id = table.indices[i]
    iteratee(table.dense[i], Math.floor(id / table.cols), id % table.cols)
  }
}

export function entries<T>(
  table: GridTable<T>,
): Iterable<[row: number, col: number, value: T]> {
  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < table.dense.length; i++) {
        const id = table.indices[i]
        const entry: [row: number, col: number, value: T] = [
          Math.floor(id / table.cols),
          id % table.cols,
          table.dense[i],
        ]
        yield entry
      }
    },
  }
}

export function clone<T>(table: GridTable<T>): GridTable<T> {
  return {
    rows: table.rows,
    cols: table.cols,
    dense: table.dense.slice(),
    indices: table.indices.slice(),
    sparse: table.sparse.slice(),
    debug: table.debug,
  }
}

export function validate(table: GridTable<unknown>): void {
  assert(
    table.sparse.length === table.rows * table.cols,
    `Lookup has ${table.sparse.length} entries for a ${table.rows}x${table.cols} table`,
  )
  assert(
    table.dense.length === table.indices.length,
    `Dense store has ${table.dense.length} values but ${table.indices.length} cell ids`,
  )
  for (let i = 0; i < table.indices.length; i++) {
    const id = table.indices[i]
    assert(
      table.sparse[id] === i,
      `Cell ${id} should point at slot ${i}, found ${table.sparse[id]}`,
    )
  }
  let populated = 0
  for (let id = 0; id < table.sparse.length; id++) {
    const denseIndex = table.sparse[id]
    if (denseIndex === EMPTY) continue
    assert(
      table.indices[denseIndex] === id,
      `Slot ${denseIndex} should belong to cell ${id}`,
    )
    populated++
  }
  assert(
    populated === table.dense.length,
    `${populated} cells are populated but ${table.dense.length} values are stored`,
  )
}
