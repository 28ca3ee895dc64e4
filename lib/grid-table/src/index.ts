export {assert} from "./assert"

export * as GridTable from "./grid_table"

export type {GridTableOptions} from "./grid_table"
export {DEFAULT_SIZE, EMPTY} from "./grid_table"

export {
  GridTableError,
  type GridTableErrorKind,
  isGridTableError,
} from "./error"
