import {bench, do_not_optimize, group, run} from "mitata"
import {
  at,
  atElse,
  emplace,
  erase,
  get,
  make,
  reset,
  set,
  setSize,
} from "./grid_table"

const rows = 10
const cols = 10
// the last row stays empty
const emptyRow = rows - 1

function makeFilled() {
  const table = make<number>(rows, cols)
  for (let row = 0; row < emptyRow; row++) {
    for (let col = 0; col < cols; col++) {
      set(table, row, col, row * cols + col)
    }
  }
  return table
}

const identity = (value: number) => value
const filled = makeFilled()
const randomCells = Array.from({length: 1000}, (): [number, number] => [
  Math.floor(Math.random() * emptyRow),
  Math.floor(Math.random() * cols),
])

group("grid_table reads", () => {
  bench("at", () => {
    for (const [row, col] of randomCells) {
      do_not_optimize(at(filled, row, col))
    }
  })

  bench("at_else (populated)", () => {
    for (const [row, col] of randomCells) {
      do_not_optimize(atElse(filled, row, col, 0))
    }
  })

  bench("at_else (empty)", () => {
    for (const [, col] of randomCells) {
      do_not_optimize(atElse(filled, emptyRow, col, 0))
    }
  })

  bench("get", () => {
    for (const [row, col] of randomCells) {
      do_not_optimize(get(filled, row, col))
    }
  })
})

group("grid_table writes", () => {
  bench("set", () => {
    const table = make<number>(rows, cols)
    for (const [row, col] of randomCells) {
      set(table, row, col, 0xf)
    }
  })

  bench("emplace", () => {
    const table = make<number>(rows, cols)
    for (const [row, col] of randomCells) {
      emplace(table, row, col, identity, 0xf)
    }
  })

  bench("erase and emplace", () => {
    for (const [row, col] of randomCells) {
      erase(filled, row, col)
      emplace(filled, row, col, identity, 0xf)
    }
  })

  bench("reset", () => {
    const table = makeFilled()
    reset(table)
  })

  bench("set_size", () => {
    const table = makeFilled()
    setSize(
      table,
      rows + Math.floor(Math.random() * rows * 63),
      cols + Math.floor(Math.random() * cols * 63),
    )
  })
})

await run()
