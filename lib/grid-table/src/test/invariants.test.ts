import {describe, expect, test} from "vitest"
import {isGridTableError} from "../error"
import * as GridTable from "../grid_table"

// mulberry32; fixed seeds keep the op sequences reproducible
function makeRandom(seed: number) {
  let state = seed >>> 0
  return (max: number) => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return (((t ^ (t >>> 14)) >>> 0) % max) >>> 0
  }
}

function key(row: number, col: number) {
  return `${row},${col}`
}

function populatedCells(table: GridTable.GridTable<unknown>): number {
  const [rows, cols] = GridTable.dimensions(table)
  let populated = 0
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      if (GridTable.contains(table, row, col)) populated++
    }
  }
  return populated
}

function expectMatchesModel(
  table: GridTable.GridTable<number>,
  model: Map<string, number>,
) {
  GridTable.validate(table)
  const [rows, cols] = GridTable.dimensions(table)
  expect(GridTable.count(table)).toBe(model.size)
  expect(populatedCells(table)).toBe(model.size)
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      expect(GridTable.get(table, row, col)).toBe(model.get(key(row, col)))
    }
  }
}

describe("grid table invariants", () => {
  test("random set, emplace and erase sequences keep the indexes consistent", () => {
    for (const seed of [1, 7, 42, 1337]) {
      const random = makeRandom(seed)
      const rows = 6
      const cols = 7
      const table = GridTable.make<number>(rows, cols)
      const model = new Map<string, number>()

      for (let step = 0; step < 400; step++) {
        const row = random(rows)
        const col = random(cols)
        const value = random(1000)
        switch (random(3)) {
          case 0:
            GridTable.set(table, row, col, value)
            model.set(key(row, col), value)
            break
          case 1:
            GridTable.emplace(table, row, col, (v: number) => v * 2, value)
            model.set(key(row, col), value * 2)
            break
          default:
            if (model.has(key(row, col))) {
              GridTable.erase(table, row, col)
              model.delete(key(row, col))
            } else {
              expect(() => GridTable.erase(table, row, col)).toThrow(
                "Cannot erase empty cell",
              )
            }
        }
        expect(GridTable.count(table)).toBe(model.size)
        expect(GridTable.values(table).length).toBe(model.size)
      }
      expectMatchesModel(table, model)
    }
  })

  test("erase then re-insert restores lookups", () => {
    const table = GridTable.make<number>(3, 3)
    GridTable.set(table, 0, 0, 1)
    GridTable.set(table, 1, 1, 2)
    GridTable.set(table, 2, 2, 3)

    GridTable.erase(table, 0, 0)
    expect(GridTable.contains(table, 0, 0)).toBe(false)
    GridTable.set(table, 0, 0, 1)

    expect(GridTable.contains(table, 0, 0)).toBe(true)
    expect(GridTable.at(table, 0, 0)).toBe(1)
    expect(GridTable.at(table, 1, 1)).toBe(2)
    expect(GridTable.at(table, 2, 2)).toBe(3)
    expect(GridTable.count(table)).toBe(3)
    GridTable.validate(table)
  })

  test("resizing never adds values and keeps only cells within bounds", () => {
    const random = makeRandom(99)
    const table = GridTable.make<number>(8, 8)
    const model = new Map<string, number>()
    for (let i = 0; i < 40; i++) {
      const row = random(8)
      const col = random(8)
      GridTable.set(table, row, col, row * 8 + col)
      model.set(key(row, col), row * 8 + col)
    }

    const sizes: [number, number][] = [
      [10, 3],
      [2, 12],
      [9, 9],
      [4, 4],
      [1, 7],
    ]
    for (const [rows, cols] of sizes) {
      const before = GridTable.count(table)
      const dropped = GridTable.setSize(table, rows, cols)
      for (const cell of [...model.keys()]) {
        const [row, col] = cell.split(",").map(Number)
        if (row >= rows || col >= cols) model.delete(cell)
      }
      expect(GridTable.count(table)).toBe(before - dropped)
      expect(GridTable.count(table)).toBeLessThanOrEqual(before)
      expectMatchesModel(table, model)
    }
  })

  test("resizing to the current dimensions keeps the contents", () => {
    const table = GridTable.make<string>(3, 4)
    GridTable.set(table, 0, 3, "a")
    GridTable.set(table, 2, 1, "b")
    const dense = GridTable.values(table).slice()

    expect(GridTable.setSize(table, 3, 4)).toBe(0)
    expect(GridTable.values(table)).toEqual(dense)
    expect(GridTable.at(table, 0, 3)).toBe("a")
    expect(GridTable.at(table, 2, 1)).toBe("b")
  })

  test("grow, shrink and erase", () => {
    const table = GridTable.make<number>(2, 2)
    GridTable.emplace(table, 0, 0, (v: number) => v, 4)
    GridTable.emplace(table, 1, 1, (v: number) => v, 8)

    GridTable.setSize(table, 5, 4)
    expect(GridTable.count(table)).toBe(2)
    expect(GridTable.at(table, 0, 0)).toBe(4)
    expect(GridTable.at(table, 1, 1)).toBe(8)
    expect(GridTable.contains(table, 2, 2)).toBe(false)

    GridTable.setSize(table, 3, 3)
    expect(GridTable.count(table)).toBe(2)

    GridTable.erase(table, 1, 1)
    expect(GridTable.count(table)).toBe(1)
    expect(GridTable.atElse(table, 1, 1, -1)).toBe(-1)
  })

  test("empty table lookups", () => {
    const table = GridTable.make<number>(4, 4)
    let caught: unknown
    try {
      GridTable.at(table, 0, 0)
    } catch (error) {
      caught = error
    }
    expect(isGridTableError(caught, "not_found")).toBe(true)
    expect(isGridTableError(caught, "out_of_range")).toBe(false)
    expect(GridTable.atElse(table, 0, 0, -1)).toBe(-1)
  })

  test("default table", () => {
    const table = GridTable.create<number>()
    expect(GridTable.dimensions(table)).toEqual([
      GridTable.DEFAULT_SIZE,
      GridTable.DEFAULT_SIZE,
    ])
    expect(GridTable.count(table)).toBe(0)
  })
})
