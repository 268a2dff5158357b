/**
 * Generated module behaviour
 *
 * Transpiles generated sqlite modules and runs them against an in-memory
 * stand-in for a better-sqlite3 database.
 */
import { describe, expect, it } from "@effect/vitest"
import { Effect, Predicate } from "effect"
import ts from "typescript"
import * as runtime from "@sqlweave/runtime"
import { Instruction as I, Step, type Expression, type QueryDefinition } from "../ir/index.js"
import { testGenerate, testQuery } from "../testing.js"

type Row = Readonly<Record<string, unknown>>
type Callable = (...args: unknown[]) => unknown

const isCallable = (u: unknown): u is Callable => typeof u === "function"

const isAsyncIterable = (u: unknown): u is AsyncIterable<unknown> =>
  Predicate.hasProperty(u, Symbol.asyncIterator)

/**
 * Statement log and canned results of the fake database.
 */
class FakeDatabase {
  readonly calls: { readonly sql: string; readonly args: readonly unknown[] }[] = []

  constructor(
    private readonly rows: readonly Row[],
    private readonly changes = 0
  ) {}

  prepare(sql: string) {
    if (sql.includes("FAIL")) throw new Error("no such table: FAIL")
    const record = (args: readonly unknown[]) => this.calls.push({ sql, args })
    return {
      get: (...args: unknown[]) => {
        record(args)
        return this.rows[0]
      },
      all: (...args: unknown[]) => {
        record(args)
        return [...this.rows]
      },
      iterate: (...args: unknown[]) => {
        record(args)
        return this.rows[Symbol.iterator]()
      },
      run: (...args: unknown[]) => {
        record(args)
        return { changes: this.changes }
      },
    }
  }
}

/**
 * Generate `query` for sqlite and load the exported function.
 */
const load = async (query: QueryDefinition): Promise<Callable> => {
  const generated = await Effect.runPromise(testGenerate(query))
  const js = ts.transpileModule(generated.source, {
    compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2022 },
  }).outputText

  const exports: Record<string, unknown> = {}
  const requireModule = (id: string): unknown => {
    if (id === "@sqlweave/runtime") return runtime
    throw new Error(`unexpected import ${id}`)
  }
  const evaluate = new Function("require", "exports", js)
  evaluate(requireModule, exports)

  const fn = exports[generated.functionName]
  if (!isCallable(fn)) throw new Error(`${generated.functionName} is not exported`)
  return fn
}

const collect = async (result: unknown): Promise<unknown[]> => {
  if (!isAsyncIterable(result)) throw new Error("expected an async generator")
  const items: unknown[] = []
  for await (const item of result) items.push(item)
  return items
}

const variable = (name: string): Expression => ({ steps: [Step.Identifier({ name })] })

const boardResponses = [
  { name: "id", type: "int", nullable: false },
  { name: "title", type: "string", nullable: false },
  { name: "cards__id", type: "int", nullable: true },
  { name: "cards__label", type: "string", nullable: true },
]

const boardRows: readonly Row[] = [
  { id: 1, title: "a", cards__id: 10, cards__label: "x" },
  { id: 1, title: "a", cards__id: 11, cards__label: "y" },
  { id: 2, title: "b", cards__id: 20, cards__label: "z" },
]

const boardQuery = (affinity: "one" | "many") =>
  testQuery({
    functionName: "list_boards",
    affinity,
    responses: boardResponses,
    instructions: [I.EmitStatic({ text: "SELECT * FROM boards JOIN cards USING (board_id)" })],
  })

describe("generated modules", () => {
  it("streams one parent per key run", async () => {
    const listBoards = await load(boardQuery("many"))
    const db = new FakeDatabase(boardRows)

    expect(await collect(listBoards(db, {}))).toEqual([
      {
        id: 1,
        title: "a",
        cards: [
          { id: 10, label: "x" },
          { id: 11, label: "y" },
        ],
      },
      { id: 2, title: "b", cards: [{ id: 20, label: "z" }] },
    ])
    expect(db.calls).toEqual([{ sql: "SELECT * FROM boards JOIN cards USING (board_id)", args: [] }])
  })

  it("folds every row into a single record", async () => {
    const getBoard = await load(boardQuery("one"))

    expect(await getBoard(new FakeDatabase(boardRows), {})).toEqual({
      id: 1,
      title: "a",
      cards: [
        { id: 10, label: "x" },
        { id: 11, label: "y" },
        { id: 20, label: "z" },
      ],
    })
  })

  it("skips child records whose columns are all null", async () => {
    const getBoard = await load(boardQuery("one"))
    const db = new FakeDatabase([{ id: 3, title: "empty", cards__id: null, cards__label: null }])

    expect(await getBoard(db, {})).toEqual({ id: 3, title: "empty", cards: [] })
  })

  it("throws NotFoundError when no row matches", async () => {
    const getUser = await load(
      testQuery({
        functionName: "get_user",
        affinity: "one",
        parameters: [{ name: "user_id", type: "int", optional: false }],
        responses: [{ name: "id", type: "int", nullable: false }],
        instructions: [I.EmitStatic({ text: "SELECT id FROM users WHERE id = " }), I.EmitEval({ exprIndex: 0 })],
        expressions: [variable("user_id")],
      })
    )

    const error = await Promise.resolve(getUser(new FakeDatabase([]), { userId: 7 })).then(
      () => undefined,
      (e: unknown) => e
    )
    expect(error).toBeInstanceOf(runtime.NotFoundError)
    if (error instanceof runtime.NotFoundError) {
      expect(error.funcName).toBe("getUser")
      expect(error.query).toBe("SELECT id FROM users WHERE id = ?")
      expect(error.params).toEqual({ userId: 7 })
    }
  })

  it("rejects a missing required parameter", async () => {
    const getUser = await load(
      testQuery({
        functionName: "get_user",
        affinity: "one",
        parameters: [{ name: "user_id", type: "int", optional: false }],
        responses: [{ name: "id", type: "int", nullable: false }],
        instructions: [I.EmitStatic({ text: "SELECT id FROM users WHERE id = " }), I.EmitEval({ exprIndex: 0 })],
        expressions: [variable("user_id")],
      })
    )
    const db = new FakeDatabase([{ id: 1 }])

    await expect(Promise.resolve(getUser(db, {}))).rejects.toBeInstanceOf(runtime.ValidationError)
    expect(db.calls).toEqual([])
  })

  it("wraps driver failures in DatabaseError", async () => {
    const purge = await load(
      testQuery({ functionName: "purge", instructions: [I.EmitStatic({ text: "DELETE FROM FAIL WHERE true" })] })
    )

    const error = await Promise.resolve(purge(new FakeDatabase([]), {})).then(
      () => undefined,
      (e: unknown) => e
    )
    expect(error).toBeInstanceOf(runtime.DatabaseError)
    if (error instanceof runtime.DatabaseError) {
      expect(error.message).toBe("purge failed: no such table: FAIL")
    }
  })

  describe("dynamic SQL", () => {
    const deleteIn = (loopVariable: string) =>
      testQuery({
        functionName: "delete_by_ids",
        parameters: [{ name: "ids", type: "int[]", optional: false }],
        instructions: [
          I.EmitStatic({ text: "DELETE FROM t WHERE id IN (" }),
          I.LoopStart({ variable: loopVariable, collectionExprIndex: 0 }),
          I.EmitEval({ exprIndex: 1 }),
          I.EmitUnlessBoundary({ text: "," }),
          I.LoopEnd(),
          I.EmitStatic({ text: ")" }),
        ],
        expressions: [variable("ids"), variable(loopVariable)],
      })

    for (const loopVariable of ["id", "items", "index"]) {
      it(`expands an IN list bound to ${loopVariable}`, async () => {
        const run = await load(deleteIn(loopVariable))
        const db = new FakeDatabase([], 2)

        expect(await run(db, { ids: [3, 4] })).toBe(2)
        expect(db.calls).toEqual([{ sql: "DELETE FROM t WHERE id IN (?,?)", args: [3, 4] }])
      })
    }

    it("treats a single value as a one-item list", async () => {
      const run = await load(deleteIn("id"))
      const db = new FakeDatabase([], 1)

      await run(db, { ids: 9 })
      expect(db.calls).toEqual([{ sql: "DELETE FROM t WHERE id IN (?)", args: [9] }])
    })

    it("nests loops with their own delimiters", async () => {
      const insertRows = await load(
        testQuery({
          functionName: "insert_rows",
          parameters: [{ name: "rows", type: "any", optional: false }],
          instructions: [
            I.EmitStatic({ text: "INSERT INTO t (a, b) VALUES " }),
            I.LoopStart({ variable: "row", collectionExprIndex: 0 }),
            I.EmitStatic({ text: "(" }),
            I.LoopStart({ variable: "value", collectionExprIndex: 1 }),
            I.EmitEval({ exprIndex: 2 }),
            I.EmitUnlessBoundary({ text: "," }),
            I.LoopEnd(),
            I.EmitStatic({ text: ")" }),
            I.EmitUnlessBoundary({ text: "," }),
            I.LoopEnd(),
          ],
          expressions: [
            variable("rows"),
            { steps: [Step.Identifier({ name: "row" }), Step.Member({ property: "values", safe: false })] },
            variable("value"),
          ],
        })
      )
      const db = new FakeDatabase([], 2)

      await insertRows(db, { rows: [{ values: [1, 2] }, { values: [3] }] })
      expect(db.calls).toEqual([{ sql: "INSERT INTO t (a, b) VALUES (?,?),(?)", args: [1, 2, 3] }])
    })

    describe("delimiters between optional assignments", () => {
      const assignment = (name: string, exprIndex: number) => [
        I.If({ exprIndex }),
        I.EmitUnlessBoundary({ text: "," }),
        I.EmitStatic({ text: `${name} = ` }),
        I.EmitEval({ exprIndex }),
        I.End(),
      ]
      const updateT = testQuery({
        functionName: "update_t",
        parameters: [
          { name: "id", type: "int", optional: false },
          { name: "a", type: "string", optional: true },
          { name: "b", type: "string", optional: true },
        ],
        instructions: [
          I.EmitStatic({ text: "UPDATE t SET " }),
          I.Boundary(),
          ...assignment("a", 1),
          ...assignment("b", 2),
          I.EmitStatic({ text: " WHERE id = " }),
          I.EmitEval({ exprIndex: 0 }),
        ],
        expressions: [variable("id"), variable("a"), variable("b")],
      })

      it("omits the delimiter before the first assignment", async () => {
        const run = await load(updateT)
        const db = new FakeDatabase([], 1)

        await run(db, { id: 1, b: "x" })
        expect(db.calls).toEqual([{ sql: "UPDATE t SET b = ? WHERE id = ?", args: ["x", 1] }])
      })

      it("separates every later assignment", async () => {
        const run = await load(updateT)
        const db = new FakeDatabase([], 1)

        await run(db, { id: 1, a: "y", b: "x" })
        expect(db.calls).toEqual([{ sql: "UPDATE t SET a = ?,b = ? WHERE id = ?", args: ["y", "x", 1] }])
      })
    })
  })

  describe("unsafe mutation guard", () => {
    const deleteSessions = testQuery({
      functionName: "delete_sessions",
      statementType: "delete",
      parameters: [{ name: "user_id", type: "int", optional: true }],
      instructions: [
        I.EmitStatic({ text: "DELETE FROM sessions" }),
        I.If({ exprIndex: 0 }),
        I.EmitStatic({ text: " WHERE user_id = " }),
        I.EmitEval({ exprIndex: 0 }),
        I.End(),
      ],
      expressions: [variable("user_id")],
      whereMeta: {
        status: "conditional",
        dynamicConditions: [{ exprIndex: 0, negatedWhenEmpty: true, hasElse: false }],
        removalCombos: [],
      },
    })

    it("runs the filtered delete and returns the change count", async () => {
      const run = await load(deleteSessions)
      const db = new FakeDatabase([], 4)

      expect(await run(db, { userId: 5 })).toBe(4)
      expect(db.calls).toEqual([{ sql: "DELETE FROM sessions WHERE user_id = ?", args: [5] }])
    })

    it("refuses to delete every row", async () => {
      const run = await load(deleteSessions)
      const db = new FakeDatabase([], 4)

      await expect(Promise.resolve(run(db, {}))).rejects.toBeInstanceOf(runtime.UnsafeMutationError)
      expect(db.calls).toEqual([])
    })

    it("allows it when the context opts in", async () => {
      const run = await load(deleteSessions)
      const db = new FakeDatabase([], 9)

      expect(await run(db, {}, { allowUnsafeMutations: true })).toBe(9)
      expect(db.calls).toEqual([{ sql: "DELETE FROM sessions", args: [] }])
    })
  })
})
