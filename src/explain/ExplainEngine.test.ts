import { describe, it, expect } from "vitest";
import { FakeSession, sqlError } from "../__tests__/fakes.js";
import { buildPlanTree, ExplainEngine } from "./ExplainEngine.js";

const STATEMENT = "SELECT TOP (@__row_limit) * FROM t";

const PLAN_ROWS = [
  {
    StmtText: "  SELECT TOP (@__row_limit) * FROM t  ",
    StmtId: 1,
    NodeId: 1,
    Parent: 0,
    PhysicalOp: null,
    LogicalOp: null,
    Argument: null,
    EstimateRows: null,
    EstimateIO: null,
    EstimateCPU: null,
    TotalSubtreeCost: 0.0033,
    Type: "SELECT",
  },
  {
    StmtText: "  |--Top(TOP EXPRESSION:([@__row_limit]))",
    StmtId: 1,
    NodeId: 2,
    Parent: 1,
    PhysicalOp: "Top",
    LogicalOp: "Top",
    Argument: "TOP EXPRESSION:([@__row_limit])",
    EstimateRows: 100,
    EstimateIO: 0,
    EstimateCPU: 0.00001,
    TotalSubtreeCost: 0.0033,
    Type: "PLAN_ROW",
  },
  {
    StmtText: "       |--Clustered Index Scan(OBJECT:([testdb].[dbo].[t].[PK_t]))",
    StmtId: 1,
    NodeId: 3,
    Parent: 2,
    PhysicalOp: "Clustered Index Scan",
    LogicalOp: "Clustered Index Scan",
    Argument: "OBJECT:([testdb].[dbo].[t].[PK_t])",
    EstimateRows: 100,
    EstimateIO: 0.003,
    EstimateCPU: 0.0002,
    TotalSubtreeCost: 0.0032,
    Type: "PLAN_ROW",
  },
];

describe("buildPlanTree", () => {
  it("nests operators under their parents and the statement root", () => {
    expect(buildPlanTree(PLAN_ROWS)).toEqual([
      {
        operation: "SELECT",
        logicalOperation: null,
        estimatedRows: null,
        estimatedCost: 0.0033,
        estimatedIo: null,
        estimatedCpu: null,
        detail: "SELECT TOP (@__row_limit) * FROM t",
        children: [
          {
            operation: "Top",
            logicalOperation: "Top",
            estimatedRows: 100,
            estimatedCost: 0.0033,
            estimatedIo: 0,
            estimatedCpu: 0.00001,
            detail: "TOP EXPRESSION:([@__row_limit])",
            children: [
              {
                operation: "Clustered Index Scan",
                logicalOperation: "Clustered Index Scan",
                estimatedRows: 100,
                estimatedCost: 0.0032,
                estimatedIo: 0.003,
                estimatedCpu: 0.0002,
                detail: "OBJECT:([testdb].[dbo].[t].[PK_t])",
                children: [],
              },
            ],
          },
        ],
      },
    ]);
  });

  it("keeps one root per statement", () => {
    const second = PLAN_ROWS.map((row) => ({ ...row, StmtId: 2 }));
    expect(buildPlanTree([...PLAN_ROWS, ...second])).toHaveLength(2);
  });
});

describe("ExplainEngine", () => {
  const engine = new ExplainEngine();

  it("plans inside SHOWPLAN mode and leaves it afterwards", async () => {
    const session = new FakeSession().on("SELECT TOP", { rows: PLAN_ROWS });
    const result = await engine.explain(session, STATEMENT, { __row_limit: 1001 });

    expect(result.statement).toBe(STATEMENT);
    expect(result.plan[0].children[0].operation).toBe("Top");
    expect(session.calls.map((call) => `${call.kind}:${call.text}`)).toEqual([
      "batch:SET SHOWPLAN_ALL ON",
      `query:${STATEMENT}`,
      "batch:SET SHOWPLAN_ALL OFF",
    ]);
    expect(session.calls[1].params).toEqual({ __row_limit: 1001 });
  });

  it("leaves SHOWPLAN mode when planning fails", async () => {
    const session = new FakeSession().on("FROM nope", sqlError("Invalid object name 'nope'.", { number: 208 }));
    await expect(engine.explain(session, "SELECT * FROM nope", {})).rejects.toMatchObject({
      kind: "NotFound",
      message: "Could not produce an execution plan: Invalid object name 'nope'.",
    });
    expect(session.calls.at(-1)?.text).toBe("SET SHOWPLAN_ALL OFF");
  });

  it("closes a session that cannot leave SHOWPLAN mode", async () => {
    const session = new FakeSession()
      .on("SELECT TOP", { rows: PLAN_ROWS })
      .on("SHOWPLAN_ALL OFF", sqlError("Connection reset", { code: "ECONNRESET" }));
    await expect(engine.explain(session, STATEMENT, {})).rejects.toMatchObject({
      kind: "ConnectionUnavailable",
      message: "Session left in SHOWPLAN mode was closed: Connection reset",
    });
    expect(session.closed).toBe(true);
  });
});
