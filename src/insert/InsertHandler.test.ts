import { describe, it, expect } from "vitest";
import { FakeSession, sqlError } from "../__tests__/fakes.js";
import {
  alignRows,
  buildInsert,
  buildMerge,
  chunkRows,
  collapseDuplicates,
  InsertHandler,
  type InsertRequest,
} from "./InsertHandler.js";

const CI = "SQL_Latin1_General_CP1_CI_AS";

const PEOPLE_COLUMNS = [
  { columnName: "Id", isIdentity: false, isComputed: false, dataType: "int", collationName: null },
  { columnName: "Name", isIdentity: false, isComputed: false, dataType: "nvarchar", collationName: CI },
  { columnName: "Email", isIdentity: false, isComputed: false, dataType: "nvarchar", collationName: CI },
  { columnName: "Code", isIdentity: false, isComputed: false, dataType: "varchar", collationName: "Latin1_General_CS_AS" },
  { columnName: "Seq", isIdentity: true, isComputed: false, dataType: "int", collationName: null },
  { columnName: "RowVer", isIdentity: false, isComputed: false, dataType: "timestamp", collationName: null },
];

const WRITABLE = new Map([
  ["id", { name: "Id", writable: true, foldsCase: false }],
  ["name", { name: "Name", writable: true, foldsCase: true }],
  ["seq", { name: "Seq", writable: false, foldsCase: false }],
]);

function ordersSession(): FakeSession {
  return new FakeSession()
    .on("FROM INFORMATION_SCHEMA.TABLES t", { rows: [{ schemaName: "dbo", tableName: "Orders" }] })
    .on("c.is_identity", {
      rows: [
        { columnName: "Id", isIdentity: true, isComputed: false, dataType: "int", collationName: null },
        { columnName: "Name", isIdentity: false, isComputed: false, dataType: "nvarchar", collationName: CI },
      ],
    })
    .on("INFORMATION_SCHEMA.TABLE_CONSTRAINTS", {
      rows: [
        { schemaName: "dbo", tableName: "Orders", constraintName: "PK_Orders", constraintType: "PRIMARY KEY", columnName: "Id", position: 1 },
      ],
    });
}

function peopleSession(withPrimaryKey = true): FakeSession {
  const session = new FakeSession()
    .on("FROM INFORMATION_SCHEMA.TABLES t", { rows: [{ schemaName: "dbo", tableName: "People" }] })
    .on("c.is_identity", { rows: PEOPLE_COLUMNS });
  if (withPrimaryKey) {
    session.on("INFORMATION_SCHEMA.TABLE_CONSTRAINTS", {
      rows: [
        { schemaName: "dbo", tableName: "People", constraintName: "PK_People", constraintType: "PRIMARY KEY", columnName: "Id", position: 1 },
      ],
    });
  }
  return session;
}

function request(overrides: Partial<InsertRequest> = {}): InsertRequest {
  return {
    table: { name: "People" },
    rows: [1, 2, 3, 4, 5].map((id) => ({ Id: id, Name: `person ${id}` })),
    conflictPolicy: "ignore",
    ...overrides,
  };
}

const merged = (...actions: string[]) => ({ rows: actions.map((mergeAction) => ({ mergeAction })) });

describe("alignRows", () => {
  it("maps keys onto the table's spelling", () => {
    expect(alignRows([{ id: 1, NAME: "Ada" }], WRITABLE, "dbo.People")).toEqual({
      columns: ["Id", "Name"],
      rows: [{ Id: 1, Name: "Ada" }],
    });
  });

  it("rejects unknown and generated columns", () => {
    expect(() => alignRows([{ Age: 3 }], WRITABLE, "dbo.People")).toThrow("Column 'Age' does not exist on table dbo.People.");
    expect(() => alignRows([{ seq: 3 }], WRITABLE, "dbo.People")).toThrow(
      "Column 'Seq' is generated by the database and cannot be inserted."
    );
  });

  it("rejects rows with differing column sets", () => {
    expect(() => alignRows([{ Id: 1, Name: "a" }, { Id: 2 }], WRITABLE, "dbo.People")).toThrow(
      "Row 2 has a different set of columns than row 1."
    );
  });

  it("rejects a column named twice in different case", () => {
    expect(() => alignRows([{ Id: 1, ID: 2 }], WRITABLE, "dbo.People")).toThrow("Row 1 names column 'Id' more than once.");
  });
});

describe("collapseDuplicates", () => {
  it("keeps the last occurrence at its own position", () => {
    const rows = [
      { Id: 1, Name: "a" },
      { Id: 2, Name: "b" },
      { Id: 1, Name: "c" },
    ];
    expect(collapseDuplicates(rows, ["Id"], () => false)).toEqual({
      rows: [
        { Id: 2, Name: "b" },
        { Id: 1, Name: "c" },
      ],
      collapsed: 1,
    });
  });

  const mixedCase = [
    { Email: "A@example.com", Name: "first" },
    { Email: "a@EXAMPLE.com", Name: "second" },
  ];

  it("folds case on columns that compare case-insensitively", () => {
    const { rows, collapsed } = collapseDuplicates(mixedCase, ["Email"], () => true);
    expect(collapsed).toBe(1);
    expect(rows).toEqual([{ Email: "a@EXAMPLE.com", Name: "second" }]);
  });

  it("keeps case-only differences on case-sensitive columns", () => {
    expect(collapseDuplicates(mixedCase, ["Email"], () => false)).toEqual({ rows: mixedCase, collapsed: 0 });
  });
});

describe("chunkRows", () => {
  it("bounds chunks by rows and by parameters", () => {
    expect(chunkRows(Array.from({ length: 2500 }, (_, i) => i), 1).map((c) => c.length)).toEqual([1000, 1000, 500]);
    expect(chunkRows(Array.from({ length: 1000 }, (_, i) => i), 5).map((c) => c.length)).toEqual([400, 400, 200]);
  });
});

describe("statement builders", () => {
  const table = { schema: "dbo", name: "People" };
  const rows = [
    { Id: 1, Name: "Ada" },
    { Id: 2, Name: "Bo" },
  ];

  it("builds a parameterized INSERT", () => {
    expect(buildInsert(table, ["Id", "Name"], rows)).toEqual({
      sql: "INSERT INTO [dbo].[People] ([Id], [Name])\nVALUES (@p0_0, @p0_1),\n       (@p1_0, @p1_1)",
      params: { p0_0: 1, p0_1: "Ada", p1_0: 2, p1_1: "Bo" },
    });
  });

  it("builds a MERGE that updates non-key columns", () => {
    expect(buildMerge(table, ["Id", "Name"], ["Id"], rows, "update").sql).toBe(
      [
        "DECLARE @actions TABLE (mergeAction nvarchar(10));",
        "MERGE INTO [dbo].[People] WITH (HOLDLOCK) AS target",
        "USING (VALUES (@p0_0, @p0_1),\n       (@p1_0, @p1_1)) AS source ([Id], [Name])",
        "ON target.[Id] = source.[Id]",
        "WHEN MATCHED THEN UPDATE SET target.[Name] = source.[Name]",
        "WHEN NOT MATCHED BY TARGET THEN INSERT ([Id], [Name]) VALUES (source.[Id], source.[Name])",
        "OUTPUT $action INTO @actions (mergeAction);",
        "SELECT mergeAction FROM @actions;",
      ].join("\n")
    );
  });

  it("leaves matched rows alone under ignore", () => {
    expect(buildMerge(table, ["Id", "Name"], ["Id"], rows, "ignore").sql).not.toContain("WHEN MATCHED");
  });
});

describe("InsertHandler", () => {
  const handler = new InsertHandler();

  it("skips rows whose key already exists under ignore", async () => {
    const session = peopleSession().on("MERGE INTO", merged("INSERT", "INSERT", "INSERT"));
    const outcome = await handler.insertRows(session, request());

    expect(outcome).toEqual({
      table: "dbo.People",
      conflictPolicy: "ignore",
      conflictKey: ["Id"],
      received: 5,
      inserted: 3,
      skipped: 2,
      updated: 0,
      duplicatesCollapsed: 0,
    });
    const merge = session.calls.find((call) => call.text.includes("MERGE INTO"));
    expect(merge?.inTransaction).toBe(true);
    expect(session.events).toEqual(["begin", "commit"]);
  });

  it("counts updates and inserts under update", async () => {
    const session = peopleSession().on("MERGE INTO", merged("UPDATE", "INSERT"));
    const outcome = await handler.insertRows(
      session,
      request({ rows: [{ Id: 1, Name: "Ada" }, { Id: 9, Name: "Bo" }], conflictPolicy: "update" })
    );
    expect(outcome).toMatchObject({ inserted: 1, updated: 1, skipped: 0 });
  });

  it("collapses duplicate keys before writing", async () => {
    const session = peopleSession().on("MERGE INTO", merged("INSERT"));
    const outcome = await handler.insertRows(
      session,
      request({ rows: [{ Id: 1, Name: "first" }, { Id: 1, Name: "second" }] })
    );
    expect(outcome).toMatchObject({ received: 2, inserted: 1, skipped: 0, duplicatesCollapsed: 1 });
    const merge = session.calls.find((call) => call.text.includes("MERGE INTO"));
    expect(merge?.params).toEqual({ p0_0: 1, p0_1: "second" });
  });

  it("writes a plain INSERT under fail", async () => {
    const session = peopleSession().on("INSERT INTO [dbo].[People]", { rowsAffected: [2] });
    const outcome = await handler.insertRows(
      session,
      request({ rows: [{ Id: 1, Name: "Ada" }, { Id: 2, Name: "Bo" }], conflictPolicy: "fail" })
    );
    expect(outcome).toMatchObject({ conflictKey: [], inserted: 2, skipped: 0 });
    expect(session.statements().some((text) => text.includes("TABLE_CONSTRAINTS"))).toBe(false);
  });

  it("rolls back everything when a write fails", async () => {
    const session = peopleSession().on(
      "INSERT INTO [dbo].[People]",
      sqlError("Violation of PRIMARY KEY constraint 'PK_People'.", { number: 2627 })
    );
    await expect(handler.insertRows(session, request({ conflictPolicy: "fail" }))).rejects.toMatchObject({
      kind: "DatabaseError",
      message: "Insert rolled back; no rows were written: Violation of PRIMARY KEY constraint 'PK_People'.",
    });
    expect(session.events).toEqual(["begin", "rollback"]);
  });

  it("uses an explicit conflict key in the table's spelling", async () => {
    const session = peopleSession().on("MERGE INTO", merged());
    const outcome = await handler.insertRows(
      session,
      request({ rows: [{ Email: "a@example.com", Name: "Ada" }], conflictKey: ["email"] })
    );
    expect(outcome.conflictKey).toEqual(["Email"]);
    expect(outcome.skipped).toBe(1);
  });

  it("rejects an explicit key that is not a column", async () => {
    await expect(handler.insertRows(peopleSession(), request({ conflictKey: ["Nickname"] }))).rejects.toMatchObject({
      kind: "SchemaMismatch",
      message: "Conflict key column 'Nickname' does not exist on table dbo.People.",
    });
  });

  it("requires rows to carry the conflict key", async () => {
    await expect(handler.insertRows(peopleSession(), request({ conflictKey: ["Email"] }))).rejects.toMatchObject({
      kind: "SchemaMismatch",
      message: "Rows must include conflict key column 'Email'.",
    });
  });

  it("reads merge actions from the last result set", async () => {
    const session = peopleSession().on("MERGE INTO", {
      recordsets: [[], [{ mergeAction: "INSERT" }, { mergeAction: "UPDATE" }]],
    });
    const outcome = await handler.insertRows(
      session,
      request({ rows: [{ Id: 1, Name: "Ada" }, { Id: 9, Name: "Bo" }], conflictPolicy: "update" })
    );
    expect(outcome).toMatchObject({ inserted: 1, updated: 1, skipped: 0 });
  });

  it("collapses keys that differ only in case under a case-insensitive collation", async () => {
    const session = peopleSession().on("MERGE INTO", merged("INSERT"));
    const outcome = await handler.insertRows(
      session,
      request({
        rows: [
          { Email: "A@example.com", Name: "first" },
          { Email: "a@example.com", Name: "second" },
        ],
        conflictKey: ["Email"],
      })
    );
    expect(outcome).toMatchObject({ inserted: 1, duplicatesCollapsed: 1 });
  });

  it("keeps keys that differ only in case under a case-sensitive collation", async () => {
    const session = peopleSession().on("MERGE INTO", merged("INSERT", "INSERT"));
    const outcome = await handler.insertRows(
      session,
      request({
        rows: [
          { Code: "ab", Name: "first" },
          { Code: "AB", Name: "second" },
        ],
        conflictKey: ["Code"],
      })
    );
    expect(outcome).toMatchObject({ inserted: 2, duplicatesCollapsed: 0 });
    const merge = session.calls.find((call) => call.text.includes("MERGE INTO"));
    expect(merge?.params).toEqual({ p0_0: "ab", p0_1: "first", p1_0: "AB", p1_1: "second" });
  });

  it("inserts without a conflict key when the primary key is an identity column", async () => {
    const session = ordersSession().on("INSERT INTO [dbo].[Orders]", { rowsAffected: [2] });
    const outcome = await handler.insertRows(session, {
      table: { name: "Orders" },
      rows: [{ Name: "a" }, { Name: "a" }],
      conflictPolicy: "ignore",
    });

    expect(outcome).toEqual({
      table: "dbo.Orders",
      conflictPolicy: "ignore",
      conflictKey: [],
      received: 2,
      inserted: 2,
      skipped: 0,
      updated: 0,
      duplicatesCollapsed: 0,
    });
    expect(session.statements().some((text) => text.includes("MERGE INTO"))).toBe(false);
  });

  it("reports ConflictKeyMissing for a table without keys", async () => {
    await expect(handler.insertRows(peopleSession(false), request())).rejects.toMatchObject({
      kind: "ConflictKeyMissing",
      message:
        "Table dbo.People has no primary key or unique constraint; pass 'conflict_key' or use conflict_policy 'fail'.",
    });
  });
});
