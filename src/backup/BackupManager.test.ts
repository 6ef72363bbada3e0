import { describe, it, expect } from "vitest";
import { FakeSession, sqlError } from "../__tests__/fakes.js";
import { backupCandidates, backupTimestamp, BackupManager } from "./BackupManager.js";

const NOW = new Date("2026-10-18T09:05:07Z");
const BASE = "Orders_backup_20261018_090507";

function ordersSession(): FakeSession {
  return new FakeSession().on("FROM INFORMATION_SCHEMA.TABLES t", {
    rows: [{ schemaName: "dbo", tableName: "Orders" }],
  });
}

function manager(attempts = 5): BackupManager {
  return new BackupManager({ backupNameAttempts: attempts }, () => NOW);
}

describe("backup naming", () => {
  it("formats the timestamp in UTC", () => {
    expect(backupTimestamp(NOW)).toBe("20261018_090507");
  });

  it("suffixes later candidates and keeps them within identifier length", () => {
    expect(backupCandidates("t_copy", 3)).toEqual(["t_copy", "t_copy_2", "t_copy_3"]);
    const [first, second] = backupCandidates("x".repeat(128), 2);
    expect(first).toBe("x".repeat(128));
    expect(second).toBe(`${"x".repeat(126)}_2`);
  });
});

describe("BackupManager", () => {
  it("copies the table into a timestamped backup inside a transaction", async () => {
    const session = ordersSession().on("SELECT * INTO", { rowsAffected: [3] });
    const spec = await manager().backupTable(session, { name: "Orders" });

    expect(spec).toEqual({
      sourceTable: "dbo.Orders",
      targetTable: `dbo.${BASE}`,
      rowsCopied: 3,
      completedAt: "2026-10-18T09:05:07.000Z",
    });
    const copy = session.calls.find((call) => call.text.startsWith("SELECT * INTO"));
    expect(copy?.text).toBe(`SELECT * INTO [dbo].[${BASE}] FROM [dbo].[Orders]`);
    expect(copy?.inTransaction).toBe(true);
    expect(session.events).toEqual(["begin", "commit"]);
  });

  it("uses the caller's backup name", async () => {
    const session = ordersSession().on("SELECT * INTO", { rowsAffected: [0] });
    const spec = await manager().backupTable(session, { name: "Orders" }, "Orders_copy");
    expect(spec.targetTable).toBe("dbo.Orders_copy");
    expect(spec.rowsCopied).toBe(0);
  });

  it("moves to a suffixed name when the target already exists", async () => {
    const session = ordersSession()
      .on("OBJECT_ID(@qualifiedName)", (params) => ({
        rows: [{ objectId: params?.qualifiedName === `[dbo].[${BASE}]` ? 1093578934 : null }],
      }))
      .on("SELECT * INTO", { rowsAffected: [3] });
    const spec = await manager().backupTable(session, { name: "Orders" });
    expect(spec.targetTable).toBe(`dbo.${BASE}_2`);
    expect(session.events).toEqual(["begin", "commit"]);
  });

  it("retries with the next name when the target appears concurrently", async () => {
    const session = ordersSession()
      .once("SELECT * INTO", sqlError(`There is already an object named '${BASE}' in the database.`, { number: 2714 }))
      .on("SELECT * INTO", { rowsAffected: [3] });
    const spec = await manager().backupTable(session, { name: "Orders" });
    expect(spec.targetTable).toBe(`dbo.${BASE}_2`);
    expect(session.events).toEqual(["begin", "rollback", "begin", "commit"]);
  });

  it("reports CopyFailed when the copy fails for any other reason", async () => {
    const session = ordersSession().on(
      "SELECT * INTO",
      sqlError("The transaction log for database 'testdb' is full.", { number: 9002 })
    );
    await expect(manager().backupTable(session, { name: "Orders" })).rejects.toMatchObject({
      kind: "CopyFailed",
      message: "Backup copy failed and was rolled back: The transaction log for database 'testdb' is full.",
      detail: { sourceTable: "dbo.Orders", targetTable: `dbo.${BASE}`, number: 9002 },
    });
    expect(session.events).toEqual(["begin", "rollback"]);
  });

  it("reports a missing source as SourceNotFound", async () => {
    await expect(manager().backupTable(new FakeSession(), { name: "Ghost" })).rejects.toMatchObject({
      kind: "SourceNotFound",
      message: "Table 'Ghost' does not exist or is not visible.",
    });
  });

  it("gives up after the configured number of names", async () => {
    const session = ordersSession().on("OBJECT_ID(@qualifiedName)", { rows: [{ objectId: 7 }] });
    await expect(manager(2).backupTable(session, { name: "Orders" })).rejects.toMatchObject({
      kind: "TargetNameCollisionUnresolved",
      message: "Could not find a free backup name for 'Orders' after 2 attempts.",
    });
    expect(session.events).toEqual([]);
  });
});
