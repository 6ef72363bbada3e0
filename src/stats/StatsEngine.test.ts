import { describe, it, expect } from "vitest";
import { FakeSession, sqlError } from "../__tests__/fakes.js";
import { literalMatch, StatsEngine } from "./StatsEngine.js";

const STATS_ROWS = [
  {
    schemaName: "dbo",
    tableName: "Orders",
    catalogRows: "1500",
    indexCount: 2,
    totalSpaceMb: 0.52,
    usedSpaceMb: 0.3,
    unusedSpaceMb: 0.22,
  },
  {
    schemaName: "dbo",
    tableName: "Staging",
    catalogRows: null,
    indexCount: 0,
    totalSpaceMb: 0,
    usedSpaceMb: 0,
    unusedSpaceMb: 0,
  },
];

function statsSession(): FakeSession {
  return new FakeSession()
    .on("sys.dm_db_index_usage_stats", {
      rows: [{ schemaName: "dbo", tableName: "Orders", lastUserUpdate: new Date("2026-03-01T10:00:00Z") }],
    })
    .on("sys.allocation_units", { rows: STATS_ROWS });
}

describe("literalMatch", () => {
  it("matches case-insensitively and returns the name's own spelling", () => {
    expect(literalMatch("CustomerOrders", "ORDER")).toBe("Order");
  });

  it("treats wildcard characters literally", () => {
    expect(literalMatch("GDP_2020", "GDP%")).toBeNull();
    expect(literalMatch("GDPX2020", "GDP_")).toBeNull();
    expect(literalMatch("GDP_2020", "GDP_")).toBe("GDP_");
  });
});

describe("StatsEngine", () => {
  describe("getTableStats", () => {
    it("reports catalog counts and falls back to COUNT_BIG", async () => {
      const session = statsSession().on("COUNT_BIG", { rows: [{ total: "12" }] });
      const stats = await new StatsEngine({ countTimeoutMs: 1000 }).getTableStats(session);

      expect(stats).toEqual([
        {
          schema: "dbo",
          table: "Orders",
          rowCount: 1500,
          totalSpaceMb: 0.52,
          usedSpaceMb: 0.3,
          unusedSpaceMb: 0.22,
          indexCount: 2,
          lastModified: "2026-03-01T10:00:00.000Z",
          rowCountSource: "catalog",
        },
        {
          schema: "dbo",
          table: "Staging",
          rowCount: 12,
          totalSpaceMb: 0,
          usedSpaceMb: 0,
          unusedSpaceMb: 0,
          indexCount: 0,
          lastModified: null,
          rowCountSource: "count",
        },
      ]);
      expect(session.statements()).toContain("SELECT COUNT_BIG(*) AS total FROM [dbo].[Staging]");
    });

    it("leaves lastModified empty without VIEW SERVER STATE", async () => {
      const session = new FakeSession()
        .on(
          "sys.dm_db_index_usage_stats",
          sqlError("VIEW SERVER STATE permission was denied on object 'server', database 'master'.", { number: 300 })
        )
        .on("sys.allocation_units", { rows: [STATS_ROWS[0]] });
      const [orders] = await new StatsEngine({ countTimeoutMs: 1000 }).getTableStats(session);
      expect(orders.lastModified).toBeNull();
      expect(orders.rowCount).toBe(1500);
    });

    it("cancels a slow fallback count and reports the count unavailable", async () => {
      const session = statsSession();
      session.on("COUNT_BIG", () => session.hang());
      const stats = await new StatsEngine({ countTimeoutMs: 20 }).getTableStats(session);

      expect(stats[1].rowCount).toBeNull();
      expect(stats[1].rowCountSource).toBe("unavailable");
      expect(session.events).toEqual(["cancel"]);
    });

    it("scopes the query to a resolved table", async () => {
      const session = statsSession().on("FROM INFORMATION_SCHEMA.TABLES t", {
        rows: [{ schemaName: "dbo", tableName: "Orders" }],
      });
      await new StatsEngine({ countTimeoutMs: 1000 }).getTableStats(session, { name: "Orders" });

      const statsCall = session.calls.find((call) => call.text.includes("sys.allocation_units"));
      expect(statsCall?.params).toEqual({ schemaName: "dbo", tableName: "Orders" });
    });

    it("reports an unknown table as NotFound", async () => {
      await expect(
        new StatsEngine({ countTimeoutMs: 1000 }).getTableStats(new FakeSession(), { name: "Missing" })
      ).rejects.toMatchObject({ kind: "NotFound" });
    });
  });

  describe("searchTables", () => {
    const engine = new StatsEngine({ countTimeoutMs: 1000 });

    it("keeps only literal matches of the pattern", async () => {
      const session = new FakeSession().on("FROM INFORMATION_SCHEMA.TABLES t", {
        rows: [
          { schemaName: "dbo", tableName: "GDP%Growth" },
          { schemaName: "dbo", tableName: "GDPData" },
        ],
      });
      const matches = await engine.searchTables(session, "GDP%", "table");

      expect(matches).toEqual([{ schema: "dbo", table: "GDP%Growth", kind: "table-name", matched: "GDP%" }]);
      expect(session.calls[0].params).toEqual({ pattern: "GDP%" });
      expect(session.calls).toHaveLength(1);
    });

    it("searches column names only when asked", async () => {
      const session = new FakeSession().on("FROM INFORMATION_SCHEMA.COLUMNS c", {
        rows: [{ schemaName: "dbo", tableName: "Economy", columnName: "GDP_Total", dataType: "decimal" }],
      });
      const matches = await engine.searchTables(session, "gdp", "column");

      expect(matches).toEqual([
        {
          schema: "dbo",
          table: "Economy",
          column: "GDP_Total",
          kind: "column-name",
          matched: "GDP",
          dataType: "decimal",
        },
      ]);
      expect(session.calls).toHaveLength(1);
    });

    it("returns table matches before column matches", async () => {
      const session = new FakeSession()
        .on("FROM INFORMATION_SCHEMA.COLUMNS c", {
          rows: [{ schemaName: "dbo", tableName: "Shipments", columnName: "OrderId", dataType: "int" }],
        })
        .on("FROM INFORMATION_SCHEMA.TABLES t", { rows: [{ schemaName: "dbo", tableName: "Orders" }] });
      const matches = await engine.searchTables(session, "order", "both");
      expect(matches.map((match) => match.kind)).toEqual(["table-name", "column-name"]);
    });
  });
});
