import { readNullableString, readNumber, readString } from "../db/rows.js";
import type { DbSession, Row, SqlParams } from "../db/types.js";
import { GatewayError, classifyDatabaseError, errorMessage } from "../errors/GatewayError.js";
import { createLogger } from "../logging/Logger.js";

const logger = createLogger("explain");

export interface PlanNode {
  operation: string;
  logicalOperation: string | null;
  estimatedRows: number | null;
  estimatedCost: number | null;
  estimatedIo: number | null;
  estimatedCpu: number | null;
  detail: string | null;
  children: PlanNode[];
}

export interface ExplainResult {
  statement: string;
  plan: PlanNode[];
}

function toNode(row: Row, operation: string, detail: string | null): PlanNode {
  return {
    operation,
    logicalOperation: readNullableString(row, "LogicalOp"),
    estimatedRows: readNumber(row, "EstimateRows"),
    estimatedCost: readNumber(row, "TotalSubtreeCost"),
    estimatedIo: readNumber(row, "EstimateIO"),
    estimatedCpu: readNumber(row, "EstimateCPU"),
    detail,
    children: [],
  };
}

/**
 * Turns SHOWPLAN_ALL rows into one tree per statement. Statement rows
 * (Type other than PLAN_ROW) become roots; operator rows hang off their
 * Parent node, or off the statement root when the parent is not an operator.
 */
export function buildPlanTree(rows: Row[]): PlanNode[] {
  const roots: PlanNode[] = [];
  const byStatement = new Map<number, Row[]>();
  for (const row of rows) {
    const stmtId = readNumber(row, "StmtId") ?? 0;
    const group = byStatement.get(stmtId);
    if (group) {
      group.push(row);
    } else {
      byStatement.set(stmtId, [row]);
    }
  }

  for (const statementRows of byStatement.values()) {
    const operators = new Map<number, PlanNode>();
    let root: PlanNode | null = null;
    const orphans: PlanNode[] = [];

    for (const row of statementRows) {
      const type = readString(row, "Type");
      if (type !== "PLAN_ROW") {
        root ??= toNode(row, type || "STATEMENT", readNullableString(row, "StmtText")?.trim() ?? null);
        continue;
      }

      const node = toNode(row, readNullableString(row, "PhysicalOp") ?? type, readNullableString(row, "Argument"));
      const nodeId = readNumber(row, "NodeId");
      const parent = operators.get(readNumber(row, "Parent") ?? -1);
      if (parent) {
        parent.children.push(node);
      } else {
        orphans.push(node);
      }
      if (nodeId !== null) {
        operators.set(nodeId, node);
      }
    }

    if (root) {
      root.children.push(...orphans);
      roots.push(root);
    } else {
      roots.push(...orphans);
    }
  }
  return roots;
}

export class ExplainEngine {
  /** Plans the statement without executing it. The session leaves SHOWPLAN mode before it is returned. */
  async explain(session: DbSession, statement: string, params: SqlParams): Promise<ExplainResult> {
    await session.batch("SET SHOWPLAN_ALL ON");
    let rows: Row[];
    try {
      const output = await session.query(statement, params);
      rows = output.recordsets.length > 0 ? output.recordsets.flat() : output.rows;
    } catch (error) {
      throw classifyDatabaseError(error, "Could not produce an execution plan");
    } finally {
      await this.restore(session);
    }
    return { statement, plan: buildPlanTree(rows) };
  }

  private async restore(session: DbSession): Promise<void> {
    try {
      await session.batch("SET SHOWPLAN_ALL OFF");
    } catch (error) {
      // A session stuck in SHOWPLAN mode would answer every later query with a plan.
      logger.error("Could not leave SHOWPLAN mode; closing the session", error);
      await session.close();
      throw new GatewayError("ConnectionUnavailable", `Session left in SHOWPLAN mode was closed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
