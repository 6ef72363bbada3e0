import type { LimitsConfig } from "../config/ConfigLoader.js";
import type { DbSession } from "../db/types.js";
import { GatewayError, errorMessage, sqlErrorNumber, type ErrorDetail } from "../errors/GatewayError.js";
import { createLogger } from "../logging/Logger.js";
import { MAX_IDENTIFIER_LENGTH, formatTableRef, quoteTable, type TableRef } from "../policy/identifiers.js";
import { catalogQuery, resolveTable, type ResolvedTable } from "../schema/SchemaInspector.js";
import { readNumber } from "../db/rows.js";

const logger = createLogger("backup");

export interface BackupSpec {
  sourceTable: string;
  targetTable: string;
  rowsCopied: number;
  completedAt: string;
}

// "There is already an object named ... in the database."
const OBJECT_EXISTS = 2714;

const OBJECT_ID_SQL = "SELECT OBJECT_ID(@qualifiedName) AS objectId";

const pad = (value: number) => String(value).padStart(2, "0");

/** YYYYMMDD_HHMMSS in UTC. */
export function backupTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Candidate target names: the base name, then base_2, base_3 ... Each is
 * truncated so the suffix always fits in an identifier.
 */
export function backupCandidates(base: string, attempts: number): string[] {
  return Array.from({ length: attempts }, (_, i) => {
    const suffix = i === 0 ? "" : `_${i + 1}`;
    return base.slice(0, MAX_IDENTIFIER_LENGTH - suffix.length) + suffix;
  });
}

export class BackupManager {
  constructor(
    private readonly limits: Pick<LimitsConfig, "backupNameAttempts">,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async backupTable(session: DbSession, table: TableRef, backupName?: string): Promise<BackupSpec> {
    let source: ResolvedTable;
    try {
      source = await resolveTable(session, table);
    } catch (error) {
      if (error instanceof GatewayError && error.kind === "NotFound") {
        throw new GatewayError("SourceNotFound", error.message, { cause: error, detail: error.detail });
      }
      throw error;
    }

    const base = backupName ?? `${source.name}_backup_${backupTimestamp(this.clock())}`;
    const candidates = backupCandidates(base, this.limits.backupNameAttempts);

    for (const candidate of candidates) {
      if (await this.exists(session, source.schema, candidate)) {
        logger.debug(`Backup target ${source.schema}.${candidate} exists, trying the next name`);
        continue;
      }

      const copied = await this.copy(session, source, candidate);
      if (copied === null) {
        continue;
      }
      const spec: BackupSpec = {
        sourceTable: `${source.schema}.${source.name}`,
        targetTable: `${source.schema}.${candidate}`,
        rowsCopied: copied,
        completedAt: this.clock().toISOString(),
      };
      logger.info(`Backed up ${spec.sourceTable} to ${spec.targetTable}`, { rowsCopied: copied });
      return spec;
    }

    throw new GatewayError(
      "TargetNameCollisionUnresolved",
      `Could not find a free backup name for '${formatTableRef(table)}' after ${candidates.length} attempts.`,
      { detail: { base, attempts: candidates.length } }
    );
  }

  private async exists(session: DbSession, schema: string, name: string): Promise<boolean> {
    const { rows } = await catalogQuery(session, OBJECT_ID_SQL, { qualifiedName: quoteTable(schema, name) });
    return rows.length > 0 && readNumber(rows[0], "objectId") !== null;
  }

  /**
   * Copies structure and rows in one transaction. Returns null when the
   * name was taken concurrently, so the caller moves to the next candidate.
   */
  private async copy(session: DbSession, source: ResolvedTable, target: string): Promise<number | null> {
    const statement = `SELECT * INTO ${quoteTable(source.schema, target)} FROM ${quoteTable(source.schema, source.name)}`;
    try {
      return await session.transaction(async (tx) => {
        const { rowsAffected } = await tx.query(statement);
        return rowsAffected[0] ?? 0;
      });
    } catch (error) {
      const number = sqlErrorNumber(error);
      if (number === OBJECT_EXISTS) {
        return null;
      }
      const detail: ErrorDetail = { sourceTable: `${source.schema}.${source.name}`, targetTable: `${source.schema}.${target}` };
      if (number !== undefined) {
        detail.number = number;
      }
      throw new GatewayError("CopyFailed", `Backup copy failed and was rolled back: ${errorMessage(error)}`, {
        cause: error,
        detail,
      });
    }
  }
}
