import type { PoolConfig } from "../config/ConfigLoader.js";
import { classifyDatabaseError, GatewayError } from "../errors/GatewayError.js";
import { createLogger } from "../logging/Logger.js";
import type { DbSession, SessionFactory } from "./types.js";

const logger = createLogger("pool");

export type HealthState = "healthy" | "degraded" | "dead";

export interface ConnectionSnapshot {
  id: number;
  health: HealthState;
  inUse: boolean;
  lastCheckedAt: string | null;
}

export interface PoolHealth {
  status: HealthState;
  total: number;
  idle: number;
  inUse: number;
  healthy: number;
  degraded: number;
  dead: number;
  waiting: number;
  checkedAt: string;
  connections: ConnectionSnapshot[];
}

class Slot {
  session: DbSession | null = null;
  health: HealthState = "dead";
  lastCheckedAt: Date | null = null;
  lastError: unknown = null;
  /** Lent to an invocation. */
  lent = false;
  /** Held by the manager itself for a probe or reconnect. */
  maintenance = false;

  constructor(readonly id: number) {}

  get available(): boolean {
    return !this.lent && !this.maintenance;
  }
}

/** A session lent to exactly one invocation until it is released. */
export interface Connection {
  readonly id: number;
  readonly session: DbSession;
}

interface Waiter {
  resolve: (slot: Slot) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Races a promise against a timer. The timer is always cleared; onTimeout
 * runs before the returned promise rejects.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  timeoutError: () => Error,
  onTimeout?: () => void
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(timeoutError());
    }, ms);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

export class ConnectionManager {
  private readonly slots: Slot[];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(
    private readonly factory: SessionFactory,
    private readonly config: PoolConfig,
    private readonly defaultTimeoutMs: number
  ) {
    this.slots = Array.from({ length: config.size }, (_, id) => new Slot(id));
  }

  get size(): number {
    return this.slots.length;
  }

  get target(): { server: string; database: string } {
    return this.factory.target;
  }

  /** Opens every slot once. Slots that cannot connect stay dead until the next acquire or health check. */
  async initialize(): Promise<PoolHealth> {
    await Promise.all(
      this.slots.map(async (slot) => {
        slot.maintenance = true;
        try {
          await this.reconnect(slot, 1);
        } finally {
          slot.maintenance = false;
          this.handOff(slot);
        }
      })
    );
    const health = this.snapshot();
    logger.info(`Pool initialized: ${health.healthy}/${health.total} healthy`, {
      server: this.factory.target.server,
      database: this.factory.target.database,
    });
    return health;
  }

  async acquire(): Promise<Connection> {
    if (this.closed) {
      throw new GatewayError("ConnectionUnavailable", "Connection pool is closed");
    }
    // Selecting and flagging the slot happens in one synchronous step, so two
    // acquires can never claim the same slot.
    const slot = this.takeIdleSlot();
    if (slot) {
      return this.prepare(slot);
    }
    return this.prepare(await this.waitForSlot());
  }

  async release(connection: Connection): Promise<void> {
    const slot = this.slots[connection.id];
    if (!slot || !slot.lent || slot.session !== connection.session) {
      logger.warn(`Ignoring release of connection ${connection.id}: not currently lent`);
      return;
    }

    if (this.closed) {
      await this.dispose(slot);
    } else if (slot.health === "degraded") {
      await this.probe(slot);
    }

    slot.lent = false;
    this.handOff(slot);
  }

  /** Flags a lent connection so it is probed before anyone trusts it again. */
  markDegraded(connection: Connection): void {
    const slot = this.slots[connection.id];
    if (slot && slot.session === connection.session && slot.health === "healthy") {
      slot.health = "degraded";
      logger.warn(`Connection ${slot.id}: healthy -> degraded`);
    }
  }

  /**
   * Acquires a connection, runs work on its session and releases it. Work
   * that outlives the timeout is cancelled; the caller gets Timeout right away
   * while the connection is held back until the cancelled work settles.
   */
  async withConnection<T>(work: (session: DbSession) => Promise<T>, timeoutMs = this.defaultTimeoutMs): Promise<T> {
    const connection = await this.acquire();
    const task = work(connection.session);
    let timedOut = false;

    try {
      const result = await withTimeout(
        task,
        timeoutMs,
        () => new GatewayError("Timeout", `Operation exceeded ${timeoutMs}ms`, { detail: { timeoutMs } }),
        () => {
          timedOut = true;
          connection.session.cancel();
          this.markDegraded(connection);
        }
      );
      await this.release(connection);
      return result;
    } catch (error) {
      if (timedOut) {
        this.releaseWhenSettled(task, connection).catch((releaseError: unknown) => {
          logger.error(`Connection ${connection.id}: deferred release failed`, releaseError);
        });
        throw error;
      }
      const kind = classifyDatabaseError(error).kind;
      if (kind === "ConnectionUnavailable" || kind === "Timeout") {
        this.markDegraded(connection);
      }
      await this.release(connection);
      throw error;
    }
  }

  /**
   * Probes idle connections, reconnects dead slots with bounded attempts and
   * reports the aggregate state. Lent connections are reported as they stand.
   */
  async checkHealth(): Promise<PoolHealth> {
    await Promise.all(this.slots.map((slot) => this.checkSlot(slot)));
    return this.snapshot();
  }

  snapshot(): PoolHealth {
    let healthy = 0;
    let degraded = 0;
    let dead = 0;
    let inUse = 0;
    for (const slot of this.slots) {
      if (slot.health === "healthy") healthy++;
      else if (slot.health === "degraded") degraded++;
      else dead++;
      if (slot.lent) inUse++;
    }

    const total = this.slots.length;
    const status: HealthState = healthy === total ? "healthy" : dead === total ? "dead" : "degraded";

    return {
      status,
      total,
      idle: total - inUse,
      inUse,
      healthy,
      degraded,
      dead,
      waiting: this.waiters.length,
      checkedAt: new Date().toISOString(),
      connections: this.slots.map((slot) => ({
        id: slot.id,
        health: slot.health,
        inUse: slot.lent,
        lastCheckedAt: slot.lastCheckedAt?.toISOString() ?? null,
      })),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new GatewayError("ConnectionUnavailable", "Connection pool is closed"));
    }
    await Promise.all(this.slots.filter((slot) => slot.available).map((slot) => this.dispose(slot)));
  }

  private takeIdleSlot(): Slot | null {
    const available = this.slots.filter((slot) => slot.available);
    const slot =
      available.find((candidate) => candidate.session && candidate.health === "healthy") ??
      available.find((candidate) => candidate.session && candidate.health === "degraded") ??
      available[0] ??
      null;
    if (slot) {
      slot.lent = true;
    }
    return slot;
  }

  private waitForSlot(): Promise<Slot> {
    return new Promise<Slot>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          reject(
            new GatewayError(
              "PoolExhausted",
              `No connection became available within ${this.config.acquireTimeoutMs}ms (pool size ${this.slots.length})`,
              { detail: { poolSize: this.slots.length, acquireTimeoutMs: this.config.acquireTimeoutMs } }
            )
          );
        }, this.config.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private handOff(slot: Slot): void {
    if (!slot.available || this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      slot.lent = true;
      waiter.resolve(slot);
    }
  }

  /** Turns a claimed slot into a usable connection, probing or reconnecting as needed. */
  private async prepare(slot: Slot): Promise<Connection> {
    if (slot.session && slot.health === "degraded") {
      await this.probe(slot);
    }

    if (!slot.session || slot.health === "dead") {
      const connected = await this.reconnect(slot, this.config.maxReconnectAttempts);
      if (!connected) {
        slot.lent = false;
        this.handOff(slot);
        throw classifyUnavailable(slot.lastError, this.config.maxReconnectAttempts);
      }
    }

    const session = slot.session;
    if (!session) {
      slot.lent = false;
      this.handOff(slot);
      throw new GatewayError("ConnectionUnavailable", `Connection ${slot.id} has no session`);
    }
    return { id: slot.id, session };
  }

  private async probe(slot: Slot): Promise<boolean> {
    const session = slot.session;
    if (!session) {
      slot.health = "dead";
      return false;
    }
    try {
      await withTimeout(
        session.query("SELECT 1 AS ok"),
        this.config.healthCheckTimeoutMs,
        () => new GatewayError("Timeout", `Health probe exceeded ${this.config.healthCheckTimeoutMs}ms`),
        () => session.cancel()
      );
      if (slot.health !== "healthy") {
        logger.info(`Connection ${slot.id}: ${slot.health} -> healthy`);
      }
      slot.health = "healthy";
      slot.lastCheckedAt = new Date();
      return true;
    } catch (error) {
      slot.lastError = error;
      logger.warn(`Connection ${slot.id}: probe failed, marking dead`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await this.dispose(slot);
      slot.lastCheckedAt = new Date();
      return false;
    }
  }

  private async reconnect(slot: Slot, attempts: number): Promise<boolean> {
    if (slot.session) {
      await this.dispose(slot);
    }
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        slot.session = await this.factory.open();
        slot.health = "healthy";
        slot.lastCheckedAt = new Date();
        slot.lastError = null;
        logger.debug(`Connection ${slot.id}: established (attempt ${attempt}/${attempts})`);
        return true;
      } catch (error) {
        slot.lastError = error;
        logger.warn(`Connection ${slot.id}: connect attempt ${attempt}/${attempts} failed`, {
          error: error instanceof Error ? error.message : String(error),
        });
        if (attempt < attempts && this.config.reconnectDelayMs > 0) {
          await delay(this.config.reconnectDelayMs);
        }
      }
    }
    slot.health = "dead";
    slot.lastCheckedAt = new Date();
    return false;
  }

  private async checkSlot(slot: Slot): Promise<void> {
    if (!slot.available) {
      return;
    }
    slot.maintenance = true;
    try {
      if (slot.session && (await this.probe(slot))) {
        return;
      }
      await this.reconnect(slot, this.config.maxReconnectAttempts);
    } finally {
      slot.maintenance = false;
      this.handOff(slot);
    }
  }

  private async dispose(slot: Slot): Promise<void> {
    const session = slot.session;
    slot.session = null;
    slot.health = "dead";
    if (!session) {
      return;
    }
    try {
      await session.close();
    } catch (error) {
      logger.debug(`Connection ${slot.id}: close failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async releaseWhenSettled(task: Promise<unknown>, connection: Connection): Promise<void> {
    try {
      await task;
    } catch (error) {
      logger.debug(`Connection ${connection.id}: abandoned work settled with an error`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    await this.release(connection);
  }
}

function classifyUnavailable(cause: unknown, attempts: number): GatewayError {
  const classified = classifyDatabaseError(cause);
  if (classified.kind === "PermissionDenied") {
    return classified;
  }
  return new GatewayError(
    "ConnectionUnavailable",
    `Database unreachable after ${attempts} attempt(s): ${classified.message}`,
    { cause, detail: { attempts } }
  );
}
