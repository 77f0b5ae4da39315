import type Redis from "ioredis";
import { InfrastructureError, errorMessage } from "./errors";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { WorkQueue } from "./queue";
import { DEFAULT_QUEUE_NAME } from "./queue";
import { ConnectionPool, duplicateConnection } from "./redis-connection";

export interface RedisWorkQueueOptions {
  queueName?: string;
  logger?: Logger;
}

/**
 * LPUSH na cabeca, BRPOP na cauda: FIFO com entrega unica garantida pelo
 * proprio Redis. BRPOP bloqueia a conexao, entao cada dequeue em andamento
 * usa uma conexao duplicada so para ele.
 */
export class RedisWorkQueue implements WorkQueue {
  private readonly queueName: string;
  private readonly logger: Logger;
  private readonly pool: ConnectionPool<Redis>;

  constructor(private readonly redis: Redis, options: RedisWorkQueueOptions = {}) {
    this.queueName = options.queueName ?? DEFAULT_QUEUE_NAME;
    this.logger = options.logger ?? silentLogger;
    this.pool = new ConnectionPool(
      () => duplicateConnection(redis, this.logger, "fila"),
      async (connection) => {
        try {
          await connection.quit();
        } catch (error) {
          this.logger.warn(`Falha ao fechar conexao da fila: ${errorMessage(error)}`);
          connection.disconnect();
        }
      }
    );
  }

  async enqueue(id: string): Promise<void> {
    await this.call("enfileirar", () => this.redis.lpush(this.queueName, id));
  }

  async dequeue(timeoutMs: number): Promise<string | undefined> {
    if (timeoutMs <= 0) {
      const id = await this.call("retirar da fila", () => this.redis.rpop(this.queueName));
      return id ?? undefined;
    }

    const connection = this.pool.acquire();
    try {
      const entry = await this.call("retirar da fila", () => connection.brpop(this.queueName, timeoutMs / 1000));
      return entry ? entry[1] : undefined;
    } finally {
      this.pool.release(connection);
    }
  }

  async length(): Promise<number> {
    return this.call("medir fila", () => this.redis.llen(this.queueName));
  }

  async pending(): Promise<string[]> {
    const ids = await this.call("listar fila", () => this.redis.lrange(this.queueName, 0, -1));
    return ids.reverse();
  }

  async close(): Promise<void> {
    await this.pool.close();
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new InfrastructureError(`Falha no Redis ao ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
