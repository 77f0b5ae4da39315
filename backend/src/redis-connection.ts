import type Redis from "ioredis";
import { InfrastructureError } from "./errors";
import type { Logger } from "./logger";

/** Conexao extra com os mesmos parametros; erros vao para o logger em vez de virar "Unhandled error event". */
export function duplicateConnection(redis: Redis, logger: Logger, label: string): Redis {
  const connection = redis.duplicate();
  connection.on("error", (error: Error) => logger.error(`Redis (${label}): ${error.message}`));
  return connection;
}

/**
 * Conexoes reaproveitaveis para comandos bloqueantes. Depois de close()
 * nenhuma conexao volta ao pool e acquire() falha.
 */
export class ConnectionPool<T> {
  private readonly idle: T[] = [];
  private readonly busy = new Set<T>();
  private closed = false;

  constructor(
    private readonly create: () => T,
    private readonly dispose: (connection: T) => Promise<void>
  ) {}

  get idleCount(): number {
    return this.idle.length;
  }

  acquire(): T {
    if (this.closed) {
      throw new InfrastructureError("Pool de conexoes encerrado.");
    }
    const connection = this.idle.pop() ?? this.create();
    this.busy.add(connection);
    return connection;
  }

  release(connection: T): void {
    if (this.busy.delete(connection) && !this.closed) {
      this.idle.push(connection);
    }
  }

  /** Descarta as ociosas e as em uso, o que interrompe comandos bloqueados. */
  async close(): Promise<void> {
    this.closed = true;
    const connections = [...this.idle.splice(0), ...this.busy];
    this.busy.clear();
    await Promise.all(connections.map((connection) => this.dispose(connection)));
  }
}
