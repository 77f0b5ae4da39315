import type Redis from "ioredis";
import { z } from "zod";
import { InfrastructureError, errorMessage } from "./errors";
import { JOB_STATUSES } from "./job";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { JobStatusEvent, JobSubscription, StatusNotifier } from "./notifier";
import { SubscriptionChannel, statusChannel } from "./notifier";
import { duplicateConnection } from "./redis-connection";

const statusEventSchema = z.object({
  jobId: z.string(),
  status: z.enum(JOB_STATUSES),
  progress: z.number(),
  publishedAt: z.string()
});

export function parseStatusMessage(message: string): JobStatusEvent | undefined {
  try {
    const parsed = statusEventSchema.safeParse(JSON.parse(message));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

/** PUBLISH em job:{id}:status; cada assinatura abre sua propria conexao de subscriber. */
export class RedisStatusNotifier implements StatusNotifier {
  private readonly subscriptions = new Set<SubscriptionChannel>();

  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger = silentLogger
  ) {}

  async publish(event: JobStatusEvent): Promise<void> {
    try {
      await this.redis.publish(statusChannel(event.jobId), JSON.stringify(event));
    } catch (error) {
      this.logger.warn(`Falha ao publicar status do job ${event.jobId}: ${errorMessage(error)}`);
    }
  }

  async subscribe(jobId: string): Promise<JobSubscription> {
    const channel = statusChannel(jobId);
    const subscriber = duplicateConnection(this.redis, this.logger, `assinatura ${channel}`);

    const subscription: SubscriptionChannel = new SubscriptionChannel(async () => {
      this.subscriptions.delete(subscription);
      try {
        await subscriber.unsubscribe(channel);
        await subscriber.quit();
      } catch (error) {
        this.logger.warn(`Falha ao encerrar assinatura de ${channel}: ${errorMessage(error)}`);
        subscriber.disconnect();
      }
    });

    subscriber.on("message", (messageChannel: string, message: string) => {
      if (messageChannel !== channel) return;
      const event = parseStatusMessage(message);
      if (event) {
        subscription.push(event);
      } else {
        this.logger.warn(`Mensagem invalida em ${channel} ignorada`);
      }
    });

    try {
      await subscriber.subscribe(channel);
    } catch (error) {
      subscriber.disconnect();
      throw new InfrastructureError(`Falha ao assinar ${channel}: ${errorMessage(error)}`, { cause: error });
    }

    this.subscriptions.add(subscription);
    return subscription;
  }

  async close(): Promise<void> {
    await Promise.all([...this.subscriptions].map((subscription) => subscription.close()));
  }
}
