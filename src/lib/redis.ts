import { Redis } from "ioredis";
import type { Settings } from "../config/settings.js";

export function createRedisClient(settings: Settings["redis"]): Redis {
  return new Redis({
    host: settings.host,
    port: settings.port,
    password: settings.password || undefined,
    maxRetriesPerRequest: 3,
    connectTimeout: 5000,
    commandTimeout: 10000,
    lazyConnect: true,
  });
}

export async function disconnectRedis(client: Redis): Promise<void> {
  if (client.status === "end") return;
  await client.quit();
}
