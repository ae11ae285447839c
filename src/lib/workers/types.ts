import type { Settings } from "../../config/settings.js";
import type { EntityJoinEngine } from "../entity-join.js";
import type { ForwardingSink } from "../forwarder.js";
import type { CollectorMetrics } from "../metrics.js";
import type { TenantIterator } from "../tenants.js";
import type { Transport } from "../transport.js";
import type { Job } from "../types.js";

export interface WorkerContext {
  transport: Transport;
  engine: EntityJoinEngine;
  tenants: TenantIterator;
  sink: ForwardingSink;
  metrics: CollectorMetrics;
  settings: Pick<Settings, "activeEntities" | "hostInventory">;
}

export type Worker = (job: Job, ctx: WorkerContext) => Promise<void>;
