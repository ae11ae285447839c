import type { WorkerName } from "../../config/settings.js";
import { downloadWorker } from "./download.js";
import { hostInventoryWorker } from "./host-inventory.js";
import { topologicalWorker } from "./topological.js";
import type { Worker } from "./types.js";

export type { Worker, WorkerContext } from "./types.js";

const WORKERS: Record<WorkerName, Worker> = {
  download: downloadWorker,
  topological: topologicalWorker,
  host_inventory: hostInventoryWorker,
};

export function getWorker(name: WorkerName | null): Worker | null {
  return name ? WORKERS[name] : null;
}
