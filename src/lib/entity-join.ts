import { entities } from "../config/entities.js";
import { serviceLocation, type ServiceTable } from "../config/services.js";
import { ConfigurationError } from "./errors.js";
import type { CollectorMetrics } from "./metrics.js";
import { fetchLinkPaged } from "./paginate.js";
import type { Transport } from "./transport.js";
import type { CollectOutcome, CollectionResult, EntityDescriptor, InventoryRecord } from "./types.js";

type Catalog = Readonly<Record<string, Readonly<EntityDescriptor>>>;

type DescriptorShape =
  | { kind: "main"; mainCollection: string }
  | { kind: "sub"; mainCollection: string; subCollection: string; foreignKey: string };

/**
 * Check a descriptor before any request is made. Naming either a
 * sub-collection or a foreign key requires main, sub and key together.
 */
export function validateDescriptor(descriptor: EntityDescriptor): DescriptorShape {
  const { mainCollection, subCollection, foreignKey } = descriptor;

  if (subCollection === undefined && foreignKey === undefined) {
    if (!mainCollection) throw new ConfigurationError("Entity is missing 'mainCollection'");
    return { kind: "main", mainCollection };
  }

  if (!mainCollection || !subCollection || !foreignKey) {
    const missing = Object.entries({ mainCollection, subCollection, foreignKey })
      .filter(([, value]) => !value)
      .map(([key]) => key);
    throw new ConfigurationError(`Sub-collection entity is missing: ${missing.join(", ")}`);
  }

  return { kind: "sub", mainCollection, subCollection, foreignKey };
}

/**
 * Copy every child record with the parent id stored under `foreignKey`.
 * An existing value under that key is overwritten.
 */
export function injectForeignKey(
  records: readonly InventoryRecord[],
  foreignKey: string,
  parentId: string | number,
): InventoryRecord[] {
  return records.map((record) => ({ ...record, [foreignKey]: parentId }));
}

export interface EntityJoinEngineOptions {
  transport: Transport;
  services: ServiceTable;
  catalog?: Catalog;
  metrics?: CollectorMetrics;
}

export class EntityJoinEngine {
  private readonly transport: Transport;
  private readonly services: ServiceTable;
  private readonly catalog: Catalog;
  private readonly metrics: CollectorMetrics | undefined;

  constructor(options: EntityJoinEngineOptions) {
    this.transport = options.transport;
    this.services = options.services;
    this.catalog = options.catalog ?? entities;
    this.metrics = options.metrics;
  }

  /**
   * Fetch a descriptor's collection. With a sub-collection, every main record
   * is expanded into its children, in main-collection order.
   */
  async resolve(descriptor: EntityDescriptor, headers?: Record<string, string>): Promise<CollectionResult> {
    const shape = validateDescriptor(descriptor);
    const service = serviceLocation(this.services, descriptor.service);

    const parents = await fetchLinkPaged(this.transport, service, shape.mainCollection, headers);
    if (shape.kind === "main") return parents;

    const joined: InventoryRecord[] = [];
    for (const parent of parents) {
      const id = parent.id;
      if (typeof id !== "string" && typeof id !== "number") {
        console.warn(`Skipping ${shape.mainCollection} record without an id`);
        continue;
      }

      const path = `${shape.mainCollection}/${id}/${shape.subCollection}`;
      const children = await fetchLinkPaged(this.transport, service, path, headers);
      joined.push(...injectForeignKey(children, shape.foreignKey, id));
    }

    return joined;
  }

  descriptor(name: string): Readonly<EntityDescriptor> {
    const descriptor = this.catalog[name];
    if (!descriptor) throw new ConfigurationError(`Unknown entity '${name}'`);
    return descriptor;
  }

  /**
   * Resolve catalog entries in order. The first empty collection makes the
   * whole job incomplete and the remaining entries are not fetched.
   */
  async collectJob(names: readonly string[], headers?: Record<string, string>): Promise<CollectOutcome> {
    const descriptors = names.map((name) => {
      const descriptor = this.descriptor(name);
      validateDescriptor(descriptor);
      return { name, descriptor };
    });

    if (descriptors.length === 0) {
      return { complete: false, reason: "no-collections" };
    }

    const data: Record<string, CollectionResult> = {};
    for (const { name, descriptor } of descriptors) {
      this.metrics?.inc("gets");
      let result: CollectionResult;
      try {
        result = await this.resolve(descriptor, headers);
      } catch (error) {
        this.metrics?.inc("get_errors");
        throw error;
      }
      this.metrics?.inc("get_successes");

      if (result.length === 0) {
        return { complete: false, reason: "empty-collection", collection: name };
      }
      data[name] = result;
    }

    return { complete: true, data };
  }
}
