/**
 * ENTITY CATALOG
 *
 * Collections the topological worker can collect, keyed by the name used in
 * the forwarded payload. Which of them a deployment collects is set with
 * APP_CONFIG (comma separated, in order); all of them otherwise.
 *
 * - Main collection only:  { mainCollection: "volumes" }
 * - Joined sub-collection: { mainCollection, subCollection, foreignKey }
 *   fetches {mainCollection}/{id}/{subCollection} for every main record and
 *   stores the parent id under foreignKey.
 */

import type { EntityDescriptor } from "../lib/types.js";

export const entities: Readonly<Record<string, Readonly<EntityDescriptor>>> = {
  // ── Sources ──
  sources:                { mainCollection: "sources", service: "SOURCES" },
  source_types:           { mainCollection: "source_types", service: "SOURCES" },

  // ── Containers ──
  container_nodes:        { mainCollection: "container_nodes" },
  container_groups:       { mainCollection: "container_groups" },
  container_projects:     { mainCollection: "container_projects" },
  container_node_tags: {
    mainCollection: "container_nodes",
    subCollection: "tags",
    foreignKey: "container_node_id",
  },
  containers: {
    mainCollection: "container_groups",
    subCollection: "containers",
    foreignKey: "container_group_id",
  },

  // ── Storage ──
  volumes:                { mainCollection: "volumes" },
  volume_types:           { mainCollection: "volume_types" },
  volume_attachments:     { mainCollection: "volume_attachments" },

  // ── Compute ──
  vms:                    { mainCollection: "vms" },
  flavors:                { mainCollection: "flavors" },
  vm_tags: {
    mainCollection: "vms",
    subCollection: "tags",
    foreignKey: "vm_id",
  },
};

/** Tenant enumeration on the internal API */
export const TENANTS_ENTITY: Readonly<EntityDescriptor> = {
  mainCollection: "tenants",
  service: "TOPOLOGICAL_INTERNAL",
};

export function activeEntityNames(configured: string[] | null): string[] {
  return configured ?? Object.keys(entities);
}
