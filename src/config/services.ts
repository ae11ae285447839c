import type { ServiceLocation } from "../lib/types.js";

/**
 * Backends an entity descriptor can be served by.
 */
export type ServiceSelector = "SOURCES" | "TOPOLOGICAL" | "TOPOLOGICAL_INTERNAL";

export type ServiceTable = Record<ServiceSelector, ServiceLocation>;

export const DEFAULT_SERVICE: ServiceSelector = "TOPOLOGICAL";

/**
 * Map a descriptor's selector onto a backend location.
 * Unknown or missing selectors fall back to the topological backend.
 */
export function serviceLocation(table: ServiceTable, selector: string | undefined): ServiceLocation {
  switch (selector) {
    case "SOURCES":
      return table.SOURCES;
    case "TOPOLOGICAL":
      return table.TOPOLOGICAL;
    case "TOPOLOGICAL_INTERNAL":
      return table.TOPOLOGICAL_INTERNAL;
    default:
      return table[DEFAULT_SERVICE];
  }
}
