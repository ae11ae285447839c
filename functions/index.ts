import type { RouteModule } from "../src/lib/http.js";
import collect, { config as collectConfig } from "./collect.js";
import metrics, { config as metricsConfig } from "./metrics.js";
import openapi, { config as openapiConfig } from "./openapi.js";
import root, { config as rootConfig } from "./root.js";
import version, { config as versionConfig } from "./version.js";

export const routes: RouteModule[] = [
  { config: rootConfig, create: root },
  { config: versionConfig, create: version },
  { config: collectConfig, create: collect },
  { config: openapiConfig, create: openapi },
  { config: metricsConfig, create: metrics },
];
