/**
 * Metric catalog: which provider endpoint serves each metric kind.
 *
 * Responses are treated as opaque documents; nothing here parses them.
 */

import { LogicError } from "@fitsync/proto";

export type MetricResolution = "daily" | "intraday";

export interface MetricDefinition {
  /** Metric kind, e.g. "steps"; also part of the artifact file name */
  kind: string;
  description: string;
  resolution: MetricResolution;
  /** API path (relative to the provider base URL) for one date */
  path: (date: string) => string;
}

/** Metric kinds must be safe inside artifact file names */
const METRIC_KIND = /^[a-z0-9][a-z0-9-]*$/;

export const BUILTIN_METRICS: MetricDefinition[] = [
  {
    kind: "steps",
    description: "Daily step count summary",
    resolution: "daily",
    path: (date) => `/1/user/-/activities/steps/date/${date}/1d.json`,
  },
  {
    kind: "heartrate-intraday",
    description: "Heart rate at 1-minute resolution",
    resolution: "intraday",
    path: (date) => `/1/user/-/activities/heart/date/${date}/1d/1min.json`,
  },
  {
    kind: "sleep",
    description: "Sleep logs for the night ending on the date",
    resolution: "daily",
    path: (date) => `/1.2/user/-/sleep/date/${date}.json`,
  },
  {
    kind: "weight",
    description: "Body weight logs",
    resolution: "daily",
    path: (date) => `/1/user/-/body/log/weight/date/${date}.json`,
  },
];

/** Metrics synced when configuration does not name any */
export const DEFAULT_METRIC_KINDS = ["steps", "heartrate-intraday"];

export class MetricCatalog {
  private definitions = new Map<string, MetricDefinition>();

  constructor(definitions: MetricDefinition[] = BUILTIN_METRICS) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: MetricDefinition): void {
    if (!METRIC_KIND.test(definition.kind)) {
      throw new LogicError(`Invalid metric kind: ${definition.kind}`, {
        source: "MetricCatalog.register",
      });
    }
    this.definitions.set(definition.kind, definition);
  }

  get(kind: string): MetricDefinition {
    const definition = this.definitions.get(kind);
    if (!definition) {
      throw new LogicError(`Unknown metric kind: ${kind}`, {
        source: "MetricCatalog.get",
      });
    }
    return definition;
  }

  has(kind: string): boolean {
    return this.definitions.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.definitions.keys());
  }
}

export function isValidMetricKind(kind: string): boolean {
  return METRIC_KIND.test(kind);
}
